#!/usr/bin/env node

/**
 * sqlscope CLI - list the tables, aliases and columns a query references
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import process from 'process';
import { enableLogging } from '../common/logger.js';
import { getEnvVar } from '../common/environment.js';
import { DEFAULT_DIALECT } from '../parser/index.js';
import { analyzeQueries, loadSampleQueries } from './analyze.js';

interface CliOptions {
	cmd?: string;
	dialect: string;
	json?: boolean;
	samples?: boolean;
	verbose?: boolean;
}

const program = new Command();

program
	.name('sqlscope')
	.description('Map each table, alias, CTE and subquery in a SQL query to its source and referenced columns')
	.version('0.1.0')
	.argument('[file]', 'SQL file to analyze (or read from stdin)')
	.option('-c, --cmd <sql>', 'analyze the given SQL instead of a file')
	.option('-d, --dialect <name>', 'SQL dialect', getEnvVar('SQLSCOPE_DIALECT') ?? DEFAULT_DIALECT)
	.option('-j, --json', 'output JSON instead of text')
	.option('--samples', 'analyze the bundled sample queries')
	.option('-v, --verbose', 'enable debug logging')
	.action(async (file: string | undefined, options: CliOptions) => {
		try {
			await main(file, options);
		} catch (error) {
			console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
			process.exit(1);
		}
	});

async function main(file: string | undefined, options: CliOptions): Promise<void> {
	if (options.verbose) {
		enableLogging();
	}

	let queries: string[];
	if (options.samples) {
		queries = loadSampleQueries();
	} else if (options.cmd !== undefined) {
		queries = [options.cmd];
	} else if (file) {
		if (options.verbose) {
			console.error(chalk.blue('Reading SQL from:'), file);
		}
		queries = [readFileSync(file, 'utf-8').trim()];
	} else {
		queries = [(await readStdin()).trim()];
	}

	if (queries.some(sql => !sql)) {
		throw new Error('No SQL input provided');
	}

	console.log(analyzeQueries(queries, { dialect: options.dialect, json: options.json }));
}

async function readStdin(): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of process.stdin) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	return Buffer.concat(chunks).toString('utf-8');
}

program.parseAsync(process.argv).catch((error: unknown) => {
	console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
	process.exit(1);
});
