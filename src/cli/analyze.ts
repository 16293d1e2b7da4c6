import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { createLogger } from '../common/logger.js';
import { SqlscopeError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { QualifierColumnExtractor } from '../extractor/extractor.js';
import { formatReport, toRecords, type QualifierRecord } from '../extractor/result.js';

const log = createLogger('cli');

export interface AnalyzeOptions {
	dialect: string;
	json?: boolean;
}

export interface QueryAnalysis {
	sql: string;
	qualifiers: QualifierRecord[];
}

/** samples/queries.json, next to src/ and dist/ */
export const SAMPLE_QUERIES_PATH = fileURLToPath(new URL('../../samples/queries.json', import.meta.url));

export function loadSampleQueries(path: string = SAMPLE_QUERIES_PATH): string[] {
	const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
	if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
		throw new SqlscopeError(`Sample file ${path} must hold an array of SQL strings`, StatusCode.FORMAT);
	}
	return parsed;
}

/**
 * Runs the extractor over each query and renders the results, either as
 * report blocks separated by blank lines or as one JSON array.
 */
export function analyzeQueries(queries: readonly string[], options: AnalyzeOptions): string {
	const extractor = new QualifierColumnExtractor({ dialect: options.dialect });
	log('Analyzing %d queries (%s)', queries.length, options.dialect);

	if (options.json) {
		const analyses: QueryAnalysis[] = queries.map(sql => ({ sql, qualifiers: toRecords(extractor.extractSql(sql)) }));
		return JSON.stringify(analyses, null, 2);
	}

	return queries.map(sql => formatReport(sql, extractor.extractSql(sql))).join('\n\n');
}
