import NodeSqlParser from 'node-sql-parser';
import type { AST } from 'node-sql-parser';
import { createLogger } from '../common/logger.js';
import { MisuseError, ParseError } from '../common/errors.js';
import { adaptStatement } from './adapter.js';
import { SyntaxTree } from './syntax.js';

export * from './syntax.js';
export * from './visitor.js';
export { adaptStatement, adaptExpression, identifierText } from './adapter.js';

const { Parser } = NodeSqlParser;

const log = createLogger('parser');

export const DEFAULT_DIALECT = 'MySQL';

/** Database names node-sql-parser accepts for its `database` option */
const SUPPORTED_DIALECTS = [
	'Athena',
	'BigQuery',
	'DB2',
	'FlinkSQL',
	'Hive',
	'MariaDB',
	'MySQL',
	'Noql',
	'PostgresQL',
	'Redshift',
	'Snowflake',
	'Sqlite',
	'TransactSQL',
	'Trino',
] as const;

export type SqlDialect = typeof SUPPORTED_DIALECTS[number];

export interface ParseOptions {
	/** node-sql-parser database name, matched case-insensitively. Defaults to MySQL. */
	dialect?: string;
}

export function getSupportedDialects(): readonly SqlDialect[] {
	return SUPPORTED_DIALECTS;
}

/**
 * @returns the canonical spelling of `dialect`
 * @throws MisuseError if node-sql-parser does not know the dialect
 */
export function resolveDialect(dialect: string): SqlDialect {
	const lower = dialect.toLowerCase();
	const match = SUPPORTED_DIALECTS.find(d => d.toLowerCase() === lower);
	if (!match) {
		throw new MisuseError(`Unsupported SQL dialect: ${dialect}`);
	}
	return match;
}

/**
 * Parse a single SQL statement into a syntax tree
 *
 * @param sql One SQL statement; a trailing semicolon is allowed
 * @returns The statement's tree, or an empty tree for blank input
 * @throws ParseError if the parser rejects the SQL
 * @throws MisuseError if the input holds more than one statement
 */
export function parse(sql: string, options: ParseOptions = {}): SyntaxTree {
	const dialect = resolveDialect(options.dialect ?? DEFAULT_DIALECT);
	const text = sql.replace(/[\s;]+$/, '');
	if (text.trim().length === 0) {
		return new SyntaxTree(undefined);
	}

	const statements = astify(text, dialect);
	if (statements.length === 0) {
		return new SyntaxTree(undefined);
	}
	if (statements.length > 1) {
		throw new MisuseError(`Expected a single SQL statement, got ${statements.length}`);
	}

	const tree = new SyntaxTree(adaptStatement(statements[0]));
	log('Parsed %s statement (%d nodes)', dialect, tree.size);
	return tree;
}

function astify(sql: string, dialect: SqlDialect): AST[] {
	const parser = new Parser();
	let result: AST | AST[];
	try {
		result = parser.astify(sql, { database: dialect });
	} catch (error) {
		throw toParseError(error);
	}
	return (Array.isArray(result) ? result : [result]).filter(statement => statement !== null && statement !== undefined);
}

/**
 * Wraps a node-sql-parser failure. Its syntax errors carry
 * `location.start.{line, column}`.
 */
function toParseError(error: unknown): ParseError {
	if (!(error instanceof Error)) {
		return new ParseError(`SQL parse failed: ${String(error)}`);
	}
	const start = 'location' in error ? locationStart(error.location) : undefined;
	log.extend('error')('Parse failed: %s', error.message);
	return new ParseError(error.message, error, start?.line, start?.column);
}

function locationStart(location: unknown): { line: number; column: number } | undefined {
	if (typeof location !== 'object' || location === null || !('start' in location)) {
		return undefined;
	}
	const start = location.start;
	if (typeof start === 'object' && start !== null && 'line' in start && 'column' in start
		&& typeof start.line === 'number' && typeof start.column === 'number') {
		return { line: start.line, column: start.column };
	}
	return undefined;
}
