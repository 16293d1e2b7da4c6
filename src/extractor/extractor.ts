import { createLogger } from '../common/logger.js';
import { ParseUnavailableError } from '../common/errors.js';
import { parse, type ParseOptions, type SyntaxTree } from '../parser/index.js';
import { ExtractorOptionsManager, type ExtractorOptions } from '../core/options.js';
import type { QualifierEntry, ResultMap } from './result.js';

const log = createLogger('extractor');

/**
 * Maps every qualifier in a parsed query to its source and the columns
 * referenced through it.
 *
 * Registration runs CTEs, then tables, then aliased subqueries, each
 * overwriting an earlier entry of the same name. Qualified columns are
 * attributed afterwards, creating `unknown` entries for undeclared
 * qualifiers. Every column list is then sorted and deduplicated.
 *
 * If the entry registered last ends up with no columns, it receives every
 * column reference in the tree (output alias or name, traversal order,
 * duplicates kept). Only that one entry is filled, whatever the others hold.
 *
 * @throws ParseUnavailableError when no tree is given
 */
export function extract(tree: SyntaxTree | null | undefined): ResultMap {
	if (!tree) {
		throw new ParseUnavailableError('Cannot extract qualifiers without a parsed syntax tree');
	}

	const result: ResultMap = new Map();

	for (const cte of tree.findAll('cte')) {
		result.set(cte.name, { source: { kind: 'cte' }, columns: [] });
	}

	for (const table of tree.findAll('tableRef')) {
		result.set(table.alias ?? table.name, { source: { kind: 'table', name: table.name }, columns: [] });
	}

	for (const subquery of tree.findAll('subqueryRef')) {
		if (subquery.alias) {
			result.set(subquery.alias, { source: { kind: 'subquery' }, columns: [] });
		}
	}

	const columnRefs = tree.findAll('columnRef');
	for (const column of columnRefs) {
		if (!column.table) continue;
		let entry = result.get(column.table);
		if (!entry) {
			entry = { source: { kind: 'unknown', name: column.table }, columns: [] };
			result.set(column.table, entry);
		}
		entry.columns.push(column.name);
	}

	let last: QualifierEntry | undefined;
	for (const entry of result.values()) {
		entry.columns = sortedUnique(entry.columns);
		last = entry;
	}
	if (last && last.columns.length === 0) {
		last.columns = columnRefs.map(column => column.aliasOrName);
	}

	log('Extracted %d qualifiers from %d column references', result.size, columnRefs.length);
	return result;
}

/**
 * Parses `sql` and extracts its qualifiers in one step.
 *
 * @throws ParseError if the SQL does not parse
 */
export function extractQualifiers(sql: string, options?: ParseOptions): ResultMap {
	return extract(parse(sql, options));
}

function sortedUnique(columns: readonly string[]): string[] {
	return Array.from(new Set(columns)).sort(compareCodeUnits);
}

function compareCodeUnits(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Extractor bound to a set of options, for callers that analyze many
 * queries in the same dialect.
 */
export class QualifierColumnExtractor {
	readonly options: ExtractorOptionsManager;

	constructor(options: ExtractorOptions = {}) {
		this.options = new ExtractorOptionsManager();
		this.options.applyOptions(options);
	}

	extract(tree: SyntaxTree | null | undefined): ResultMap {
		return extract(tree);
	}

	extractSql(sql: string): ResultMap {
		return extract(parse(sql, { dialect: this.options.getStringOption('dialect') }));
	}
}
