/**
 * What a qualifier refers to
 */
export type SourceKind =
	| { readonly kind: 'cte' }
	| { readonly kind: 'table'; readonly name: string }
	| { readonly kind: 'subquery' }
	/** Seen only as a column prefix; `name` is the qualifier itself */
	| { readonly kind: 'unknown'; readonly name: string };

export interface QualifierEntry {
	source: SourceKind;
	columns: string[];
}

/** Qualifier -> entry, in first-registration order */
export type ResultMap = Map<string, QualifierEntry>;

export type SourceKindName = 'CTE' | 'PhysicalTable' | 'Subquery' | 'Unknown';

export interface QualifierRecord {
	qualifier: string;
	sourceKind: SourceKindName;
	sourceName: string;
	columns: string[];
}

const REPORT_RULE = '*'.repeat(50);
const REPORT_DIVIDER = '-'.repeat(50);

export function sourceKindName(source: SourceKind): SourceKindName {
	switch (source.kind) {
		case 'cte': return 'CTE';
		case 'table': return 'PhysicalTable';
		case 'subquery': return 'Subquery';
		case 'unknown': return 'Unknown';
	}
}

/**
 * The underlying name shown for a qualifier: the table for a physical
 * table, the qualifier for an unknown one, and the kind otherwise.
 */
export function describeSource(source: SourceKind): string {
	switch (source.kind) {
		case 'cte': return 'CTE';
		case 'table': return source.name;
		case 'subquery': return 'Subquery';
		case 'unknown': return source.name;
	}
}

export function toRecords(map: ResultMap): QualifierRecord[] {
	return Array.from(map, ([qualifier, entry]) => ({
		qualifier,
		sourceKind: sourceKindName(entry.source),
		sourceName: describeSource(entry.source),
		columns: [...entry.columns],
	}));
}

export function toJson(map: ResultMap, indent?: number): string {
	return JSON.stringify(toRecords(map), null, indent);
}

/**
 * Plain-text block for one query:
 *
 * ```
 * **************************************************
 * SELECT a.x FROM t a
 * --------------------------------------------------
 * Alias/Table: a
 *   -> Underlying: t
 *   -> Columns: ['x']
 * ```
 */
export function formatReport(sql: string, map: ResultMap): string {
	const lines = [REPORT_RULE, sql, REPORT_DIVIDER];
	for (const record of toRecords(map)) {
		lines.push(`Alias/Table: ${record.qualifier}`);
		lines.push(`  -> Underlying: ${record.sourceName}`);
		lines.push(`  -> Columns: [${record.columns.map(c => `'${c}'`).join(', ')}]`);
	}
	return lines.join('\n');
}
