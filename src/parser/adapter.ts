/**
 * Converts node-sql-parser output into a {@link SyntaxTree}.
 *
 * node-sql-parser types most of its expression tree loosely, so the adapter
 * walks the AST as plain data and narrows each object by its shape.
 */

import { createLogger } from '../common/logger.js';
import {
	columnRefNode,
	cteNode,
	otherNode,
	subqueryRefNode,
	tableRefNode,
	type SyntaxNode,
} from './syntax.js';

const log = createLogger('parser:adapter');
const warnLog = log.extend('warn');

type AstRecord = Record<string, unknown>;

/** Keys that never hold syntax worth walking */
const IGNORED_KEYS = new Set(['loc', 'parentheses', 'parentheses_symbol', '_parentheses', 'tableList', 'columnList']);

const SET_OPERATIONS = new Set(['union', 'union all', 'union distinct', 'intersect', 'intersect all', 'except', 'except all', 'minus']);

function isRecord(value: unknown): value is AstRecord {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads an identifier the way node-sql-parser emits it: a plain string, or
 * an object such as `{ type: 'default', value: 'name' }` or
 * `{ expr: { type: 'backticks_quote_string', value: 'name' } }`.
 */
export function identifierText(value: unknown): string | undefined {
	if (typeof value === 'string') {
		return value;
	}
	if (isRecord(value)) {
		if (typeof value.value === 'string') {
			return value.value;
		}
		if (isRecord(value.expr)) {
			return identifierText(value.expr);
		}
	}
	return undefined;
}

function isStatement(value: AstRecord): boolean {
	return value.type === 'select' || value.type === 'insert' || value.type === 'replace'
		|| value.type === 'update' || value.type === 'delete';
}

/** `{ ast: <select> }`, the shape of a nested query inside an expression or FROM */
function nestedQuery(value: unknown): AstRecord | undefined {
	if (!isRecord(value)) {
		return undefined;
	}
	const ast = value.ast;
	return isRecord(ast) && isStatement(ast) ? ast : undefined;
}

/**
 * Builds the tree for one statement as returned by `Parser#astify`.
 */
export function adaptStatement(statement: unknown): SyntaxNode {
	if (!isRecord(statement)) {
		return otherNode('empty');
	}
	return adaptQuery(statement);
}

function adaptQuery(stmt: AstRecord): SyntaxNode {
	if (stmt.type !== 'select') {
		return adaptGeneric(stmt);
	}

	// A set-operation chain hangs off `_next`; fold it to the left.
	let result = adaptSelect(stmt);
	let current: AstRecord = stmt;
	let next = current._next;
	while (isRecord(next)) {
		const setOp = current.set_op;
		const operator = typeof setOp === 'string' ? setOp.toLowerCase() : 'union';
		if (!SET_OPERATIONS.has(operator)) {
			warnLog('Unrecognized set operation %s', operator);
		}
		result = otherNode(operator, [result, adaptSelect(next)]);
		current = next;
		next = current._next;
	}
	return result;
}

function adaptSelect(select: AstRecord): SyntaxNode {
	const children: SyntaxNode[] = [];

	const ctes: unknown[] = asArray(select.with);
	if (ctes.length > 0) {
		children.push(otherNode('with', ctes.filter(isRecord).map(adaptCte)));
	}

	for (const column of asArray(select.columns)) {
		children.push(adaptProjection(column));
	}

	pushSources(children, 'from', asArray(select.from));

	pushClause(children, 'where', select.where);
	pushClause(children, 'group', groupByItems(select.groupby));
	pushClause(children, 'having', select.having);
	const orderBy: unknown[] = asArray(select.orderby);
	if (orderBy.length > 0) {
		children.push(otherNode('order', orderBy.map(item => otherNode('ordered', [adaptExpression(isRecord(item) ? item.expr : item)]))));
	}
	pushClause(children, 'limit', select.limit);

	return otherNode('select', children);
}

function adaptCte(cte: AstRecord): SyntaxNode {
	const name = identifierText(cte.name) ?? '';
	const stmt = cte.stmt;
	const query = nestedQuery(stmt) ?? (isRecord(stmt) && isStatement(stmt) ? stmt : undefined);
	return cteNode(name, query ? [adaptQuery(query)] : []);
}

/**
 * A projected column: `{ expr, as }`. A bare column keeps its output alias;
 * any other aliased expression is wrapped so the alias stays off the
 * columns inside it.
 */
function adaptProjection(column: unknown): SyntaxNode {
	if (!isRecord(column) || column.expr === undefined) {
		return adaptExpression(column);
	}
	const alias = identifierText(column.as);
	const expr = column.expr;
	if (isRecord(expr) && expr.type === 'column_ref') {
		return adaptColumnRef(expr, alias);
	}
	const node = adaptExpression(expr);
	return alias === undefined ? node : otherNode('alias', [node]);
}

function adaptJoin(source: unknown): SyntaxNode {
	const children: SyntaxNode[] = [adaptSource(source)];
	const on = isRecord(source) ? source.on : undefined;
	if (on !== undefined && on !== null) {
		children.push(adaptExpression(on));
	}
	return otherNode('join', children);
}

/** The first source goes under `label`; every further one is a join */
function pushSources(children: SyntaxNode[], label: string, sources: unknown[]): void {
	sources.forEach((source, index) => {
		children.push(index === 0 ? otherNode(label, [adaptSource(source)]) : adaptJoin(source));
	});
}

function asArray(value: unknown): unknown[] {
	if (Array.isArray(value)) {
		return value;
	}
	return isRecord(value) ? [value] : [];
}

/** A FROM/JOIN entry: a table, a derived table, or something else (dual, table function) */
function adaptSource(source: unknown): SyntaxNode {
	if (!isRecord(source)) {
		return otherNode('source');
	}
	const alias = identifierText(source.as);

	const derived = nestedQuery(source.expr);
	if (derived) {
		return subqueryRefNode(alias, [adaptQuery(derived)]);
	}

	const table = identifierText(source.table);
	if (table !== undefined) {
		return tableRefNode(table, alias, identifierText(source.db));
	}

	return adaptGeneric(source);
}

function adaptColumnRef(ref: AstRecord, alias?: string): SyntaxNode {
	const name = identifierText(ref.column) ?? '';
	const table = identifierText(ref.table);
	// A bare `*` is not a column; `t.*` is
	if (name === '*' && !table) {
		return otherNode('star');
	}
	return columnRefNode(name, table || undefined, alias);
}

function groupByItems(groupby: unknown): unknown {
	// `{ columns, modifiers }` in newer node-sql-parser releases, a plain list in older ones
	return isRecord(groupby) && Array.isArray(groupby.columns) ? groupby.columns : groupby;
}

function pushClause(children: SyntaxNode[], label: string, value: unknown): void {
	if (value === undefined || value === null) {
		return;
	}
	const items = Array.isArray(value) ? value : [value];
	children.push(otherNode(label, items.map(adaptExpression)));
}

export function adaptExpression(value: unknown): SyntaxNode {
	if (Array.isArray(value)) {
		return otherNode('list', value.map(adaptExpression));
	}
	if (!isRecord(value)) {
		return otherNode('literal');
	}
	if (value.type === 'column_ref') {
		return adaptColumnRef(value);
	}
	const query = nestedQuery(value);
	if (query) {
		return otherNode('subquery', [adaptQuery(query)]);
	}
	if (isStatement(value)) {
		return adaptQuery(value);
	}
	return adaptGeneric(value);
}

/**
 * Anything without a dedicated shape: walk its properties in order.
 * Arrays and untyped wrapper objects (`{ expr }`, `{ columns }`) are
 * flattened into the parent so they add no depth.
 * Statement-level `table`/`from` lists are read as sources, and the
 * `SET` list of an UPDATE as target columns.
 */
function adaptGeneric(value: AstRecord): SyntaxNode {
	const label = typeof value.type === 'string' ? value.type : 'node';
	const children: SyntaxNode[] = [];
	for (const [key, child] of Object.entries(value)) {
		if (IGNORED_KEYS.has(key) || child === null || typeof child !== 'object') {
			continue;
		}
		if ((key === 'table' || key === 'from') && isStatement(value) && Array.isArray(child)) {
			pushSources(children, key, child);
			continue;
		}
		if (key === 'set' && value.type === 'update' && Array.isArray(child)) {
			children.push(...child.flatMap(adaptAssignment));
			continue;
		}
		children.push(...flatten(child));
	}
	return otherNode(label, children);
}

/** `SET t.col = value`: `{ column, table, value }`, with no column_ref type */
function adaptAssignment(item: unknown): SyntaxNode[] {
	if (!isRecord(item)) {
		return [];
	}
	const column = identifierText(item.column);
	const target = column === undefined ? [] : [columnRefNode(column, identifierText(item.table) || undefined)];
	return [...target, ...flatten(item.value)];
}

function flatten(value: unknown): SyntaxNode[] {
	if (Array.isArray(value)) {
		return value.flatMap(flatten);
	}
	if (!isRecord(value)) {
		return [];
	}
	if (typeof value.type !== 'string' && !nestedQuery(value)) {
		return adaptGeneric(value).children.slice();
	}
	return [adaptExpression(value)];
}
