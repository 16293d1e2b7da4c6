/**
 * Syntax tree consumed by the qualifier extractor.
 *
 * The tree is a closed set of node variants. Only the four kinds the
 * extractor queries carry fields; everything else is an `other` node that
 * exists to keep the shape (and therefore the traversal order) of the query.
 */

import { traverseSyntax } from './visitor.js';

interface BaseNode {
	readonly children: readonly SyntaxNode[];
}

/** `WITH name AS (...)` */
export interface CteNode extends BaseNode {
	readonly kind: 'cte';
	readonly name: string;
}

/** A table named in FROM/JOIN (or the target of a DML statement) */
export interface TableRefNode extends BaseNode {
	readonly kind: 'tableRef';
	readonly name: string;
	readonly alias?: string;
	readonly schema?: string;
}

/** A derived table: `FROM (SELECT ...) AS alias` */
export interface SubqueryRefNode extends BaseNode {
	readonly kind: 'subqueryRef';
	readonly alias?: string;
}

export interface ColumnRefNode extends BaseNode {
	readonly kind: 'columnRef';
	/** Bare column name */
	readonly name: string;
	/** Qualifier prefix, e.g. `a` in `a.column1` */
	readonly table?: string;
	/** Output alias when the column is projected as `col AS alias` */
	readonly alias?: string;
	readonly aliasOrName: string;
}

export interface OtherNode extends BaseNode {
	readonly kind: 'other';
	/** select, from, join, where, binary, function, union, ... */
	readonly label: string;
}

export type SyntaxNode = CteNode | TableRefNode | SubqueryRefNode | ColumnRefNode | OtherNode;

export type SyntaxKind = SyntaxNode['kind'];

export type NodeOfKind<K extends SyntaxKind> = Extract<SyntaxNode, { kind: K }>;

export function cteNode(name: string, children: readonly SyntaxNode[]): CteNode {
	return { kind: 'cte', name, children };
}

export function tableRefNode(name: string, alias?: string, schema?: string): TableRefNode {
	return { kind: 'tableRef', name, alias, schema, children: [] };
}

export function subqueryRefNode(alias: string | undefined, children: readonly SyntaxNode[]): SubqueryRefNode {
	return { kind: 'subqueryRef', alias, children };
}

export function columnRefNode(name: string, table?: string, alias?: string): ColumnRefNode {
	return { kind: 'columnRef', name, table, alias, aliasOrName: alias ?? name, children: [] };
}

export function otherNode(label: string, children: readonly SyntaxNode[] = []): OtherNode {
	return { kind: 'other', label, children };
}

/**
 * A parsed statement. An empty tree (no root) stands for empty input.
 */
export class SyntaxTree {
	constructor(readonly root: SyntaxNode | undefined) {}

	/**
	 * All nodes of the given kind, breadth-first: the root, then each
	 * depth level from left to right.
	 */
	findAll<K extends SyntaxKind>(kind: K): NodeOfKind<K>[] {
		const found: NodeOfKind<K>[] = [];
		traverseSyntax(this.root, {
			enterNode: node => {
				if (isKind(node, kind)) {
					found.push(node);
				}
			},
		}, 'breadth');
		return found;
	}

	/** Total number of nodes in the tree */
	get size(): number {
		let count = 0;
		traverseSyntax(this.root, { enterNode: () => { count++; } });
		return count;
	}

	get isEmpty(): boolean {
		return this.root === undefined;
	}
}

export function isKind<K extends SyntaxKind>(node: SyntaxNode, kind: K): node is NodeOfKind<K> {
	return node.kind === kind;
}
