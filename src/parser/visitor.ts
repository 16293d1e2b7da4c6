import { createLogger } from '../common/logger.js';
import type { CteNode, TableRefNode, SubqueryRefNode, ColumnRefNode, OtherNode, SyntaxNode } from './syntax.js';

const log = createLogger('parser:visitor');
const warnLog = log.extend('warn');

export type TraversalOrder = 'breadth' | 'depth';

/**
 * Defines the callbacks for the syntax visitor.
 * `enterNode` and the specific visitors can return false to skip the
 * node's children.
 */
export interface SyntaxVisitorCallbacks {
	enterNode?: (node: SyntaxNode) => void | boolean;
	exitNode?: (node: SyntaxNode) => void;
	visitCte?: (node: CteNode) => void | boolean;
	visitTableRef?: (node: TableRefNode) => void | boolean;
	visitSubqueryRef?: (node: SubqueryRefNode) => void | boolean;
	visitColumnRef?: (node: ColumnRefNode) => void | boolean;
	visitOther?: (node: OtherNode) => void | boolean;
}

/**
 * Walks the tree from `root`, calling `enterNode` then the visitor matching
 * the node's kind. Depth-first order also calls `exitNode` once a node's
 * children are done; breadth-first order calls it right after the visit.
 *
 * @param root The starting node. Nothing happens when it is undefined.
 * @param callbacks An object containing visitor functions for different node kinds.
 * @param order Depth-first (default) or breadth-first.
 */
export function traverseSyntax(
	root: SyntaxNode | undefined,
	callbacks: SyntaxVisitorCallbacks,
	order: TraversalOrder = 'depth'
): void {
	if (!root) return;

	if (order === 'depth') {
		visitDepthFirst(root, callbacks);
		return;
	}

	const queue: SyntaxNode[] = [root];
	for (let i = 0; i < queue.length; i++) {
		const node = queue[i];
		const descend = visitNode(node, callbacks);
		callbacks.exitNode?.(node);
		if (descend) {
			queue.push(...node.children);
		}
	}
}

function visitDepthFirst(node: SyntaxNode, callbacks: SyntaxVisitorCallbacks): void {
	if (visitNode(node, callbacks)) {
		for (const child of node.children) {
			visitDepthFirst(child, callbacks);
		}
	}
	callbacks.exitNode?.(node);
}

/** @returns false when the children should be skipped */
function visitNode(node: SyntaxNode, callbacks: SyntaxVisitorCallbacks): boolean {
	if (callbacks.enterNode?.(node) === false) {
		return false;
	}

	let result: void | boolean;
	switch (node.kind) {
		case 'cte':
			result = callbacks.visitCte?.(node);
			break;
		case 'tableRef':
			result = callbacks.visitTableRef?.(node);
			break;
		case 'subqueryRef':
			result = callbacks.visitSubqueryRef?.(node);
			break;
		case 'columnRef':
			result = callbacks.visitColumnRef?.(node);
			break;
		case 'other':
			result = callbacks.visitOther?.(node);
			break;
		default: {
			const unhandled: never = node;
			warnLog('Syntax visitor: unhandled node %O', unhandled);
			return false;
		}
	}
	return result !== false;
}
