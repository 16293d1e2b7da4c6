import { expect } from 'chai';
import {
	adaptExpression,
	getSupportedDialects,
	identifierText,
	parse,
	resolveDialect,
	type SyntaxNode,
} from '../../src/parser/index.js';
import { MisuseError, ParseError } from '../../src/common/errors.js';
import { StatusCode } from '../../src/common/types.js';

function labelOf(node: SyntaxNode | undefined): string | undefined {
	return node?.kind === 'other' ? node.label : node?.kind;
}

describe('Parser', () => {

	describe('parse', () => {
		it('should produce a select root for a simple query', () => {
			const tree = parse('SELECT column1 FROM table_name');
			expect(labelOf(tree.root)).to.equal('select');
		});

		it('should accept a trailing semicolon', () => {
			const tree = parse('SELECT column1 FROM table_name;');
			expect(tree.findAll('tableRef').map(t => t.name)).to.deep.equal(['table_name']);
		});

		it('should return an empty tree for blank input', () => {
			expect(parse('').isEmpty).to.be.true;
			expect(parse('  ;\n').isEmpty).to.be.true;
		});

		it('should reject more than one statement', () => {
			expect(() => parse('SELECT a FROM t1; SELECT b FROM t2')).to.throw(MisuseError, /single SQL statement/);
		});

		it('should wrap parser failures in ParseError', () => {
			let caught: unknown;
			try {
				parse('SELEC column1 FROM table_name');
			} catch (error) {
				caught = error;
			}
			expect(caught).to.be.instanceOf(ParseError);
			if (!(caught instanceof ParseError)) return;
			expect(caught.code).to.equal(StatusCode.SYNTAX);
			expect(caught.cause).to.be.instanceOf(Error);
			expect(caught.line).to.equal(1);
		});

		it('should reject an unknown dialect before parsing', () => {
			expect(() => parse('SELECT 1', { dialect: 'NoSuchSql' })).to.throw(MisuseError, 'Unsupported SQL dialect: NoSuchSql');
		});

		it('should parse with another dialect', () => {
			const tree = parse('SELECT o.id FROM orders o', { dialect: 'postgresql' });
			expect(tree.findAll('columnRef').map(c => c.table)).to.deep.equal(['o']);
		});
	});

	describe('dialects', () => {
		it('should resolve dialect names case-insensitively', () => {
			expect(resolveDialect('transactsql')).to.equal('TransactSQL');
			expect(resolveDialect('MySQL')).to.equal('MySQL');
		});

		it('should list MySQL among supported dialects', () => {
			expect(getSupportedDialects()).to.include('MySQL');
		});
	});

	describe('table references', () => {
		it('should read joined tables with their aliases', () => {
			const tree = parse('SELECT a.column1, b.column2 FROM table1 a INNER JOIN table2 b ON a.common_column = b.common_column');
			expect(tree.findAll('tableRef').map(t => [t.name, t.alias])).to.deep.equal([['table1', 'a'], ['table2', 'b']]);
		});

		it('should keep the schema of a qualified table', () => {
			const [table] = parse('SELECT id FROM shop.orders').findAll('tableRef');
			expect(table.name).to.equal('orders');
			expect(table.schema).to.equal('shop');
			expect(table.alias).to.be.undefined;
		});

		it('should read comma-separated sources', () => {
			const tree = parse('SELECT 1 FROM t1, t2');
			expect(tree.findAll('tableRef').map(t => t.name)).to.deep.equal(['t1', 't2']);
		});
	});

	describe('subqueries', () => {
		it('should read a derived table as an aliased subquery reference', () => {
			const tree = parse('SELECT s.total FROM (SELECT SUM(amount) AS total FROM payments) AS s');
			const subqueries = tree.findAll('subqueryRef');
			expect(subqueries.map(s => s.alias)).to.deep.equal(['s']);
			expect(tree.findAll('tableRef').map(t => t.name)).to.deep.equal(['payments']);
		});

		it('should not give a scalar subquery the projection alias', () => {
			const tree = parse('SELECT (SELECT MAX(id) FROM items) AS top_id FROM orders');
			expect(tree.findAll('subqueryRef')).to.deep.equal([]);
			expect(tree.findAll('tableRef').map(t => t.name)).to.deep.equal(['orders', 'items']);
		});
	});

	describe('CTEs', () => {
		it('should read WITH definitions', () => {
			const tree = parse('WITH recent AS (SELECT id FROM orders) SELECT r.id FROM recent r');
			expect(tree.findAll('cte').map(c => c.name)).to.deep.equal(['recent']);
			expect(tree.findAll('tableRef').map(t => [t.name, t.alias])).to.deep.equal([['recent', 'r'], ['orders', undefined]]);
		});
	});

	describe('column references', () => {
		it('should split qualifier and column', () => {
			const [col] = parse('SELECT a.column1 FROM table1 a').findAll('columnRef');
			expect(col.table).to.equal('a');
			expect(col.name).to.equal('column1');
			expect(col.aliasOrName).to.equal('column1');
		});

		it('should keep the output alias of a projected column', () => {
			const [col] = parse('SELECT id AS order_id FROM orders').findAll('columnRef');
			expect(col.name).to.equal('id');
			expect(col.alias).to.equal('order_id');
			expect(col.aliasOrName).to.equal('order_id');
		});

		it('should not carry an expression alias onto the columns inside it', () => {
			const cols = parse('SELECT SUM(column1) AS total FROM table_name').findAll('columnRef');
			expect(cols.map(c => c.aliasOrName)).to.deep.equal(['column1']);
		});

		it('should not treat a bare star as a column', () => {
			expect(parse('SELECT * FROM orders').findAll('columnRef')).to.deep.equal([]);
		});

		it('should treat a qualified star as a column named *', () => {
			const cols = parse('SELECT o.* FROM orders o').findAll('columnRef');
			expect(cols.map(c => [c.table, c.name])).to.deep.equal([['o', '*']]);
		});

		it('should list columns in breadth-first order', () => {
			const tree = parse('SELECT column1, column2, column3 FROM table_name ORDER BY column1 ASC, column2 DESC');
			expect(tree.findAll('columnRef').map(c => c.name)).to.deep.equal(['column1', 'column2', 'column3', 'column1', 'column2']);
		});
	});

	describe('set operations', () => {
		it('should fold a union into one node over both selects', () => {
			const tree = parse('SELECT column1 FROM table1 UNION SELECT column1 FROM table2');
			expect(labelOf(tree.root)).to.equal('union');
			expect(tree.root?.children.map(labelOf)).to.deep.equal(['select', 'select']);
		});

		it('should fold longer chains to the left', () => {
			const tree = parse('SELECT a FROM t1 UNION SELECT a FROM t2 UNION SELECT a FROM t3');
			const root = tree.root;
			expect(labelOf(root)).to.equal('union');
			expect(root?.children.map(labelOf)).to.deep.equal(['union', 'select']);
			expect(tree.findAll('tableRef').map(t => t.name)).to.deep.equal(['t3', 't1', 't2']);
		});
	});

	describe('data modification statements', () => {
		it('should read the target and joined tables of an UPDATE', () => {
			const tree = parse('UPDATE orders o SET o.status = 1 WHERE o.id = 7');
			expect(tree.findAll('tableRef').map(t => [t.name, t.alias])).to.deep.equal([['orders', 'o']]);
			expect(tree.findAll('columnRef').map(c => `${c.table}.${c.name}`)).to.deep.equal(['o.status', 'o.id']);
		});

		it('should read unqualified SET targets as bare columns', () => {
			const cols = parse('UPDATE orders SET status = 2').findAll('columnRef');
			expect(cols.map(c => [c.table, c.name])).to.deep.equal([[undefined, 'status']]);
		});
	});
});

describe('Adapter helpers', () => {
	it('should read identifiers in their different shapes', () => {
		expect(identifierText('plain')).to.equal('plain');
		expect(identifierText({ type: 'default', value: 'wrapped' })).to.equal('wrapped');
		expect(identifierText({ expr: { type: 'backticks_quote_string', value: 'quoted' } })).to.equal('quoted');
		expect(identifierText(null)).to.be.undefined;
		expect(identifierText(42)).to.be.undefined;
	});

	it('should adapt a column reference expression', () => {
		const node = adaptExpression({ type: 'column_ref', table: 't', column: { expr: { type: 'default', value: 'c' } } });
		expect(node).to.deep.equal({ kind: 'columnRef', name: 'c', table: 't', alias: undefined, aliasOrName: 'c', children: [] });
	});

	it('should flatten untyped wrappers into their parent', () => {
		const node = adaptExpression({
			type: 'aggr_func',
			name: 'COUNT',
			args: { expr: { type: 'column_ref', table: null, column: 'column2' } },
		});
		expect(labelOf(node)).to.equal('aggr_func');
		expect(node.children.map(c => c.kind)).to.deep.equal(['columnRef']);
	});

	it('should wrap a nested query as a subquery', () => {
		const node = adaptExpression({ ast: { type: 'select', columns: [], from: [{ db: null, table: 'items', as: null }] } });
		expect(labelOf(node)).to.equal('subquery');
		expect(labelOf(node.children[0])).to.equal('select');
	});
});
