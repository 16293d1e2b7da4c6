// Core extraction
export { extract, extractQualifiers, QualifierColumnExtractor } from './extractor/extractor.js';
export {
	describeSource,
	formatReport,
	sourceKindName,
	toJson,
	toRecords,
} from './extractor/result.js';
export type {
	QualifierEntry,
	QualifierRecord,
	ResultMap,
	SourceKind,
	SourceKindName,
} from './extractor/result.js';

// Parsing
export {
	parse,
	getSupportedDialects,
	resolveDialect,
	DEFAULT_DIALECT,
	SyntaxTree,
	traverseSyntax,
	isKind,
	cteNode,
	tableRefNode,
	subqueryRefNode,
	columnRefNode,
	otherNode,
} from './parser/index.js';
export type {
	ParseOptions,
	SqlDialect,
	SyntaxNode,
	SyntaxKind,
	NodeOfKind,
	CteNode,
	TableRefNode,
	SubqueryRefNode,
	ColumnRefNode,
	OtherNode,
	SyntaxVisitorCallbacks,
	TraversalOrder,
} from './parser/index.js';

// Options
export { ExtractorOptionsManager } from './core/options.js';
export type { ExtractorOptions, OptionDefinition, OptionChangeEvent, OptionChangeListener } from './core/options.js';

// Errors and status codes
export { SqlscopeError, ParseError, ParseUnavailableError, MisuseError, sqlscopeError } from './common/errors.js';
export { StatusCode } from './common/types.js';

// Logging
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';
