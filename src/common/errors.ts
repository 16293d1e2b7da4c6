import { StatusCode } from './types.js';

/**
 * Base class for sqlscope errors
 * Provides location information and status code support
 */
export class SqlscopeError extends Error {
	public code: number;
	public cause?: Error;
	public line?: number;
	public column?: number;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error, line?: number, column?: number) {
		super(message);
		this.code = code;
		this.name = 'SqlscopeError';
		this.cause = cause;
		this.line = line;
		this.column = column;

		// Enhance message with location if available
		if (line !== undefined && column !== undefined) {
			this.message = `${message} (at line ${line}, column ${column})`;
		}

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, SqlscopeError);
		}
	}
}

/**
 * Raised when the SQL parser rejects its input.
 * The parser's own error is kept as `cause`.
 */
export class ParseError extends SqlscopeError {
	constructor(message: string, cause?: Error, line?: number, column?: number) {
		super(message, StatusCode.SYNTAX, cause, line, column);
		this.name = 'ParseError';
		Object.setPrototypeOf(this, ParseError.prototype);
	}
}

/**
 * Raised when extraction is asked to run without a syntax tree
 */
export class ParseUnavailableError extends SqlscopeError {
	constructor(message: string = 'No syntax tree available') {
		super(message, StatusCode.MISUSE);
		this.name = 'ParseUnavailableError';
		Object.setPrototypeOf(this, ParseUnavailableError.prototype);
	}
}

/**
 * Error thrown when the API is used incorrectly
 */
export class MisuseError extends SqlscopeError {
	constructor(message: string = "API misuse") {
		super(message, StatusCode.MISUSE);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}

/**
 * Helper function to throw a SqlscopeError
 * @param message Error message
 * @param code Status code (defaults to ERROR)
 * @param cause Optional underlying error
 * @returns Never (always throws)
 */
export function sqlscopeError(
	message: string,
	code: StatusCode = StatusCode.ERROR,
	cause?: Error,
): never {
	throw new SqlscopeError(message, code, cause);
}
