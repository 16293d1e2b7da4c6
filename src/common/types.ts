/**
 * Standard status/error codes, numbered as in SQLite.
 * Carried by every error this package raises.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	MISUSE = 21,
	FORMAT = 24,
	SYNTAX = 29,
}
