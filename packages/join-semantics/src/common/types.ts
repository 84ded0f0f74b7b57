/**
 * Status codes carried by every JoinSemanticsError.
 * Numbering follows the SQLite result codes the host engine reports.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	PROTOCOL = 15,
	UNSUPPORTED = 30,
}
