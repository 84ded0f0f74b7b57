import { StatusCode } from './types.js';

/**
 * Base class for join semantics errors
 * Provides status code support
 */
export class JoinSemanticsError extends Error {
	public code: number;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message, cause ? { cause } : undefined);
		this.code = code;
		this.name = 'JoinSemanticsError';

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, JoinSemanticsError);
		}
	}
}

/**
 * Raised when a plan fragment carries a byte that does not decode to a known variant,
 * or ends before a field could be read. Usually means the peers speak different protocol versions.
 */
export class WireFormatError extends JoinSemanticsError {
	/** Enumeration being decoded */
	public readonly enumName: string;
	/** Offending byte; undefined when the buffer ran out */
	public readonly value?: number;

	constructor(enumName: string, value?: number) {
		super(
			value === undefined
				? `Unexpected end of buffer while reading ${enumName}`
				: `Bad ${enumName} value: ${value}`,
			StatusCode.PROTOCOL
		);
		this.name = 'WireFormatError';
		this.enumName = enumName;
		this.value = value;
		Object.setPrototypeOf(this, WireFormatError.prototype);
	}
}

/**
 * Helper function to throw a JoinSemanticsError
 * @returns Never (always throws)
 */
export function joinSemanticsError(
	message: string,
	code: StatusCode = StatusCode.ERROR,
	cause?: Error
): never {
	throw new JoinSemanticsError(message, code, cause);
}
