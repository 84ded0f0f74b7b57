import { JoinSemanticsError, WireFormatError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { createLogger } from '../common/logger.js';
import type { ReadBuffer, WriteBuffer } from './buffer.js';

const log = createLogger('wire');
const errorLog = log.extend('error');

/**
 * One-byte codec for a closed enumeration whose wire code is its ordinal.
 */
export interface EnumCodec<T extends number> {
	readonly enumName: string;
	/** Variants in declaration order; index == wire code */
	readonly variants: readonly T[];
	encode(value: T): number;
	decode(code: number): T;
	serialize(value: T, out: WriteBuffer): void;
	deserialize(input: ReadBuffer): T;
}

/**
 * Builds the codec for an enumeration.
 * `variants` must list every member in declaration order, so that each member's
 * position equals its numeric value.
 */
export function createEnumCodec<T extends number>(enumName: string, variants: readonly T[]): EnumCodec<T> {
	variants.forEach((variant, index) => {
		if (variant !== index) {
			throw new RangeError(`${enumName} variant at position ${index} has ordinal ${variant}`);
		}
	});

	const decode = (code: number): T => {
		const variant = Number.isInteger(code) ? variants[code] : undefined;
		if (variant === undefined) {
			errorLog('Rejected %s code %d (known codes 0..%d)', enumName, code, variants.length - 1);
			throw new WireFormatError(enumName, code);
		}
		return variant;
	};

	const encode = (value: T): number => {
		if (variants[value] !== value) {
			errorLog('Refused to encode %s value %d', enumName, value);
			throw new JoinSemanticsError(`Cannot encode ${enumName} value: ${value}`, StatusCode.INTERNAL);
		}
		return value;
	};

	return {
		enumName,
		variants,
		encode,
		decode,
		serialize: (value, out) => out.writeUint8(encode(value)),
		deserialize: (input) => decode(input.readUint8(enumName)),
	};
}
