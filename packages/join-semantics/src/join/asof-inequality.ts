import { createEnumCodec } from '../wire/enum-codec.js';
import type { ReadBuffer, WriteBuffer } from '../wire/buffer.js';
import { joinSemanticsError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';

/** Comparison applied to the last (temporal) key of an ASOF JOIN. */
export enum ASOFJoinInequality {
	/** Not an ASOF predicate */
	None = 0,
	Less = 1,
	Greater = 2,
	LessOrEquals = 3,
	GreaterOrEquals = 4,
}

export const asofJoinInequalityCodec = createEnumCodec('ASOFJoinInequality', [
	ASOFJoinInequality.None,
	ASOFJoinInequality.Less,
	ASOFJoinInequality.Greater,
	ASOFJoinInequality.LessOrEquals,
	ASOFJoinInequality.GreaterOrEquals,
]);

const ASOF_INEQUALITY_NAMES: Readonly<Record<ASOFJoinInequality, string>> = {
	[ASOFJoinInequality.None]: 'NONE',
	[ASOFJoinInequality.Less]: 'LESS',
	[ASOFJoinInequality.Greater]: 'GREATER',
	[ASOFJoinInequality.LessOrEquals]: 'LESS_OR_EQUALS',
	[ASOFJoinInequality.GreaterOrEquals]: 'GREATER_OR_EQUALS',
};

/** Comparison function names, matched exactly */
const INEQUALITY_BY_FUNCTION = new Map<string, ASOFJoinInequality>([
	['less', ASOFJoinInequality.Less],
	['greater', ASOFJoinInequality.Greater],
	['lessOrEquals', ASOFJoinInequality.LessOrEquals],
	['greaterOrEquals', ASOFJoinInequality.GreaterOrEquals],
]);

export function asofJoinInequalityToString(inequality: ASOFJoinInequality): string {
	return ASOF_INEQUALITY_NAMES[inequality];
}

/**
 * Maps a comparison function name to its ASOF inequality.
 * Anything else, including the empty string, is not an ASOF predicate and yields None.
 */
export function getASOFJoinInequality(funcName: string): ASOFJoinInequality {
	return INEQUALITY_BY_FUNCTION.get(funcName) ?? ASOFJoinInequality.None;
}

/**
 * Inequality seen from the other operand, e.g. `t1.ts < t2.ts` becomes `t2.ts > t1.ts`.
 */
export function reverseASOFJoinInequality(inequality: ASOFJoinInequality): ASOFJoinInequality {
	switch (inequality) {
		case ASOFJoinInequality.Less:
			return ASOFJoinInequality.Greater;
		case ASOFJoinInequality.Greater:
			return ASOFJoinInequality.Less;
		case ASOFJoinInequality.LessOrEquals:
			return ASOFJoinInequality.GreaterOrEquals;
		case ASOFJoinInequality.GreaterOrEquals:
			return ASOFJoinInequality.LessOrEquals;
		case ASOFJoinInequality.None:
			return ASOFJoinInequality.None;
		default: {
			const exhaustiveCheck: never = inequality;
			return joinSemanticsError(`Unhandled ASOF inequality: ${exhaustiveCheck}`, StatusCode.INTERNAL);
		}
	}
}

export function serializeASOFJoinInequality(inequality: ASOFJoinInequality, out: WriteBuffer): void {
	asofJoinInequalityCodec.serialize(inequality, out);
}

export function deserializeASOFJoinInequality(input: ReadBuffer): ASOFJoinInequality {
	return asofJoinInequalityCodec.deserialize(input);
}
