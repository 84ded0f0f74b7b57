import { createLogger } from '../common/logger.js';
import { joinSemanticsError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import type { ReadBuffer, WriteBuffer } from '../wire/buffer.js';
import { JoinKind, isCrossOrComma, isPaste, joinKindCodec, joinKindToString, reverseJoinKind } from './kind.js';
import { JoinStrictness, joinStrictnessCodec } from './strictness.js';
import { JoinLocality, joinLocalityCodec } from './locality.js';
import { ASOFJoinInequality, asofJoinInequalityCodec, reverseASOFJoinInequality } from './asof-inequality.js';

const log = createLogger('planner:swap');

/**
 * Logical properties of a join, as carried inside a distributed plan fragment.
 */
export interface JoinSemantics {
	readonly kind: JoinKind;
	readonly strictness: JoinStrictness;
	readonly locality: JoinLocality;
	readonly asofInequality: ASOFJoinInequality;
}

export function joinSemantics(kind: JoinKind, strictness: JoinStrictness = JoinStrictness.Unspecified, locality: JoinLocality = JoinLocality.Unspecified, asofInequality: ASOFJoinInequality = ASOFJoinInequality.None): JoinSemantics {
	return { kind, strictness, locality, asofInequality };
}

/** Writes kind, strictness, locality and inequality, one byte each. */
export function serializeJoinSemantics(semantics: JoinSemantics, out: WriteBuffer): void {
	joinKindCodec.serialize(semantics.kind, out);
	joinStrictnessCodec.serialize(semantics.strictness, out);
	joinLocalityCodec.serialize(semantics.locality, out);
	asofJoinInequalityCodec.serialize(semantics.asofInequality, out);
}

export function deserializeJoinSemantics(input: ReadBuffer): JoinSemantics {
	const kind = joinKindCodec.deserialize(input);
	const strictness = joinStrictnessCodec.deserialize(input);
	const locality = joinLocalityCodec.deserialize(input);
	const asofInequality = asofJoinInequalityCodec.deserialize(input);
	return { kind, strictness, locality, asofInequality };
}

/**
 * The same join seen after its operands are swapped.
 * Strictness and locality do not depend on operand order.
 */
export function reverseJoinSemantics(semantics: JoinSemantics): JoinSemantics {
	const reversed: JoinSemantics = {
		...semantics,
		kind: reverseJoinKind(semantics.kind),
		asofInequality: reverseASOFJoinInequality(semantics.asofInequality),
	};
	log('Swapped operands: %s JOIN -> %s JOIN', joinKindToString(semantics.kind), joinKindToString(reversed.kind));
	return reversed;
}

function strictnessKeyword(strictness: JoinStrictness): string | undefined {
	switch (strictness) {
		case JoinStrictness.Unspecified: return undefined;
		case JoinStrictness.RightAny:
		case JoinStrictness.Any: return 'ANY';
		case JoinStrictness.All: return 'ALL';
		case JoinStrictness.Asof: return 'ASOF';
		case JoinStrictness.Semi: return 'SEMI';
		case JoinStrictness.Anti: return 'ANTI';
		default: {
			const exhaustiveCheck: never = strictness;
			return joinSemanticsError(`Unhandled join strictness: ${exhaustiveCheck}`, StatusCode.INTERNAL);
		}
	}
}

/**
 * Keyword form for plan explanation, e.g. `GLOBAL LEFT ASOF JOIN`.
 */
export function describeJoin(semantics: JoinSemantics): string {
	const parts: string[] = [];
	if (semantics.locality === JoinLocality.Global) {
		parts.push('GLOBAL');
	}
	parts.push(joinKindToString(semantics.kind));
	// Strictness means nothing for products and PASTE
	const strictness = isCrossOrComma(semantics.kind) || isPaste(semantics.kind)
		? undefined
		: strictnessKeyword(semantics.strictness);
	if (strictness) {
		parts.push(strictness);
	}
	parts.push('JOIN');
	return parts.join(' ');
}
