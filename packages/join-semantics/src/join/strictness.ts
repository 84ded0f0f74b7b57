import { createEnumCodec } from '../wire/enum-codec.js';
import type { ReadBuffer, WriteBuffer } from '../wire/buffer.js';

/** How multiple matching rows are resolved. */
export enum JoinStrictness {
	/** Resolved later from the planner's default strictness */
	Unspecified = 0,
	/** Old ANY JOIN: if many right rows match, use any one of them. */
	RightAny = 1,
	/** Semi join with any value from the filtering table. For LEFT JOIN, Any and RightAny are the same. */
	Any = 2,
	/** Use every matching row, replicating rows of the other side (the usual JOIN semantics). */
	All = 3,
	/** For the last join column, pick the closest value by the ASOF inequality. */
	Asof = 4,
	/** LEFT or RIGHT. SEMI LEFT keeps left rows whose keys exist on the right; SEMI RIGHT the reverse. */
	Semi = 5,
	/** LEFT or RIGHT. Like SEMI, but keeps rows whose keys do NOT exist on the other side. */
	Anti = 6,
}

export const joinStrictnessCodec = createEnumCodec('JoinStrictness', [
	JoinStrictness.Unspecified,
	JoinStrictness.RightAny,
	JoinStrictness.Any,
	JoinStrictness.All,
	JoinStrictness.Asof,
	JoinStrictness.Semi,
	JoinStrictness.Anti,
]);

const JOIN_STRICTNESS_NAMES: Readonly<Record<JoinStrictness, string>> = {
	[JoinStrictness.Unspecified]: 'UNSPECIFIED',
	[JoinStrictness.RightAny]: 'RIGHT_ANY',
	[JoinStrictness.Any]: 'ANY',
	[JoinStrictness.All]: 'ALL',
	[JoinStrictness.Asof]: 'ASOF',
	[JoinStrictness.Semi]: 'SEMI',
	[JoinStrictness.Anti]: 'ANTI',
};

export function joinStrictnessToString(strictness: JoinStrictness): string {
	return JOIN_STRICTNESS_NAMES[strictness];
}

export function serializeJoinStrictness(strictness: JoinStrictness, out: WriteBuffer): void {
	joinStrictnessCodec.serialize(strictness, out);
}

export function deserializeJoinStrictness(input: ReadBuffer): JoinStrictness {
	return joinStrictnessCodec.deserialize(input);
}
