import { createEnumCodec } from '../wire/enum-codec.js';
import type { ReadBuffer, WriteBuffer } from '../wire/buffer.js';
import { joinSemanticsError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';

/** Defines which side of the JOIN is preserved in the result. */
export enum JoinKind {
	/** Keep only joined rows. */
	Inner = 0,
	/** Keep all rows from the left table; fill with defaults for the right table where nothing matches. */
	Left = 1,
	/** Keep all rows from the right table; fill with defaults for the left table where nothing matches. */
	Right = 2,
	/** Keep all rows from both tables; fill with defaults where nothing matches. */
	Full = 3,
	/** Direct product. Strictness and condition don't matter. */
	Cross = 4,
	/** Same as a direct product, meant to become an INNER JOIN with conditions taken from WHERE. */
	Comma = 5,
	/** Stack columns from the left and right tables side by side. */
	Paste = 6,
}

export const joinKindCodec = createEnumCodec('JoinKind', [
	JoinKind.Inner,
	JoinKind.Left,
	JoinKind.Right,
	JoinKind.Full,
	JoinKind.Cross,
	JoinKind.Comma,
	JoinKind.Paste,
]);

const JOIN_KIND_NAMES: Readonly<Record<JoinKind, string>> = {
	[JoinKind.Inner]: 'INNER',
	[JoinKind.Left]: 'LEFT',
	[JoinKind.Right]: 'RIGHT',
	[JoinKind.Full]: 'FULL',
	[JoinKind.Cross]: 'CROSS',
	[JoinKind.Comma]: 'COMMA',
	[JoinKind.Paste]: 'PASTE',
};

export function joinKindToString(kind: JoinKind): string {
	return JOIN_KIND_NAMES[kind];
}

export function serializeJoinKind(kind: JoinKind, out: WriteBuffer): void {
	joinKindCodec.serialize(kind, out);
}

export function deserializeJoinKind(input: ReadBuffer): JoinKind {
	return joinKindCodec.deserialize(input);
}

export function isLeft(kind: JoinKind): boolean { return kind === JoinKind.Left; }
export function isRight(kind: JoinKind): boolean { return kind === JoinKind.Right; }
export function isInner(kind: JoinKind): boolean { return kind === JoinKind.Inner; }
export function isFull(kind: JoinKind): boolean { return kind === JoinKind.Full; }
/** Kinds that may pad unmatched rows with default values */
export function isOuter(kind: JoinKind): boolean { return kind === JoinKind.Left || kind === JoinKind.Right || kind === JoinKind.Full; }
/** Kinds that ignore join condition and strictness */
export function isCrossOrComma(kind: JoinKind): boolean { return kind === JoinKind.Comma || kind === JoinKind.Cross; }
export function isRightOrFull(kind: JoinKind): boolean { return kind === JoinKind.Right || kind === JoinKind.Full; }
export function isLeftOrFull(kind: JoinKind): boolean { return kind === JoinKind.Left || kind === JoinKind.Full; }
export function isInnerOrRight(kind: JoinKind): boolean { return kind === JoinKind.Inner || kind === JoinKind.Right; }
export function isInnerOrLeft(kind: JoinKind): boolean { return kind === JoinKind.Inner || kind === JoinKind.Left; }
export function isPaste(kind: JoinKind): boolean { return kind === JoinKind.Paste; }

/**
 * Re-expresses a join kind after the left and right operands trade places.
 * LEFT and RIGHT swap; every other kind is symmetric.
 */
export function reverseJoinKind(kind: JoinKind): JoinKind {
	switch (kind) {
		case JoinKind.Left:
			return JoinKind.Right;
		case JoinKind.Right:
			return JoinKind.Left;
		case JoinKind.Inner:
		case JoinKind.Full:
		case JoinKind.Cross:
		case JoinKind.Comma:
		case JoinKind.Paste:
			return kind;
		default: {
			const exhaustiveCheck: never = kind;
			return joinSemanticsError(`Unhandled join kind: ${exhaustiveCheck}`, StatusCode.INTERNAL);
		}
	}
}
