import { createEnumCodec } from '../wire/enum-codec.js';
import type { ReadBuffer, WriteBuffer } from '../wire/buffer.js';

/** Which join operand a column or condition belongs to. */
export enum JoinTableSide {
	Left = 0,
	Right = 1,
}

export const joinTableSideCodec = createEnumCodec('JoinTableSide', [
	JoinTableSide.Left,
	JoinTableSide.Right,
]);

const JOIN_TABLE_SIDE_NAMES: Readonly<Record<JoinTableSide, string>> = {
	[JoinTableSide.Left]: 'LEFT',
	[JoinTableSide.Right]: 'RIGHT',
};

export function joinTableSideToString(side: JoinTableSide): string {
	return JOIN_TABLE_SIDE_NAMES[side];
}

export function oppositeSide(side: JoinTableSide): JoinTableSide {
	return side === JoinTableSide.Left ? JoinTableSide.Right : JoinTableSide.Left;
}

/** Side a tagged column lands on once the operands have (or have not) been swapped */
export function joinTableSideOf(side: JoinTableSide, swapped: boolean): JoinTableSide {
	return swapped ? oppositeSide(side) : side;
}

export function serializeJoinTableSide(side: JoinTableSide, out: WriteBuffer): void {
	joinTableSideCodec.serialize(side, out);
}

export function deserializeJoinTableSide(input: ReadBuffer): JoinTableSide {
	return joinTableSideCodec.deserialize(input);
}
