import { createEnumCodec } from '../wire/enum-codec.js';
import type { ReadBuffer, WriteBuffer } from '../wire/buffer.js';

/** Distributed execution mode of a join. */
export enum JoinLocality {
	/** Chosen by the optimizer from cluster topology */
	Unspecified = 0,
	/** Join using only data available on the same servers (co-located data). */
	Local = 1,
	/** Collect and merge data from remote servers, then broadcast it to each server. */
	Global = 2,
}

export const joinLocalityCodec = createEnumCodec('JoinLocality', [
	JoinLocality.Unspecified,
	JoinLocality.Local,
	JoinLocality.Global,
]);

const JOIN_LOCALITY_NAMES: Readonly<Record<JoinLocality, string>> = {
	[JoinLocality.Unspecified]: 'UNSPECIFIED',
	[JoinLocality.Local]: 'LOCAL',
	[JoinLocality.Global]: 'GLOBAL',
};

export function joinLocalityToString(locality: JoinLocality): string {
	return JOIN_LOCALITY_NAMES[locality];
}

export function serializeJoinLocality(locality: JoinLocality, out: WriteBuffer): void {
	joinLocalityCodec.serialize(locality, out);
}

export function deserializeJoinLocality(input: ReadBuffer): JoinLocality {
	return joinLocalityCodec.deserialize(input);
}
