import { createEnumCodec } from '../wire/enum-codec.js';
import type { ReadBuffer, WriteBuffer } from '../wire/buffer.js';
import { StatusCode } from '../common/types.js';
import { joinSemanticsError } from '../common/errors.js';

/** Physical strategy used to execute a join. */
export enum JoinAlgorithm {
	/** Deprecated, equivalent to "direct,hash" */
	Default = 0,
	Auto = 1,
	Hash = 2,
	PartialMerge = 3,
	PreferPartialMerge = 4,
	ParallelHash = 5,
	GraceHash = 6,
	Direct = 7,
	FullSortingMerge = 8,
}

export const joinAlgorithmCodec = createEnumCodec('JoinAlgorithm', [
	JoinAlgorithm.Default,
	JoinAlgorithm.Auto,
	JoinAlgorithm.Hash,
	JoinAlgorithm.PartialMerge,
	JoinAlgorithm.PreferPartialMerge,
	JoinAlgorithm.ParallelHash,
	JoinAlgorithm.GraceHash,
	JoinAlgorithm.Direct,
	JoinAlgorithm.FullSortingMerge,
]);

const JOIN_ALGORITHM_NAMES: Readonly<Record<JoinAlgorithm, string>> = {
	[JoinAlgorithm.Default]: 'DEFAULT',
	[JoinAlgorithm.Auto]: 'AUTO',
	[JoinAlgorithm.Hash]: 'HASH',
	[JoinAlgorithm.PartialMerge]: 'PARTIAL_MERGE',
	[JoinAlgorithm.PreferPartialMerge]: 'PREFER_PARTIAL_MERGE',
	[JoinAlgorithm.ParallelHash]: 'PARALLEL_HASH',
	[JoinAlgorithm.GraceHash]: 'GRACE_HASH',
	[JoinAlgorithm.Direct]: 'DIRECT',
	[JoinAlgorithm.FullSortingMerge]: 'FULL_SORTING_MERGE',
};

const ALGORITHM_BY_SETTING = new Map<string, JoinAlgorithm>(
	joinAlgorithmCodec.variants.map(algorithm => [joinAlgorithmSettingName(algorithm), algorithm])
);

/** Algorithms the deprecated Default stands for, in the order they are tried */
const DEFAULT_EXPANSION: readonly JoinAlgorithm[] = [JoinAlgorithm.Direct, JoinAlgorithm.Hash];

export function joinAlgorithmToString(algorithm: JoinAlgorithm): string {
	return JOIN_ALGORITHM_NAMES[algorithm];
}

/** Lower-case name used by the `join_algorithm` setting, e.g. `partial_merge` */
export function joinAlgorithmSettingName(algorithm: JoinAlgorithm): string {
	return JOIN_ALGORITHM_NAMES[algorithm].toLowerCase();
}

export function parseJoinAlgorithm(name: string): JoinAlgorithm {
	const algorithm = ALGORITHM_BY_SETTING.get(name.trim().toLowerCase());
	if (algorithm === undefined) {
		joinSemanticsError(
			`Unknown join algorithm '${name}'. Expected one of: ${[...ALGORITHM_BY_SETTING.keys()].join(', ')}`,
			StatusCode.ERROR
		);
	}
	return algorithm;
}

/**
 * Parses a comma-separated setting value such as `"direct, hash"`.
 * Empty entries are skipped, but at least one algorithm must remain.
 */
export function parseJoinAlgorithms(list: string): JoinAlgorithm[] {
	const algorithms = list
		.split(',')
		.filter(part => part.trim() !== '')
		.map(parseJoinAlgorithm);
	if (algorithms.length === 0) {
		joinSemanticsError(`Expected at least one join algorithm, got '${list}'`, StatusCode.ERROR);
	}
	return algorithms;
}

/**
 * Replaces Default with the algorithms it stands for and drops repeats,
 * keeping each algorithm at its first position.
 */
export function expandJoinAlgorithms(algorithms: readonly JoinAlgorithm[]): JoinAlgorithm[] {
	const result: JoinAlgorithm[] = [];
	for (const algorithm of algorithms) {
		const expanded = algorithm === JoinAlgorithm.Default ? DEFAULT_EXPANSION : [algorithm];
		for (const candidate of expanded) {
			if (!result.includes(candidate)) {
				result.push(candidate);
			}
		}
	}
	return result;
}

export function serializeJoinAlgorithm(algorithm: JoinAlgorithm, out: WriteBuffer): void {
	joinAlgorithmCodec.serialize(algorithm, out);
}

export function deserializeJoinAlgorithm(input: ReadBuffer): JoinAlgorithm {
	return joinAlgorithmCodec.deserialize(input);
}
