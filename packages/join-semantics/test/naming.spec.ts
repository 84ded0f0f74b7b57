import { expect } from 'chai';
import type { EnumCodec } from '../src/wire/enum-codec.js';
import { joinKindCodec, joinKindToString } from '../src/join/kind.js';
import { joinStrictnessCodec, joinStrictnessToString } from '../src/join/strictness.js';
import { joinLocalityCodec, joinLocalityToString } from '../src/join/locality.js';
import { asofJoinInequalityCodec, asofJoinInequalityToString } from '../src/join/asof-inequality.js';
import { joinAlgorithmCodec, joinAlgorithmToString } from '../src/join/algorithm.js';
import { joinTableSideCodec, joinTableSideToString } from '../src/join/table-side.js';

function expectNames<T extends number>(codec: EnumCodec<T>, toName: (value: T) => string, expected: string[]): void {
	it(`should name every ${codec.enumName} variant`, () => {
		const names = codec.variants.map(toName);
		expect(names).to.deep.equal(expected);
		expect(new Set(names).size).to.equal(names.length);
		for (const name of names) {
			expect(name).to.not.equal('');
		}
	});
}

describe('Variant names', () => {
	expectNames(joinKindCodec, joinKindToString, ['INNER', 'LEFT', 'RIGHT', 'FULL', 'CROSS', 'COMMA', 'PASTE']);
	expectNames(joinStrictnessCodec, joinStrictnessToString, ['UNSPECIFIED', 'RIGHT_ANY', 'ANY', 'ALL', 'ASOF', 'SEMI', 'ANTI']);
	expectNames(joinLocalityCodec, joinLocalityToString, ['UNSPECIFIED', 'LOCAL', 'GLOBAL']);
	expectNames(asofJoinInequalityCodec, asofJoinInequalityToString, ['NONE', 'LESS', 'GREATER', 'LESS_OR_EQUALS', 'GREATER_OR_EQUALS']);
	expectNames(joinAlgorithmCodec, joinAlgorithmToString, [
		'DEFAULT', 'AUTO', 'HASH', 'PARTIAL_MERGE', 'PREFER_PARTIAL_MERGE',
		'PARALLEL_HASH', 'GRACE_HASH', 'DIRECT', 'FULL_SORTING_MERGE',
	]);
	expectNames(joinTableSideCodec, joinTableSideToString, ['LEFT', 'RIGHT']);
});
