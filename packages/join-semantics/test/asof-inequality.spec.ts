import { expect } from 'chai';
import { JoinSemanticsError } from '../src/common/errors.js';
import {
	ASOFJoinInequality, asofJoinInequalityCodec, getASOFJoinInequality, reverseASOFJoinInequality
} from '../src/join/asof-inequality.js';

describe('ASOFJoinInequality', () => {
	describe('getASOFJoinInequality', () => {
		it('should recognize the four comparison functions', () => {
			expect(getASOFJoinInequality('less')).to.equal(ASOFJoinInequality.Less);
			expect(getASOFJoinInequality('greater')).to.equal(ASOFJoinInequality.Greater);
			expect(getASOFJoinInequality('lessOrEquals')).to.equal(ASOFJoinInequality.LessOrEquals);
			expect(getASOFJoinInequality('greaterOrEquals')).to.equal(ASOFJoinInequality.GreaterOrEquals);
		});

		it('should return None for anything else', () => {
			expect(getASOFJoinInequality('equals')).to.equal(ASOFJoinInequality.None);
			expect(getASOFJoinInequality('')).to.equal(ASOFJoinInequality.None);
			expect(getASOFJoinInequality('notEquals')).to.equal(ASOFJoinInequality.None);
		});

		it('should match case-sensitively', () => {
			expect(getASOFJoinInequality('Less')).to.equal(ASOFJoinInequality.None);
			expect(getASOFJoinInequality('lessorequals')).to.equal(ASOFJoinInequality.None);
			expect(getASOFJoinInequality(' less')).to.equal(ASOFJoinInequality.None);
		});
	});

	describe('reverseASOFJoinInequality', () => {
		it('should mirror each comparison', () => {
			expect(reverseASOFJoinInequality(ASOFJoinInequality.Less)).to.equal(ASOFJoinInequality.Greater);
			expect(reverseASOFJoinInequality(ASOFJoinInequality.Greater)).to.equal(ASOFJoinInequality.Less);
			expect(reverseASOFJoinInequality(ASOFJoinInequality.LessOrEquals)).to.equal(ASOFJoinInequality.GreaterOrEquals);
			expect(reverseASOFJoinInequality(ASOFJoinInequality.GreaterOrEquals)).to.equal(ASOFJoinInequality.LessOrEquals);
			expect(reverseASOFJoinInequality(ASOFJoinInequality.None)).to.equal(ASOFJoinInequality.None);
		});

		it('should report an inequality outside the enumeration', () => {
			const unknownInequality: number = 7;
			expect(() => reverseASOFJoinInequality(unknownInequality))
				.to.throw(JoinSemanticsError, 'Unhandled ASOF inequality: 7');
		});

		it('should be its own inverse', () => {
			for (const inequality of asofJoinInequalityCodec.variants) {
				expect(reverseASOFJoinInequality(reverseASOFJoinInequality(inequality))).to.equal(inequality);
			}
		});
	});
});
