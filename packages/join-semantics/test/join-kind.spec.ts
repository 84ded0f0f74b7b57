/* eslint-disable @typescript-eslint/no-unused-expressions */
import { expect } from 'chai';
import { JoinSemanticsError } from '../src/common/errors.js';
import { StatusCode } from '../src/common/types.js';
import {
	JoinKind, joinKindCodec, isLeft, isRight, isInner, isFull, isOuter, isCrossOrComma,
	isRightOrFull, isLeftOrFull, isInnerOrRight, isInnerOrLeft, isPaste, reverseJoinKind
} from '../src/join/kind.js';

const ALL_KINDS = joinKindCodec.variants;

describe('JoinKind', () => {
	it('lists all seven kinds in declaration order', () => {
		expect(ALL_KINDS).to.deep.equal([
			JoinKind.Inner, JoinKind.Left, JoinKind.Right, JoinKind.Full,
			JoinKind.Cross, JoinKind.Comma, JoinKind.Paste,
		]);
	});

	describe('predicates', () => {
		it('should test single kinds', () => {
			expect(ALL_KINDS.filter(isLeft)).to.deep.equal([JoinKind.Left]);
			expect(ALL_KINDS.filter(isRight)).to.deep.equal([JoinKind.Right]);
			expect(ALL_KINDS.filter(isInner)).to.deep.equal([JoinKind.Inner]);
			expect(ALL_KINDS.filter(isFull)).to.deep.equal([JoinKind.Full]);
			expect(ALL_KINDS.filter(isPaste)).to.deep.equal([JoinKind.Paste]);
		});

		it('should classify outer kinds', () => {
			expect(ALL_KINDS.filter(isOuter)).to.deep.equal([JoinKind.Left, JoinKind.Right, JoinKind.Full]);
		});

		it('should classify products', () => {
			expect(isCrossOrComma(JoinKind.Cross)).to.be.true;
			expect(isCrossOrComma(JoinKind.Comma)).to.be.true;
			expect(ALL_KINDS.filter(isCrossOrComma)).to.have.length(2);
		});

		it('should pick the padded and droppable sides', () => {
			expect(ALL_KINDS.filter(isRightOrFull)).to.deep.equal([JoinKind.Right, JoinKind.Full]);
			expect(ALL_KINDS.filter(isLeftOrFull)).to.deep.equal([JoinKind.Left, JoinKind.Full]);
			expect(ALL_KINDS.filter(isInnerOrRight)).to.deep.equal([JoinKind.Inner, JoinKind.Right]);
			expect(ALL_KINDS.filter(isInnerOrLeft)).to.deep.equal([JoinKind.Inner, JoinKind.Left]);
		});

		it('should stay mutually consistent for every kind', () => {
			for (const kind of ALL_KINDS) {
				expect(isOuter(kind)).to.equal(isLeftOrFull(kind) || isRight(kind));
				if (isOuter(kind)) {
					expect(isInner(kind)).to.be.false;
					expect(isCrossOrComma(kind)).to.be.false;
				}
				expect(isInnerOrLeft(kind)).to.equal(isInner(kind) || isLeft(kind));
				expect(isRightOrFull(kind)).to.equal(isRight(kind) || isFull(kind));
			}
		});
	});

	describe('reverseJoinKind', () => {
		it('should swap LEFT and RIGHT', () => {
			expect(reverseJoinKind(JoinKind.Left)).to.equal(JoinKind.Right);
			expect(reverseJoinKind(JoinKind.Right)).to.equal(JoinKind.Left);
		});

		it('should keep symmetric kinds', () => {
			for (const kind of [JoinKind.Inner, JoinKind.Full, JoinKind.Cross, JoinKind.Comma, JoinKind.Paste]) {
				expect(reverseJoinKind(kind)).to.equal(kind);
			}
		});

		it('should report a kind outside the enumeration as an internal error', () => {
			const unknownKind: number = 9;
			try {
				reverseJoinKind(unknownKind);
				expect.fail('Expected reverseJoinKind to throw');
			} catch (error) {
				expect(error).to.be.instanceOf(JoinSemanticsError);
				if (error instanceof JoinSemanticsError) {
					expect(error.code).to.equal(StatusCode.INTERNAL);
					expect(error.message).to.equal('Unhandled join kind: 9');
				}
			}
		});

		it('should be its own inverse', () => {
			for (const kind of ALL_KINDS) {
				expect(reverseJoinKind(reverseJoinKind(kind))).to.equal(kind);
			}
		});
	});
});
