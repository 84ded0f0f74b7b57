import { createLogger } from '../common/logger.js';
import { joinSemanticsError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { JoinKind, isCrossOrComma, isPaste, joinKindToString } from '../join/kind.js';
import { JoinStrictness, joinStrictnessToString } from '../join/strictness.js';
import { ASOFJoinInequality, asofJoinInequalityToString } from '../join/asof-inequality.js';
import { type JoinAlgorithm, expandJoinAlgorithms, parseJoinAlgorithms } from '../join/algorithm.js';
import type { JoinSemantics } from '../join/semantics.js';
import { JOIN_ALGORITHM_OPTION, JOIN_DEFAULT_STRICTNESS_OPTION, type JoinOptionsManager } from './join-options.js';

const log = createLogger('planner');

function ignoresStrictness(kind: JoinKind): boolean {
	return isCrossOrComma(kind) || isPaste(kind);
}

/**
 * Algorithms to try, in order, with Default expanded.
 */
export function resolveJoinAlgorithms(options: JoinOptionsManager): JoinAlgorithm[] {
	return expandJoinAlgorithms(parseJoinAlgorithms(options.getOption(JOIN_ALGORITHM_OPTION)));
}

/**
 * Fills in an Unspecified strictness from `join_default_strictness`.
 */
export function resolveJoinStrictness(kind: JoinKind, strictness: JoinStrictness, options: JoinOptionsManager): JoinStrictness {
	if (strictness !== JoinStrictness.Unspecified || ignoresStrictness(kind)) {
		return strictness;
	}

	const configured = options.getOption(JOIN_DEFAULT_STRICTNESS_OPTION).trim().toLowerCase();
	switch (configured) {
		case 'all':
			return JoinStrictness.All;
		case 'any':
			return JoinStrictness.Any;
		default:
			return joinSemanticsError(
				`Expected ANY or ALL in ${joinKindToString(kind)} JOIN, because setting (${JOIN_DEFAULT_STRICTNESS_OPTION}) is empty`,
				StatusCode.ERROR
			);
	}
}

/**
 * Rejects combinations of kind, strictness and ASOF inequality the executor cannot honour.
 */
export function validateJoinSemantics(semantics: JoinSemantics): void {
	const { kind, strictness, asofInequality } = semantics;

	if (ignoresStrictness(kind)) {
		if (strictness !== JoinStrictness.Unspecified) {
			log('Ignoring %s strictness on %s JOIN', joinStrictnessToString(strictness), joinKindToString(kind));
		}
		return;
	}

	if (strictness === JoinStrictness.Asof && kind !== JoinKind.Inner && kind !== JoinKind.Left) {
		joinSemanticsError(`ASOF join is not supported for ${joinKindToString(kind)} JOIN; use INNER or LEFT`, StatusCode.UNSUPPORTED);
	}

	if ((strictness === JoinStrictness.Semi || strictness === JoinStrictness.Anti)
		&& kind !== JoinKind.Left && kind !== JoinKind.Right) {
		joinSemanticsError(`${joinStrictnessToString(strictness)} join requires LEFT or RIGHT, got ${joinKindToString(kind)}`, StatusCode.UNSUPPORTED);
	}

	if (strictness === JoinStrictness.Asof && asofInequality === ASOFJoinInequality.None) {
		joinSemanticsError('ASOF join requires an inequality on its last key', StatusCode.UNSUPPORTED);
	}

	if (strictness !== JoinStrictness.Asof && asofInequality !== ASOFJoinInequality.None) {
		joinSemanticsError(
			`ASOF inequality ${asofJoinInequalityToString(asofInequality)} given for ${joinStrictnessToString(strictness)} join`,
			StatusCode.UNSUPPORTED
		);
	}
}
