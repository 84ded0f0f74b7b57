// Join value types
export {
	JoinKind, joinKindCodec, joinKindToString, serializeJoinKind, deserializeJoinKind,
	isLeft, isRight, isInner, isFull, isOuter, isCrossOrComma, isRightOrFull, isLeftOrFull,
	isInnerOrRight, isInnerOrLeft, isPaste, reverseJoinKind
} from './join/kind.js';
export {
	JoinStrictness, joinStrictnessCodec, joinStrictnessToString, serializeJoinStrictness, deserializeJoinStrictness
} from './join/strictness.js';
export {
	JoinLocality, joinLocalityCodec, joinLocalityToString, serializeJoinLocality, deserializeJoinLocality
} from './join/locality.js';
export {
	ASOFJoinInequality, asofJoinInequalityCodec, asofJoinInequalityToString, getASOFJoinInequality,
	reverseASOFJoinInequality, serializeASOFJoinInequality, deserializeASOFJoinInequality
} from './join/asof-inequality.js';
export {
	JoinAlgorithm, joinAlgorithmCodec, joinAlgorithmToString, joinAlgorithmSettingName,
	parseJoinAlgorithm, parseJoinAlgorithms, expandJoinAlgorithms, serializeJoinAlgorithm, deserializeJoinAlgorithm
} from './join/algorithm.js';
export {
	JoinTableSide, joinTableSideCodec, joinTableSideToString, oppositeSide, joinTableSideOf,
	serializeJoinTableSide, deserializeJoinTableSide
} from './join/table-side.js';
export {
	joinSemantics, serializeJoinSemantics, deserializeJoinSemantics, reverseJoinSemantics, describeJoin
} from './join/semantics.js';
export type { JoinSemantics } from './join/semantics.js';

// Planner support
export { resolveJoinAlgorithms, resolveJoinStrictness, validateJoinSemantics } from './core/join-planning.js';
export {
	JoinOptionsManager, createJoinOptions, JOIN_ALGORITHM_OPTION, JOIN_DEFAULT_STRICTNESS_OPTION
} from './core/join-options.js';
export type { OptionValue, OptionDefinition, OptionChangeEvent, OptionChangeListener } from './core/join-options.js';

// Wire
export { ByteWriter, ByteReader } from './wire/buffer.js';
export type { ReadBuffer, WriteBuffer } from './wire/buffer.js';
export { createEnumCodec } from './wire/enum-codec.js';
export type { EnumCodec } from './wire/enum-codec.js';

// Errors and logging
export { StatusCode } from './common/types.js';
export { JoinSemanticsError, WireFormatError, joinSemanticsError } from './common/errors.js';
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';
