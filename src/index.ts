export { PositionalCounter } from "./counter";
export {
  AlphabetRangeError,
  ConfigurationConflict,
  EmptyDigitSequence,
  IndexOutOfRange,
  InvalidBase,
  InvalidDirection,
  InvalidEndpoints,
  InvalidIndex,
  InvalidSymbol,
  NoIntervals,
  NoSuchPrebuiltMap,
  NotAByte,
  NotACharacter,
  NotASymbol,
  OverlappingIntervals,
  SurrogateCodePoints,
  SymbolNotInMap,
} from "./errors";
export { IndexMap, combine } from "./index-map";
export type {
  AnyIndexMap,
  IndexMapOptions,
  LookupFunctions,
} from "./index-map";
export { ByteInterval, CharacterInterval, Interval } from "./interval";
export { ConsoleLogger, SilentLogger } from "./logger";
export type { LogLevel, Logger } from "./logger";
export {
  PrebuiltMaps,
  byteMaps,
  characterMaps,
  getPrebuiltMap,
  resolveMap,
} from "./prebuilt";
export type { ByteMapName, CharacterMapName } from "./prebuilt";
export { BytesRange, StringRange, SymbolRange, characterRange } from "./range";
export type { RangeType } from "./range";
export { symbolKind } from "./symbol-kind";
export type {
  ElementType,
  SequenceOf,
  SymbolKind,
  SymbolOf,
} from "./symbol-kind";
export { showSequence, showSymbol } from "./util";
