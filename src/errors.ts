import { describeValue, showSymbol } from "./util";

export class AlphabetRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotASymbol extends AlphabetRangeError {}

function notACharacterMessage(actual: unknown) {
  if (typeof actual !== "string") {
    return `Expected a character, got ${describeValue(actual)}`;
  }
  const length = Array.from(actual).length;
  return length === 1
    ? `Expected a character, got the surrogate ${showSymbol(actual)}`
    : `Expected a character, got a string of length ${length}`;
}

export class NotACharacter extends NotASymbol {
  constructor(public readonly actual: unknown) {
    super(notACharacterMessage(actual));
  }
}

export class NotAByte extends NotASymbol {
  constructor(public readonly actual: unknown) {
    super(`Expected a single byte, got ${describeValue(actual)}`);
  }
}

export class InvalidDirection extends AlphabetRangeError {
  constructor(start: string, end: string) {
    super(
      `Expected start to be less than or equal to end, got ${start} > ${end}`
    );
  }
}

export class SurrogateCodePoints extends AlphabetRangeError {
  constructor(start: string, end: string) {
    super(
      `Interval ${start}-${end} includes ` +
        `the surrogate code points \\uD800-\\uDFFF`
    );
  }
}

export class NoIntervals extends AlphabetRangeError {
  constructor() {
    super("At least one interval expected");
  }
}

export class ConfigurationConflict extends AlphabetRangeError {}

export class OverlappingIntervals extends AlphabetRangeError {
  constructor() {
    super("Intervals must not overlap");
  }
}

export class IndexOutOfRange extends AlphabetRangeError {
  constructor(public readonly index: unknown, public readonly limit: number) {
    super(`Index ${describeValue(index)} is out of range [0, ${limit})`);
  }
}

export class InvalidIndex extends AlphabetRangeError {
  constructor(public readonly size: number, public readonly actual: unknown) {
    super(
      `Expected lookupSymbol to return an integer ` +
        `in the interval [0, ${size}), got ${describeValue(actual)}`
    );
  }
}

export class InvalidSymbol extends AlphabetRangeError {
  constructor(
    public readonly elementType: string,
    public readonly actual: unknown
  ) {
    super(
      `Expected lookupIndex to return a single ${elementType}, ` +
        `got ${describeValue(actual)}`
    );
  }
}

export class SymbolNotInMap extends AlphabetRangeError {
  constructor(public readonly symbol: unknown) {
    super(`Symbol ${describeValue(symbol)} is not in the map`);
  }
}

export class InvalidEndpoints extends AlphabetRangeError {
  constructor(start: unknown, end: unknown) {
    super(`Invalid endpoints: ${describeValue(start)}, ${describeValue(end)}`);
  }
}

export class EmptyDigitSequence extends AlphabetRangeError {
  constructor() {
    super("List of digits must not be empty");
  }
}

export class InvalidBase extends AlphabetRangeError {
  constructor(public readonly actual: unknown) {
    super(`Expected a positive integer base, got ${describeValue(actual)}`);
  }
}

export class NoSuchPrebuiltMap extends AlphabetRangeError {
  constructor(public readonly mapName: string) {
    super(`No such prebuilt map with given name: "${mapName}"`);
  }
}
