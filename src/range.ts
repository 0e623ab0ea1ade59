import { PositionalCounter } from "./counter";
import {
  ConfigurationConflict,
  InvalidDirection,
  InvalidEndpoints,
} from "./errors";
import { AnyIndexMap, IndexMap } from "./index-map";
import { ByteMapName, CharacterMapName, resolveMap } from "./prebuilt";
import {
  ElementType,
  SequenceOf,
  SymbolKind,
  SymbolOf,
  symbolKind,
} from "./symbol-kind";
import { assertUnreachable, describeValue, showSequence } from "./util";

/*
 * Given a range from "aa" to "zz":
 * closed      contains both "aa" and "zz"
 * open        contains neither
 * left_open   contains "zz" only
 * right_open  contains "aa" only
 */
export type RangeType = "closed" | "open" | "left_open" | "right_open";

function excludedEnds(rangeType: RangeType): [boolean, boolean] {
  switch (rangeType) {
    case "closed":
      return [false, false];
    case "open":
      return [true, true];
    case "left_open":
      return [true, false];
    case "right_open":
      return [false, true];
    default:
      return assertUnreachable(rangeType);
  }
}

/**
 * Every string (or byte string) between two endpoints, where each
 * position counts through the symbols of an IndexMap in map order.
 * Shorter strings come before longer ones, so over `ascii_digits`
 * the range "0".."19" runs "0".."9", "00".."09", "10".."19".
 */
export class SymbolRange<K extends ElementType>
  implements Iterable<SequenceOf<K>>
{
  readonly start: SequenceOf<K>;
  readonly end: SequenceOf<K>;
  private readonly kind: SymbolKind<K>;
  private readonly startSymbols: SymbolOf<K>[];
  private readonly endSymbols: SymbolOf<K>[];
  private readonly excludesStart: boolean;
  private readonly excludesEnd: boolean;
  constructor(
    public readonly elementType: K,
    start: SequenceOf<K>,
    end: SequenceOf<K>,
    public readonly map: IndexMap<K>,
    public readonly rangeType: RangeType = "closed"
  ) {
    this.kind = symbolKind(elementType);
    if (map.elementType !== elementType) {
      throw new ConfigurationConflict(
        `Expected a ${elementType} map, got a ${map.elementType} map`
      );
    }

    const startSymbols = this.symbolsOf(start);
    const endSymbols = this.symbolsOf(end);
    if (!startSymbols || !endSymbols) throw new InvalidEndpoints(start, end);

    this.startSymbols = startSymbols;
    this.endSymbols = endSymbols;
    this.start = this.kind.join(startSymbols);
    this.end = this.kind.join(endSymbols);
    const [excludesStart, excludesEnd] = excludedEnds(rangeType);
    this.excludesStart = excludesStart;
    this.excludesEnd = excludesEnd;

    if (this.counterOf(endSymbols).lessThan(this.counterOf(startSymbols))) {
      throw new InvalidDirection(showSequence(start), showSequence(end));
    }
  }
  *[Symbol.iterator](): Generator<SequenceOf<K>> {
    const current = this.counterOf(this.startSymbols);
    const last = this.counterOf(this.endSymbols);
    if (this.excludesStart) current.increment();

    while (
      this.excludesEnd ? current.lessThan(last) : current.lessThanOrEqual(last)
    ) {
      yield this.render(current);
      current.increment();
    }
  }
  /**
   * The number of elements, computed without enumerating them:
   * every string from `start` to the end of its width, every string
   * of each width in between, and every string of `end`'s width up to
   * `end`. Folded together, that is
   *
   *   Σ base^w (|start| <= w < |end|) + int(end) - int(start) + 1
   */
  get length(): bigint {
    const base = BigInt(this.map.size);
    let total = 0n;
    for (let w = this.startSymbols.length; w < this.endSymbols.length; w++) {
      total += base ** BigInt(w);
    }
    total += this.counterOf(this.endSymbols).toInteger();
    total -= this.counterOf(this.startSymbols).toInteger();
    total += 1n;

    if (this.excludesStart) total -= 1n;
    if (this.excludesEnd) total -= 1n;
    return total < 0n ? 0n : total;
  }
  has(value: unknown): boolean {
    if (!this.kind.isSequence(value)) return false;
    const symbols = this.symbolsOf(value);
    if (!symbols) return false;

    const counter = this.counterOf(symbols);
    const first = this.counterOf(this.startSymbols);
    const last = this.counterOf(this.endSymbols);
    const afterStart = this.excludesStart
      ? first.lessThan(counter)
      : first.lessThanOrEqual(counter);
    const beforeEnd = this.excludesEnd
      ? counter.lessThan(last)
      : counter.lessThanOrEqual(last);
    return afterStart && beforeEnd;
  }
  toString(): string {
    const start = showSequence(this.start);
    const end = showSequence(this.end);
    return `${this.constructor.name}(${start}, ${end})`;
  }
  private symbolsOf(value: SequenceOf<K>): SymbolOf<K>[] | null {
    if (!this.kind.isSequence(value)) return null;
    const symbols = this.kind.split(value);
    if (symbols.length === 0) return null;
    return symbols.every((symbol) => this.map.has(symbol)) ? symbols : null;
  }
  private counterOf(symbols: readonly SymbolOf<K>[]): PositionalCounter {
    return new PositionalCounter(
      symbols.map((symbol) => this.map.indexOf(symbol)),
      this.map.size
    );
  }
  private render(counter: PositionalCounter): SequenceOf<K> {
    return this.kind.join(
      counter.digits.map((index) => this.map.symbolAt(index))
    );
  }
}

export class StringRange extends SymbolRange<"character"> {
  constructor(
    start: string,
    end: string,
    map: IndexMap<"character">,
    rangeType?: RangeType
  ) {
    super("character", start, end, map, rangeType);
  }
}

export class BytesRange extends SymbolRange<"byte"> {
  constructor(
    start: Uint8Array,
    end: Uint8Array,
    map: IndexMap<"byte">,
    rangeType?: RangeType
  ) {
    super("byte", start, end, map, rangeType);
  }
}

const typeName = (value: unknown) =>
  value instanceof Uint8Array ? "Uint8Array" : typeof value;

/**
 * Build a range from two strings or two byte arrays. `map` is either
 * an IndexMap of the matching element type or the name of a pre-built
 * one (see `characterMaps` and `byteMaps`).
 */
export function characterRange(
  start: string,
  end: string,
  map: IndexMap<"character"> | CharacterMapName,
  rangeType?: RangeType
): StringRange;
export function characterRange(
  start: Uint8Array,
  end: Uint8Array,
  map: IndexMap<"byte"> | ByteMapName,
  rangeType?: RangeType
): BytesRange;
export function characterRange(
  start: string | Uint8Array,
  end: string | Uint8Array,
  map: AnyIndexMap | string,
  rangeType: RangeType = "closed"
): StringRange | BytesRange {
  if (typeof start === "string" && typeof end === "string") {
    return new StringRange(start, end, resolveMap("character", map), rangeType);
  }
  if (start instanceof Uint8Array && end instanceof Uint8Array) {
    return new BytesRange(start, end, resolveMap("byte", map), rangeType);
  }
  throw new TypeError(
    `Expected two strings or two byte arrays, got ` +
      `${typeName(start)} and ${typeName(end)} (${describeValue(
        start
      )}, ${describeValue(end)})`
  );
}
