import {
  ConfigurationConflict,
  IndexOutOfRange,
  InvalidIndex,
  InvalidSymbol,
  NoIntervals,
  OverlappingIntervals,
  SymbolNotInMap,
} from "./errors";
import { Interval } from "./interval";
import { Logger, SilentLogger } from "./logger";
import { ElementType, SymbolKind, SymbolOf, symbolKind } from "./symbol-kind";
import { showSymbol } from "./util";

export interface LookupFunctions<K extends ElementType> {
  lookupSymbol(symbol: SymbolOf<K>): number;
  lookupIndex(index: number): SymbolOf<K>;
}

export interface IndexMapOptions<K extends ElementType>
  extends Partial<LookupFunctions<K>> {
  logger?: Logger;
}

// tables this large are usually better served by lookup functions
const LARGE_TABLE = 0x10000;

/**
 * A two-way mapping between the symbols of one or more disjoint
 * intervals and their dense, 0-based indices.
 *
 * Without lookup functions both tables are filled at construction,
 * in interval order. With them, the tables start empty and each
 * lookup result is cached as it is computed.
 */
export class IndexMap<K extends ElementType> {
  readonly elementType: K;
  readonly intervals: readonly Interval<K>[];
  readonly size: number;
  private readonly kind: SymbolKind<K>;
  readonly logger: Logger;
  private readonly searchers: LookupFunctions<K> | null;
  private readonly symbolToIndex = new Map<SymbolOf<K>, number>();
  private readonly indexToSymbol = new Map<number, SymbolOf<K>>();
  constructor(
    intervals: Iterable<Interval<K>>,
    options: IndexMapOptions<K> = {}
  ) {
    const { lookupSymbol, lookupIndex, logger = new SilentLogger() } = options;
    this.intervals = Array.from(intervals);
    this.logger = logger;

    if ((lookupSymbol === undefined) !== (lookupIndex === undefined)) {
      throw new ConfigurationConflict(
        "The two lookup functions must be either both given or both omitted"
      );
    }
    if (this.intervals.length === 0) throw new NoIntervals();

    this.elementType = this.intervals[0].elementType;
    if (this.intervals.some((i) => i.elementType !== this.elementType)) {
      throw new ConfigurationConflict("Intervals must be of same types");
    }
    this.kind = symbolKind(this.elementType);
    this.size = this.intervals.reduce((sum, i) => sum + i.length, 0);

    if (lookupSymbol && lookupIndex) {
      this.searchers = { lookupSymbol, lookupIndex };
      this.assertDisjoint();
    } else {
      this.searchers = null;
      if (this.size > LARGE_TABLE) {
        this.logger.warn("Populating a large lookup table", {
          size: this.size,
        });
      }
      this.populate();
    }

    this.logger.debug("Built index map", {
      elementType: this.elementType,
      intervals: this.intervals.length,
      size: this.size,
      lazy: this.isLazy,
    });
  }
  get isLazy(): boolean {
    return this.searchers !== null;
  }
  /** The lookup functions the map was built with, if any. */
  get lookups(): LookupFunctions<K> | null {
    return this.searchers;
  }
  indexOf(symbol: SymbolOf<K>): number {
    if (!this.kind.isSymbol(symbol)) throw this.kind.notASymbol(symbol);

    const cached = this.symbolToIndex.get(symbol);
    if (cached !== undefined) return cached;
    if (!this.searchers) throw new SymbolNotInMap(symbol);

    const index: unknown = this.searchers.lookupSymbol(symbol);
    if (!this.hasIndex(index)) throw new InvalidIndex(this.size, index);

    this.logger.debug("Cached index for symbol", {
      symbol: showSymbol(symbol),
      index,
    });
    this.symbolToIndex.set(symbol, index);
    return index;
  }
  symbolAt(index: number): SymbolOf<K> {
    if (!this.hasIndex(index)) throw new IndexOutOfRange(index, this.size);

    const cached = this.indexToSymbol.get(index);
    if (cached !== undefined) return cached;
    // an eager table holds every index
    if (!this.searchers) throw new IndexOutOfRange(index, this.size);

    const symbol: unknown = this.searchers.lookupIndex(index);
    if (!this.kind.isSymbol(symbol)) {
      throw new InvalidSymbol(this.elementType, symbol);
    }

    this.logger.debug("Cached symbol for index", {
      index,
      symbol: showSymbol(symbol),
    });
    this.indexToSymbol.set(index, symbol);
    return symbol;
  }
  /**
   * Whether `symbol` resolves to an index. A lazy map asks its
   * `lookupSymbol`, and a lookup that throws or returns a bad index
   * means the symbol is not in the map.
   */
  has(symbol: unknown): boolean {
    if (!this.kind.isSymbol(symbol)) return false;
    if (this.symbolToIndex.has(symbol)) return true;
    if (!this.isLazy || !this.intervals.some((i) => i.has(symbol))) {
      return false;
    }
    try {
      this.indexOf(symbol);
      return true;
    } catch (error) {
      this.logger.debug("Lookup rejected symbol", {
        symbol: showSymbol(symbol),
        error: String(error),
      });
      return false;
    }
  }
  hasIndex(index: unknown): index is number {
    return (
      typeof index === "number" &&
      Number.isInteger(index) &&
      index >= 0 &&
      index < this.size
    );
  }
  equals(other: IndexMap<ElementType>): boolean {
    return (
      other.elementType === this.elementType &&
      other.intervals.length === this.intervals.length &&
      other.intervals.every((interval, i) => interval.equals(this.intervals[i]))
    );
  }
  toString(): string {
    return `IndexMap(${this.intervals.join("")})`;
  }
  private assertDisjoint() {
    const seen: Interval<K>[] = [];
    for (const current of this.intervals) {
      if (seen.some((interval) => current.intersects(interval))) {
        throw new OverlappingIntervals();
      }
      seen.push(current);
    }
  }
  private populate() {
    let index = 0;
    for (const interval of this.intervals) {
      for (const symbol of interval) {
        if (this.symbolToIndex.has(symbol)) throw new OverlappingIntervals();
        this.symbolToIndex.set(symbol, index);
        this.indexToSymbol.set(index, symbol);
        index++;
      }
    }
  }
}

export type AnyIndexMap = IndexMap<"character"> | IndexMap<"byte">;

function sameSearchers<K extends ElementType>(
  left: LookupFunctions<K> | null,
  right: LookupFunctions<K> | null
) {
  if (left === null || right === null) return left === right;
  return (
    left.lookupSymbol === right.lookupSymbol &&
    left.lookupIndex === right.lookupIndex
  );
}

/**
 * Concatenate the intervals of two maps, or of a map and an interval,
 * into a new map. Lookup functions carry over from the map operand(s);
 * two maps must share the same ones.
 */
export function combine<K extends ElementType>(
  left: IndexMap<K> | Interval<K>,
  right: IndexMap<K> | Interval<K>
): IndexMap<K> {
  if (left.elementType !== right.elementType) {
    throw new ConfigurationConflict("Different element types");
  }

  const maps = [left, right].filter(
    (operand): operand is IndexMap<K> => operand instanceof IndexMap
  );
  const [first, second]: (IndexMap<K> | undefined)[] = maps;
  if (first && second && !sameSearchers(first.lookups, second.lookups)) {
    throw new ConfigurationConflict(
      "Maps having different lookup functions cannot be combined"
    );
  }

  const intervalsOf = (operand: IndexMap<K> | Interval<K>) =>
    operand instanceof IndexMap ? operand.intervals : [operand];

  return new IndexMap([...intervalsOf(left), ...intervalsOf(right)], {
    ...(first?.lookups ?? {}),
    logger: first?.logger,
  });
}
