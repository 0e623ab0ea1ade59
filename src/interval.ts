import {
  IndexOutOfRange,
  InvalidDirection,
  SurrogateCodePoints,
} from "./errors";
import { ElementType, SymbolKind, SymbolOf, symbolKind } from "./symbol-kind";
import { showSymbol } from "./util";

/**
 * An inclusive, contiguous span of characters or bytes,
 * ordered by code point (or byte value). A character interval
 * may not reach into the surrogate block, so ranges over all of
 * Unicode are built from two intervals on either side of it.
 */
export class Interval<K extends ElementType> implements Iterable<SymbolOf<K>> {
  readonly startCodePoint: number;
  readonly endCodePoint: number;
  private readonly kind: SymbolKind<K>;
  constructor(
    public readonly elementType: K,
    public readonly start: SymbolOf<K>,
    public readonly end: SymbolOf<K>
  ) {
    this.kind = symbolKind(elementType);
    if (!this.kind.isSymbol(start)) throw this.kind.notASymbol(start);
    if (!this.kind.isSymbol(end)) throw this.kind.notASymbol(end);

    this.startCodePoint = this.kind.toCodePoint(start);
    this.endCodePoint = this.kind.toCodePoint(end);
    if (this.startCodePoint > this.endCodePoint) {
      throw new InvalidDirection(showSymbol(start), showSymbol(end));
    }
    const gap = this.kind.surrogates;
    if (gap && this.startCodePoint <= gap[1] && gap[0] <= this.endCodePoint) {
      throw new SurrogateCodePoints(showSymbol(start), showSymbol(end));
    }
  }
  get length(): number {
    return this.endCodePoint - this.startCodePoint + 1;
  }
  has(value: unknown): boolean {
    if (!this.kind.isSymbol(value)) return false;
    const codePoint = this.kind.toCodePoint(value);
    return this.startCodePoint <= codePoint && codePoint <= this.endCodePoint;
  }
  at(index: number): SymbolOf<K> {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new IndexOutOfRange(index, this.length);
    }
    return this.kind.fromCodePoint(this.startCodePoint + index);
  }
  *[Symbol.iterator](): Generator<SymbolOf<K>> {
    for (let cp = this.startCodePoint; cp <= this.endCodePoint; cp++) {
      yield this.kind.fromCodePoint(cp);
    }
  }
  intersects(other: Interval<K>): boolean {
    if (other.elementType !== this.elementType) return false;
    const laterStart = Math.max(this.startCodePoint, other.startCodePoint);
    const earlierEnd = Math.min(this.endCodePoint, other.endCodePoint);
    return laterStart <= earlierEnd;
  }
  equals(other: Interval<ElementType>): boolean {
    return (
      other.elementType === this.elementType &&
      other.startCodePoint === this.startCodePoint &&
      other.endCodePoint === this.endCodePoint
    );
  }
  toString(): string {
    if (this.length === 1) return showSymbol(this.start);
    return `${showSymbol(this.start)}-${showSymbol(this.end)}`;
  }
}

export class CharacterInterval extends Interval<"character"> {
  constructor(start: string, end: string) {
    super("character", start, end);
  }
}

export class ByteInterval extends Interval<"byte"> {
  constructor(start: number, end: number) {
    super("byte", start, end);
  }
}
