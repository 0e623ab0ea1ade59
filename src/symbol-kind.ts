import { NotAByte, NotACharacter, NotASymbol } from "./errors";

export type ElementType = "character" | "byte";

interface SymbolTypes {
  character: string;
  byte: number;
}

interface SequenceTypes {
  character: string;
  byte: Uint8Array;
}

/**
 * A single character (one Unicode scalar value, so never a surrogate)
 * or a single byte (0..255).
 */
export type SymbolOf<K extends ElementType> = SymbolTypes[K];

/** A string of characters, or a byte string. */
export type SequenceOf<K extends ElementType> = SequenceTypes[K];

/**
 * Everything the intervals, maps and ranges need to know about
 * an element type: how to recognize a symbol, how to convert it
 * to and from its code point, and how to take a sequence apart.
 */
export interface SymbolKind<K extends ElementType> {
  readonly elementType: K;
  readonly maxCodePoint: number;
  /** Code points inside `[0, maxCodePoint]` that are not symbols. */
  readonly surrogates: readonly [number, number] | null;
  isSymbol(value: unknown): value is SymbolOf<K>;
  isSequence(value: unknown): value is SequenceOf<K>;
  toCodePoint(symbol: SymbolOf<K>): number;
  fromCodePoint(codePoint: number): SymbolOf<K>;
  split(sequence: SequenceOf<K>): SymbolOf<K>[];
  join(symbols: readonly SymbolOf<K>[]): SequenceOf<K>;
  notASymbol(value: unknown): NotASymbol;
}

const SURROGATES = [0xd800, 0xdfff] as const;

const isSurrogate = (codePoint: number) =>
  SURROGATES[0] <= codePoint && codePoint <= SURROGATES[1];

const characters: SymbolKind<"character"> = {
  elementType: "character",
  maxCodePoint: 0x10ffff,
  surrogates: SURROGATES,
  isSymbol(value): value is string {
    if (typeof value !== "string" || value.length === 0 || value.length > 2) {
      return false;
    }
    const codePoint = value.codePointAt(0);
    return (
      codePoint !== undefined &&
      !isSurrogate(codePoint) &&
      String.fromCodePoint(codePoint) === value
    );
  },
  isSequence(value): value is string {
    return typeof value === "string";
  },
  toCodePoint(symbol) {
    const codePoint = symbol.codePointAt(0);
    if (codePoint === undefined) throw new NotACharacter(symbol);
    return codePoint;
  },
  fromCodePoint(codePoint) {
    return String.fromCodePoint(codePoint);
  },
  // a lone surrogate splits out on its own and then fails isSymbol
  split(sequence) {
    return Array.from(sequence);
  },
  join(symbols) {
    return symbols.join("");
  },
  notASymbol(value) {
    return new NotACharacter(value);
  },
};

const bytes: SymbolKind<"byte"> = {
  elementType: "byte",
  maxCodePoint: 0xff,
  surrogates: null,
  isSymbol(value): value is number {
    return (
      typeof value === "number" &&
      Number.isInteger(value) &&
      value >= 0 &&
      value <= 0xff
    );
  },
  isSequence(value): value is Uint8Array {
    return value instanceof Uint8Array;
  },
  toCodePoint(symbol) {
    return symbol;
  },
  fromCodePoint(codePoint) {
    return codePoint;
  },
  split(sequence) {
    return Array.from(sequence);
  },
  join(symbols) {
    return Uint8Array.from(symbols);
  },
  notASymbol(value) {
    return new NotAByte(value);
  },
};

const symbolKinds: { readonly [K in ElementType]: SymbolKind<K> } = {
  character: characters,
  byte: bytes,
};

export function symbolKind<K extends ElementType>(
  elementType: K
): SymbolKind<K> {
  return symbolKinds[elementType];
}
