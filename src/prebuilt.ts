import {
  ConfigurationConflict,
  NoSuchPrebuiltMap,
  SymbolNotInMap,
} from "./errors";
import { AnyIndexMap, IndexMap, LookupFunctions } from "./index-map";
import { Interval } from "./interval";
import { ElementType, SymbolOf, symbolKind } from "./symbol-kind";

type MapDefinition<K extends ElementType> = {
  intervals: Array<[SymbolOf<K>, SymbolOf<K>]>;
  lookups?: LookupFunctions<K>;
};

const codePointOf = symbolKind("character").toCodePoint;

const asciiIndex = (codePoint: number, symbol: unknown) => {
  if (codePoint > 0xff) throw new SymbolNotInMap(symbol);
  return codePoint;
};

// scalar values are numbered densely, closing the U+D800..U+DFFF gap
const SURROGATE_COUNT = 0x800;

const scalarIndex = (codePoint: number) =>
  codePoint < 0xe000 ? codePoint : codePoint - SURROGATE_COUNT;

const scalarAt = (index: number) =>
  String.fromCodePoint(index < 0xd800 ? index : index + SURROGATE_COUNT);

const characterDefinitions = {
  ascii_lowercase: { intervals: [["a", "z"]] },
  ascii_uppercase: { intervals: [["A", "Z"]] },
  ascii_letters: { intervals: [["a", "z"], ["A", "Z"]] },
  ascii_digits: { intervals: [["0", "9"]] },
  lowercase_hex_digits: { intervals: [["0", "9"], ["a", "f"]] },
  uppercase_hex_digits: { intervals: [["0", "9"], ["A", "F"]] },
  lowercase_base_36: { intervals: [["0", "9"], ["a", "z"]] },
  uppercase_base_36: { intervals: [["0", "9"], ["A", "Z"]] },
  ascii: {
    intervals: [["\x00", "\xff"]],
    lookups: {
      lookupSymbol: (symbol) => asciiIndex(codePointOf(symbol), symbol),
      lookupIndex: (index) => String.fromCharCode(index),
    },
  },
  non_ascii: {
    intervals: [
      ["\u0100", "\ud7ff"],
      ["\ue000", "\u{10ffff}"],
    ],
    lookups: {
      lookupSymbol: (symbol) => scalarIndex(codePointOf(symbol)) - 0x100,
      lookupIndex: (index) => scalarAt(index + 0x100),
    },
  },
  unicode: {
    intervals: [
      ["\x00", "\ud7ff"],
      ["\ue000", "\u{10ffff}"],
    ],
    lookups: {
      lookupSymbol: (symbol) => scalarIndex(codePointOf(symbol)),
      lookupIndex: scalarAt,
    },
  },
} satisfies Record<string, MapDefinition<"character">>;

const byte = (char: string) => char.charCodeAt(0);

const byteDefinitions = {
  ascii_lowercase: { intervals: [[byte("a"), byte("z")]] },
  ascii_uppercase: { intervals: [[byte("A"), byte("Z")]] },
  ascii_letters: {
    intervals: [
      [byte("a"), byte("z")],
      [byte("A"), byte("Z")],
    ],
  },
  ascii_digits: { intervals: [[byte("0"), byte("9")]] },
  lowercase_hex_digits: {
    intervals: [
      [byte("0"), byte("9")],
      [byte("a"), byte("f")],
    ],
  },
  uppercase_hex_digits: {
    intervals: [
      [byte("0"), byte("9")],
      [byte("A"), byte("F")],
    ],
  },
  lowercase_base_36: {
    intervals: [
      [byte("0"), byte("9")],
      [byte("a"), byte("z")],
    ],
  },
  uppercase_base_36: {
    intervals: [
      [byte("0"), byte("9")],
      [byte("A"), byte("Z")],
    ],
  },
  ascii: {
    intervals: [[0x00, 0xff]],
    lookups: {
      lookupSymbol: (symbol) => symbol,
      lookupIndex: (index) => index,
    },
  },
} satisfies Record<string, MapDefinition<"byte">>;

export type CharacterMapName = keyof typeof characterDefinitions;
export type ByteMapName = keyof typeof byteDefinitions;

/**
 * Named maps of one element type. Each map is built on first use
 * and the same instance is returned from then on.
 */
export class PrebuiltMaps<K extends ElementType, Name extends string> {
  private readonly built = new Map<Name, IndexMap<K>>();
  constructor(
    public readonly elementType: K,
    private readonly definitions: Record<Name, MapDefinition<K>>
  ) {}
  names(): Name[] {
    return Object.keys(this.definitions).filter((name): name is Name =>
      this.has(name)
    );
  }
  has(name: string): name is Name {
    return Object.prototype.hasOwnProperty.call(this.definitions, name);
  }
  /** Names are matched case-insensitively. */
  get(name: string): IndexMap<K> {
    const key = name.toLowerCase();
    if (!this.has(key)) throw new NoSuchPrebuiltMap(name);

    const existing = this.built.get(key);
    if (existing) return existing;

    const { intervals, lookups } = this.definitions[key];
    const map = new IndexMap(
      intervals.map(
        ([start, end]) => new Interval(this.elementType, start, end)
      ),
      lookups ?? {}
    );
    this.built.set(key, map);
    return map;
  }
  members(): IndexMap<K>[] {
    return this.names().map((name) => this.get(name));
  }
}

export const characterMaps = new PrebuiltMaps(
  "character",
  characterDefinitions
);
export const byteMaps = new PrebuiltMaps("byte", byteDefinitions);

export function getPrebuiltMap(
  elementType: ElementType,
  name: string
): AnyIndexMap {
  return elementType === "character"
    ? characterMaps.get(name)
    : byteMaps.get(name);
}

/** Accept either a map or the name of a pre-built map of the given type. */
export function resolveMap(
  elementType: "character",
  map: AnyIndexMap | string
): IndexMap<"character">;
export function resolveMap(
  elementType: "byte",
  map: AnyIndexMap | string
): IndexMap<"byte">;
export function resolveMap(
  elementType: ElementType,
  map: AnyIndexMap | string
): AnyIndexMap {
  const resolved =
    typeof map === "string" ? getPrebuiltMap(elementType, map) : map;
  if (resolved.elementType !== elementType) {
    throw new ConfigurationConflict(
      `Expected a ${elementType} map, got a ${resolved.elementType} map`
    );
  }
  return resolved;
}
