import {
  AlphabetRangeError,
  ByteInterval,
  CharacterInterval,
  IndexMap,
  InvalidDirection,
  characterMaps,
  characterRange,
  combine,
} from "./index";
import type { ElementType, LookupFunctions, RangeType } from "./index";

test("public entry", () => {
  const vowels = new IndexMap(
    ["a", "e", "i", "o", "u"].map((v) => new CharacterInterval(v, v))
  );
  expect(Array.from(characterRange("u", "ae", vowels))).toEqual([
    "u",
    "aa",
    "ae",
  ]);

  const alphanumeric = combine(
    characterMaps.get("ascii_digits"),
    new CharacterInterval("a", "z")
  );
  expect(characterRange("9", "a0", alphanumeric).length).toEqual(388n);
});

test("every error shares a base class", () => {
  expect(() => characterRange("b", "a", "ascii_lowercase")).toThrow(
    AlphabetRangeError
  );
  expect(new InvalidDirection("b", "a")).toBeInstanceOf(AlphabetRangeError);
  expect(new InvalidDirection("b", "a")).toBeInstanceOf(Error);
});

test("types come from the public entry", () => {
  const lookups: LookupFunctions<"byte"> = {
    lookupSymbol: (byte) => byte,
    lookupIndex: (index) => index,
  };
  const map = new IndexMap([new ByteInterval(0, 9)], lookups);
  const elementType: ElementType = map.elementType;
  const rangeType: RangeType = "open";
  const range = characterRange(
    Uint8Array.of(1),
    Uint8Array.of(3),
    map,
    rangeType
  );
  expect(elementType).toEqual("byte");
  expect(Array.from(range)).toEqual([Uint8Array.of(2)]);
});
