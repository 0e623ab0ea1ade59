import { NotAByte, NotACharacter } from "./errors";
import { symbolKind } from "./symbol-kind";

const characters = symbolKind("character");
const bytes = symbolKind("byte");

test("character symbols", () => {
  expect(characters.isSymbol("a")).toBe(true);
  expect(characters.isSymbol("\u{1f600}")).toBe(true);
  expect(characters.isSymbol("\ud7ff")).toBe(true);
  expect(characters.isSymbol("\ue000")).toBe(true);
  expect(characters.isSymbol("")).toBe(false);
  expect(characters.isSymbol("ab")).toBe(false);
  expect(characters.isSymbol("a\u0301")).toBe(false);
  expect(characters.isSymbol(97)).toBe(false);
});

test("byte symbols", () => {
  expect(bytes.isSymbol(0)).toBe(true);
  expect(bytes.isSymbol(255)).toBe(true);
  expect(bytes.isSymbol(256)).toBe(false);
  expect(bytes.isSymbol(-1)).toBe(false);
  expect(bytes.isSymbol(0.5)).toBe(false);
  expect(bytes.isSymbol("a")).toBe(false);
});

test("code points", () => {
  expect(characters.toCodePoint("\u{1f600}")).toEqual(0x1f600);
  expect(characters.fromCodePoint(0x1f600)).toEqual("\u{1f600}");
  expect(bytes.toCodePoint(0x7f)).toEqual(0x7f);
  expect(characters.maxCodePoint).toEqual(0x10ffff);
  expect(bytes.maxCodePoint).toEqual(0xff);
});

test("sequences split by symbol", () => {
  expect(characters.split("a\u{1f600}b")).toEqual(["a", "\u{1f600}", "b"]);
  expect(characters.join(["a", "\u{1f600}"])).toEqual("a\u{1f600}");
  expect(bytes.split(Uint8Array.of(1, 2))).toEqual([1, 2]);
  expect(bytes.join([1, 2])).toEqual(Uint8Array.of(1, 2));
  expect(characters.isSequence("")).toBe(true);
  expect(bytes.isSequence(Buffer.from("ab"))).toBe(true);
  expect(bytes.isSequence([1, 2])).toBe(false);
});

test("errors", () => {
  expect(characters.notASymbol("ab")).toBeInstanceOf(NotACharacter);
  expect(bytes.notASymbol(300)).toBeInstanceOf(NotAByte);
  expect(bytes.notASymbol(300).name).toEqual("NotAByte");
});

test("surrogates are not characters", () => {
  expect(characters.isSymbol("\ud800")).toBe(false);
  expect(characters.isSymbol("\udfff")).toBe(false);
  expect(characters.surrogates).toEqual([0xd800, 0xdfff]);
  expect(bytes.surrogates).toBeNull();

  const pieces = characters.split("\ud83da");
  expect(pieces).toEqual(["\ud83d", "a"]);
  expect(pieces.map((piece) => characters.isSymbol(piece))).toEqual([
    false,
    true,
  ]);
  expect(characters.notASymbol("\ud83d").message).toEqual(
    "Expected a character, got the surrogate \\uD83D"
  );
});
