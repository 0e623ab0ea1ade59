import { describeValue, showSequence, showSymbol } from "./util";

test("showSymbol", () => {
  expect(showSymbol("a")).toEqual("a");
  expect(showSymbol("~")).toEqual("~");
  expect(showSymbol("\\")).toEqual("\\\\");
  expect(showSymbol("\n")).toEqual("\\x0A");
  expect(showSymbol("\u00e9")).toEqual("\\xE9");
  expect(showSymbol("\u2603")).toEqual("\\u2603");
  expect(showSymbol("\u{1f600}")).toEqual("\\U0001F600");
  expect(showSymbol(0x41)).toEqual("A");
  expect(showSymbol(0xff)).toEqual("\\xFF");
});

test("showSequence", () => {
  expect(showSequence("ab\n")).toEqual('"ab\\x0A"');
  expect(showSequence(Uint8Array.of(0x61, 0xfe))).toEqual('b"a\\xFE"');
});

test("describeValue", () => {
  expect(describeValue("xy")).toEqual('"xy"');
  expect(describeValue(3)).toEqual("3");
  expect(describeValue(null)).toEqual("null");
  expect(describeValue(undefined)).toEqual("undefined");
  expect(describeValue({})).toEqual("[object Object]");
});
