// istanbul ignore next
export function assertUnreachable(value: never): never {
  console.error("shouldnt have gotten (", value, ")");
  throw new Error(`unreachable`);
}

const hex = (value: number, width: number) =>
  value.toString(16).toUpperCase().padStart(width, "0");

/*
 * Printable ASCII is shown as is, everything else as an escape sequence:
 * \xHH up to 0xFF, \uHHHH up to 0xFFFF, \UHHHHHHHH above that.
 * Characters are passed as strings, bytes as numbers.
 */
export function showSymbol(symbol: string | number): string {
  const codePoint =
    typeof symbol === "number" ? symbol : symbol.codePointAt(0) ?? 0;

  if (codePoint === 0x5c) return "\\\\";
  if (codePoint >= 0x20 && codePoint <= 0x7e) {
    return String.fromCharCode(codePoint);
  }
  if (codePoint <= 0xff) return `\\x${hex(codePoint, 2)}`;
  if (codePoint <= 0xffff) return `\\u${hex(codePoint, 4)}`;
  return `\\U${hex(codePoint, 8)}`;
}

export function showSequence(sequence: string | Uint8Array): string {
  if (typeof sequence === "string") {
    return `"${Array.from(sequence, showSymbol).join("")}"`;
  }
  return `b"${Array.from(sequence, showSymbol).join("")}"`;
}

export function describeValue(value: unknown): string {
  if (typeof value === "string" || value instanceof Uint8Array) {
    return showSequence(value);
  }
  if (typeof value === "object" || typeof value === "function") {
    return value === null ? "null" : Object.prototype.toString.call(value);
  }
  return String(value);
}
