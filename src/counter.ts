import { EmptyDigitSequence, IndexOutOfRange, InvalidBase } from "./errors";

/**
 * A variable-length counter in an arbitrary base, used to walk
 * every string of an alphabet in order: all strings of one width,
 * then all strings of the next.
 *
 * Digits are given most-significant first. Past the largest value
 * of its width the counter rolls over to all zeros with one more digit,
 * so in base 2:
 *
 *   [0, 0] -> [0, 1] -> [1, 0] -> [1, 1] -> [0, 0, 0]
 */
export class PositionalCounter {
  // least-significant digit first
  private readonly places: number[];
  constructor(digits: Iterable<number>, public readonly base: number) {
    this.places = Array.from(digits).reverse();
    if (this.places.length === 0) throw new EmptyDigitSequence();
    if (!Number.isInteger(base) || base < 1) throw new InvalidBase(base);
    for (const digit of this.places) {
      if (!Number.isInteger(digit) || digit < 0 || digit >= base) {
        throw new IndexOutOfRange(digit, base);
      }
    }
  }
  get digitCount(): number {
    return this.places.length;
  }
  get digits(): number[] {
    return this.places.slice().reverse();
  }
  /** The digits read as a base-`base` integer. */
  toInteger(): bigint {
    const base = BigInt(this.base);
    let total = 0n;
    for (let i = this.places.length - 1; i >= 0; i--) {
      total = total * base + BigInt(this.places[i]);
    }
    return total;
  }
  /**
   * Add one, carrying as needed. The same counter is returned, so
   * callers read the current value first and then advance it.
   */
  increment(): this {
    for (let i = 0; i < this.places.length; i++) {
      this.places[i]++;
      if (this.places[i] < this.base) return this;
      this.places[i] = 0;
    }
    this.places.push(0);
    return this;
  }
  compare(other: PositionalCounter): number {
    if (this.digitCount !== other.digitCount) {
      return this.digitCount < other.digitCount ? -1 : 1;
    }
    if (this.base !== other.base) {
      const left = this.toInteger();
      const right = other.toInteger();
      return left === right ? 0 : left < right ? -1 : 1;
    }
    for (let i = this.places.length - 1; i >= 0; i--) {
      const diff = this.places[i] - other.places[i];
      if (diff !== 0) return Math.sign(diff);
    }
    return 0;
  }
  lessThan(other: PositionalCounter): boolean {
    return this.compare(other) < 0;
  }
  lessThanOrEqual(other: PositionalCounter): boolean {
    return this.compare(other) <= 0;
  }
  equals(other: PositionalCounter): boolean {
    return this.base === other.base && this.compare(other) === 0;
  }
  clone(): PositionalCounter {
    return new PositionalCounter(this.digits, this.base);
  }
  toString(): string {
    const digits = this.digits.join(", ");
    return `PositionalCounter([${digits}], base = ${this.base})`;
  }
}
