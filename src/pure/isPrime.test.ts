import { describe, it, expect } from "vitest";
import { isPrime } from "./isPrime.ts";

describe("isPrime", () => {
  it("should accept primes", () => {
    expect([2, 3, 5, 17, 7919, 1_000_000_007].map(isPrime)).toEqual([true, true, true, true, true, true]);
  });

  it("should reject numbers below 2", () => {
    expect([1, 0, -7].map(isPrime)).toEqual([false, false, false]);
  });

  it("should reject composites including squares of primes", () => {
    expect([4, 9, 25, 49, 91, 7917].map(isPrime)).toEqual([false, false, false, false, false, false]);
  });

  it("should reject non-integers", () => {
    expect(isPrime(7.5)).toBe(false);
  });
});
