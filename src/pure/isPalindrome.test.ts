import { describe, it, expect } from "vitest";
import { isPalindrome } from "./isPalindrome.ts";
import { reverse } from "./reverse.ts";

describe("isPalindrome", () => {
  it("should accept palindromes", () => {
    expect(isPalindrome("madam")).toBe(true);
    expect(isPalindrome("")).toBe(true);
  });

  it("should be case sensitive", () => {
    expect(isPalindrome("Madam")).toBe(false);
  });

  it("should agree with reverse", () => {
    const samples = ["racecar", "HelloWorld", "abba", "ab"];
    expect(samples.map(isPalindrome)).toEqual(samples.map((s) => s === reverse(s)));
  });
});
