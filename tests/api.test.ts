import { describe, test, expect } from "vitest";
import {
  calculateHash,
  camelToSnake,
  countVowels,
  difference,
  distance,
  factorial,
  intersect,
  isPalindrome,
  isPrime,
  normalizeText,
  primesUpTo,
  removeDuplicates,
  reverse,
  snakeToCamel,
  union,
} from "../src/index.ts";

describe("api", () => {
  const text = "HelloWorld";

  test("text functions", () => {
    expect(camelToSnake(text)).toBe("hello_world");
    expect(snakeToCamel("hello_world")).toBe("helloWorld");
    expect(reverse(text)).toBe("dlroWolleH");
    expect(countVowels(text)).toBe(3);
    expect(removeDuplicates(text)).toBe("HeloWrd");
    expect(normalizeText("l'école")).toBe("l'ecole");
    expect(isPalindrome("madam")).toBe(true);
  });

  test("hash function", () => {
    expect(calculateHash(text)._unsafeUnwrap()).toBe("68e109f0f40ca72a15e05cc22786f8e6");
  });

  test("number functions", () => {
    expect(isPrime(17)).toBe(true);
    expect(primesUpTo(20)._unsafeUnwrap()).toEqual([2, 3, 5, 7, 11, 13, 17, 19]);
    expect(factorial(5)._unsafeUnwrap()).toBe(120n);
  });

  test("list functions", () => {
    const list1 = [1, 2, 3, 4, 5];
    const list2 = [4, 5, 6, 7, 8];
    expect(intersect(list1, list2)).toEqual([4, 5]);
    expect(union(list1, list2)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(difference(list1, list2)).toEqual([1, 2, 3]);
  });

  test("distance function", () => {
    expect(distance([1, 2], [4, 6])).toBe(5);
  });
});
