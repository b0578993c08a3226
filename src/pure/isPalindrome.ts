import { reverse } from "./reverse.ts";

/**
 * Checks whether a string reads the same backwards. Case and punctuation count.
 */
export function isPalindrome(text: string): boolean {
  return text === reverse(text);
}
