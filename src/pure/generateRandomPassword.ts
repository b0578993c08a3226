import { randomInt } from "node:crypto";
import { err, ok, type Result } from "neverthrow";
import { config } from "../config.ts";
import { InvalidArgumentError } from "../errors/InvalidArgumentError.ts";
import type { RandomIndex } from "../types/RandomIndex.ts";

/**
 * Generates a password from ASCII letters, digits and punctuation.
 * The default source is `crypto.randomInt`; pass `randomIndex` to make the output reproducible.
 * An index outside the alphabet is rejected rather than skipped.
 * @param length Number of characters, a non-negative integer.
 * @param randomIndex Picks a position in the alphabet.
 */
export function generateRandomPassword(
  length: number = config.passwordLength,
  randomIndex: RandomIndex = (size) => randomInt(size)
): Result<string, InvalidArgumentError> {
  if (!Number.isSafeInteger(length) || length < 0) {
    return err(new InvalidArgumentError("length", `expected a non-negative integer, got ${length}`));
  }
  const alphabet = config.passwordAlphabet;
  let password = "";
  for (let i = 0; i < length; i++) {
    const index = randomIndex(alphabet.length);
    if (!Number.isInteger(index) || index < 0 || index >= alphabet.length) {
      return err(new InvalidArgumentError("randomIndex", `returned ${index}, expected an integer in [0, ${alphabet.length})`));
    }
    password += alphabet.charAt(index);
  }
  return ok(password);
}
