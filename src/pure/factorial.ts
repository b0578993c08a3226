import { err, ok, type Result } from "neverthrow";
import { InvalidArgumentError } from "../errors/InvalidArgumentError.ts";

/**
 * Computes n! exactly.
 * @param n A non-negative integer.
 */
export function factorial(n: number): Result<bigint, InvalidArgumentError> {
  if (!Number.isSafeInteger(n) || n < 0) {
    return err(new InvalidArgumentError("n", `expected a non-negative integer, got ${n}`));
  }
  const last = BigInt(n);
  let product = 1n;
  for (let i = 2n; i <= last; i++) {
    product *= i;
  }
  return ok(product);
}
