import { err, ok, type Result } from "neverthrow";
import { InvalidArgumentError } from "../errors/InvalidArgumentError.ts";
import { isPrime } from "./isPrime.ts";

/**
 * Lists the primes in `[2, limit]` in ascending order.
 * @param limit A finite number; anything below 2 gives no primes.
 */
export function primesUpTo(limit: number): Result<readonly number[], InvalidArgumentError> {
  if (!Number.isFinite(limit)) {
    return err(new InvalidArgumentError("limit", `expected a finite number, got ${limit}`));
  }
  const primes: number[] = [];
  for (let n = 2; n <= limit; n++) {
    if (isPrime(n)) {
      primes.push(n);
    }
  }
  return ok(primes);
}
