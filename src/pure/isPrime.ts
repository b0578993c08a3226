/**
 * Checks primality by trial division over candidates of the form 6k ± 1.
 * Non-integers and numbers below 2 are not prime.
 */
export function isPrime(n: number): boolean {
  if (!Number.isInteger(n) || n <= 1) {
    return false;
  }
  if (n <= 3) {
    return true;
  }
  if (n % 2 === 0 || n % 3 === 0) {
    return false;
  }
  for (let i = 5; i * i <= n; i += 6) {
    if (n % i === 0 || n % (i + 2) === 0) {
      return false;
    }
  }
  return true;
}
