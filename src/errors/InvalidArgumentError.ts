/**
 * Error returned when an argument is outside the accepted domain
 */
export class InvalidArgumentError extends Error {
  constructor(
    public readonly argument: string,
    public readonly reason: string
  ) {
    super(`Invalid argument ${argument}: ${reason}`);
    this.name = "InvalidArgumentError";
  }
}
