import { InvalidArgumentError } from "./InvalidArgumentError.ts";

/**
 * Error returned when a digest algorithm name is not known to the runtime
 */
export class UnsupportedAlgorithmError extends InvalidArgumentError {
  constructor(public readonly algorithm: string) {
    super("algorithm", `unsupported hash algorithm "${algorithm}"`);
    this.name = "UnsupportedAlgorithmError";
  }
}
