import { createHash } from "node:crypto";
import { err, ok, type Result } from "neverthrow";
import { config } from "../config.ts";
import { UnsupportedAlgorithmError } from "../errors/UnsupportedAlgorithmError.ts";
import { supportedHashAlgorithms } from "./supportedHashAlgorithms.ts";

/**
 * Computes the hex digest of the UTF-8 bytes of `text`.
 * @param algorithm Digest name, case-insensitive, e.g. "md5", "sha1", "sha256".
 */
export function calculateHash(
  text: string,
  algorithm: string = config.hashAlgorithm
): Result<string, UnsupportedAlgorithmError> {
  const name = algorithm.toLowerCase();
  if (!supportedHashAlgorithms().includes(name)) {
    return err(new UnsupportedAlgorithmError(algorithm));
  }
  return ok(createHash(name).update(text, "utf8").digest("hex"));
}
