import { getHashes } from "node:crypto";

/**
 * Lists the digest names `calculateHash` accepts, lowercased and sorted.
 */
export function supportedHashAlgorithms(): readonly string[] {
  return Array.from(new Set(getHashes().map((name) => name.toLowerCase()))).sort();
}
