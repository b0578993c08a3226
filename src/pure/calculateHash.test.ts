import { describe, it, expect } from "vitest";
import { calculateHash } from "./calculateHash.ts";
import { supportedHashAlgorithms } from "./supportedHashAlgorithms.ts";
import { InvalidArgumentError } from "../errors/InvalidArgumentError.ts";
import { UnsupportedAlgorithmError } from "../errors/UnsupportedAlgorithmError.ts";

describe("calculateHash", () => {
  it("should default to md5", () => {
    expect(calculateHash("HelloWorld")._unsafeUnwrap()).toBe("68e109f0f40ca72a15e05cc22786f8e6");
  });

  it("should compute sha1 and sha256", () => {
    expect(calculateHash("HelloWorld", "sha1")._unsafeUnwrap()).toBe(
      "db8ac1c259eb89d4a131b253bacfca5f319d54f2"
    );
    expect(calculateHash("HelloWorld", "sha256")._unsafeUnwrap()).toBe(
      "872e4e50ce9990d8b041330c47c9ddd11bec6b503ae9386a99da8584e9bb12c4"
    );
  });

  it("should match names case-insensitively", () => {
    expect(calculateHash("", "MD5")._unsafeUnwrap()).toBe("d41d8cd98f00b204e9800998ecf8427e");
  });

  it("should reject unknown algorithms", () => {
    const error = calculateHash("HelloWorld", "md7")._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(UnsupportedAlgorithmError);
    expect(error).toBeInstanceOf(InvalidArgumentError);
    expect(error.algorithm).toBe("md7");
    expect(error.message).toBe('Invalid argument algorithm: unsupported hash algorithm "md7"');
  });
});

describe("supportedHashAlgorithms", () => {
  it("should include the common digests", () => {
    expect(supportedHashAlgorithms()).toEqual(expect.arrayContaining(["md5", "sha1", "sha256", "sha512"]));
  });
});
