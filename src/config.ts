const letters = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
const digits = "0123456789";
const punctuation = "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~";

/**
 * Defaults used by the library functions.
 */
export const config = {
  passwordLength: 10,
  passwordAlphabet: letters + digits + punctuation,
  hashAlgorithm: "md5",
  jsonIndent: 4,
  csvDelimiter: ",",
  csvQuote: "\"",
  csvLineTerminator: "\r\n",
} as const;
