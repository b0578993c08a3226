export { config } from "./config.ts";

export { generateRandomPassword } from "./pure/generateRandomPassword.ts";
export { camelToSnake } from "./pure/camelToSnake.ts";
export { snakeToCamel } from "./pure/snakeToCamel.ts";
export { reverse } from "./pure/reverse.ts";
export { countVowels } from "./pure/countVowels.ts";
export { removeDuplicates } from "./pure/removeDuplicates.ts";
export { normalizeText } from "./pure/normalizeText.ts";
export { isPalindrome } from "./pure/isPalindrome.ts";

export { calculateHash } from "./pure/calculateHash.ts";
export { supportedHashAlgorithms } from "./pure/supportedHashAlgorithms.ts";

export { isPrime } from "./pure/isPrime.ts";
export { primesUpTo } from "./pure/primesUpTo.ts";
export { factorial } from "./pure/factorial.ts";

export { intersect } from "./pure/intersect.ts";
export { union } from "./pure/union.ts";
export { difference } from "./pure/difference.ts";

export { distance } from "./pure/distance.ts";

export { parseJson } from "./pure/parseJson.ts";
export { formatCsv } from "./pure/formatCsv.ts";
export { parseCsv } from "./pure/parseCsv.ts";
export { jsonValueSchema } from "./schemas/jsonValueSchema.ts";

export { saveJson } from "./io/saveJson.ts";
export { loadJson } from "./io/loadJson.ts";
export { loadJsonAs } from "./io/loadJsonAs.ts";
export { saveCsv } from "./io/saveCsv.ts";
export { loadCsv } from "./io/loadCsv.ts";
export { ensureDirectory } from "./io/ensureDirectory.ts";

export { InvalidArgumentError } from "./errors/InvalidArgumentError.ts";
export { UnsupportedAlgorithmError } from "./errors/UnsupportedAlgorithmError.ts";
export { FileSystemError } from "./errors/FileSystemError.ts";
export type { FileOperation } from "./errors/FileSystemError.ts";
export { ParseError } from "./errors/ParseError.ts";

export type { Point } from "./types/Point.ts";
export type { JsonValue } from "./types/JsonValue.ts";
export type { CsvCell, CsvRow, CsvTable } from "./types/CsvTable.ts";
export type { RandomIndex } from "./types/RandomIndex.ts";
