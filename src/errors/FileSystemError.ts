export type FileOperation = "read" | "write" | "mkdir";

/**
 * Error returned when a file system call fails
 */
export class FileSystemError extends Error {
  public readonly code: string | undefined;

  constructor(
    public readonly path: string,
    public readonly operation: FileOperation,
    cause: unknown
  ) {
    const code = errorCode(cause);
    super(`Failed to ${operation} ${path}${code ? ` (${code})` : ""}`, { cause });
    this.name = "FileSystemError";
    this.code = code;
  }
}

function errorCode(cause: unknown): string | undefined {
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}
