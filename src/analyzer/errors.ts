/**
 * Raised when the log file handed to the analyzer does not exist
 */
export class LogFileNotFoundError extends Error {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Log file not found: ${path}`, { cause });
    this.name = 'LogFileNotFoundError';
    this.path = path;
  }
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
