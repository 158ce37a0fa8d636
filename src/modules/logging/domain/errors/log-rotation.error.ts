export type LogFileOperation =
  | 'stat'
  | 'mkdir'
  | 'rename'
  | 'create'
  | 'list'
  | 'open';

/**
 * File-system failure while inspecting, rotating or reopening a log file
 */
export class LogRotationError extends Error {
  constructor(
    public readonly operation: LogFileOperation,
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Failed to ${operation} ${path}: ${reason}`);
    this.name = 'LogRotationError';
  }

  static from(
    operation: LogFileOperation,
    path: string,
    error: unknown,
  ): LogRotationError {
    return new LogRotationError(operation, path, describeError(error));
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
