export const HOUR_MS = 60 * 60 * 1000;

/**
 * Thresholds for the active log file and its rotated siblings.
 */
export interface LogRotationPolicy {
  /** Path of the file currently written to */
  readonly filePath: string;

  /** Rotate once the active file reaches this many bytes */
  readonly maxSizeBytes: number;

  /** Rotate once the active file was last modified this long ago; also the retention age of rotated files */
  readonly maxAgeMs: number;

  /** Number of rotated files kept, newest first */
  readonly maxFiles: number;

  /** Period of the background rotation check */
  readonly checkIntervalMs: number;
}

/**
 * Where log lines go besides the active file.
 */
export interface LogOutputSettings {
  readonly mirrorToConsole: boolean;
  readonly level: LogLevel;
}

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_ROTATION_POLICY: LogRotationPolicy = {
  filePath: 'logs/app.log',
  maxSizeBytes: 10 * 1024 * 1024,
  maxAgeMs: 5 * 24 * HOUR_MS,
  maxFiles: 10,
  checkIntervalMs: 10 * 60 * 1000,
};
