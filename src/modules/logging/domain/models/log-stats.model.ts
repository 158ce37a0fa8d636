import { Duration } from 'luxon';

/**
 * Snapshot of the active log file and its rotated siblings.
 */
export interface LogStats {
  currentSize: number;
  currentAgeMs: number;
  rotatedCount: number;
  /** Rotated files plus the active one */
  totalSize: number;
}

/** A rotated sibling of the active log file. */
export interface RotatedLogFile {
  path: string;
  modifiedAt: number;
  size: number;
}

export interface CleanupFailure {
  path: string;
  reason: string;
}

export interface CleanupReport {
  removed: string[];
  failed: CleanupFailure[];
  kept: number;
}

export interface RotationReport {
  /** Name the active file was renamed to; null when there was nothing to rotate */
  rotatedTo: string | null;
  removed: string[];
  cleanupFailures: CleanupFailure[];
}

const SIZE_UNITS = 'KMGTPE';

/**
 * Human-readable byte count using binary units, e.g. `10.0 MB`.
 */
export function formatSize(bytes: number): string {
  const unit = 1024;
  if (bytes < unit) {
    return `${bytes} B`;
  }
  let div = unit;
  let exp = 0;
  for (let n = Math.floor(bytes / unit); n >= unit; n = Math.floor(n / unit)) {
    div *= unit;
    exp++;
  }
  return `${(bytes / div).toFixed(1)} ${SIZE_UNITS[exp]}B`;
}

/**
 * Age rounded to the minute, e.g. `2d 3h 15m`.
 */
export function formatAge(ms: number): string {
  const rounded = Math.round(ms / 60_000) * 60_000;
  return Duration.fromMillis(rounded).toFormat("d'd' h'h' m'm'");
}

export function describeLogStats(stats: LogStats): string {
  return (
    `Current: ${formatSize(stats.currentSize)} (age: ${formatAge(stats.currentAgeMs)}), ` +
    `Rotated files: ${stats.rotatedCount}, Total size: ${formatSize(stats.totalSize)}`
  );
}
