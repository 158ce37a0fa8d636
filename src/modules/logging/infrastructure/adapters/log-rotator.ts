import * as fs from 'fs';
import * as path from 'path';

import { Inject, Injectable, Optional } from '@nestjs/common';
import { DateTime } from 'luxon';

import { INJECTION_TOKENS } from '../../../../common/constants/injection-tokens';
import { Clock, systemClock } from '../../../../common/time/clock';
import { Result } from '../../../../common/types/result.type';
import {
  describeError,
  LogRotationError,
} from '../../domain/errors/log-rotation.error';
import { LogRotationPolicy } from '../../domain/models/log-rotation-policy.model';
import {
  CleanupFailure,
  CleanupReport,
  LogStats,
  RotatedLogFile,
  RotationReport,
} from '../../domain/models/log-stats.model';

const ROTATED_SUFFIX_FORMAT = 'yyyy-MM-dd_HH-mm-ss';
const BANNER_TIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

interface RotatedListing {
  files: RotatedLogFile[];
  unreadable: CleanupFailure[];
}

/**
 * Rotates a single active log file and prunes its rotated siblings.
 *
 * Lifecycle of the active file: Fresh (banner only) -> Active (accumulating
 * writes) -> due for rotation (size >= maxSize or age >= maxAge) -> renamed to
 * `<path>.<yyyy-MM-dd_HH-mm-ss>` and replaced by a Fresh file.
 *
 * Every file operation is synchronous so the logger can run the check inside
 * its own write path.
 */
@Injectable()
export class LogRotator {
  private readonly clock: Clock;

  constructor(
    @Inject(INJECTION_TOKENS.LOG_ROTATION_POLICY)
    private readonly policy: LogRotationPolicy,
    @Optional() @Inject(INJECTION_TOKENS.CLOCK) clock?: Clock,
  ) {
    this.clock = clock ?? systemClock;
  }

  get filePath(): string {
    return this.policy.filePath;
  }

  /**
   * A missing active file is "not yet due", not an error.
   */
  shouldRotate(): Result<boolean, LogRotationError> {
    let stats: fs.Stats | undefined;
    try {
      stats = fs.statSync(this.policy.filePath, { throwIfNoEntry: false });
    } catch (error) {
      return Result.fail(LogRotationError.from('stat', this.policy.filePath, error));
    }

    if (!stats) {
      return Result.ok(false);
    }

    const age = this.clock.now() - stats.mtimeMs;
    return Result.ok(
      stats.size >= this.policy.maxSizeBytes || age >= this.policy.maxAgeMs,
    );
  }

  /**
   * Renames the active file aside and starts a fresh one, then prunes history.
   * Cleanup problems are reported on the returned value and never fail the
   * rotation itself.
   */
  rotateLog(): Result<RotationReport, LogRotationError> {
    const activePath = this.policy.filePath;
    const directory = path.dirname(activePath);
    const now = this.clock.now();

    try {
      fs.mkdirSync(directory, { recursive: true });
    } catch (error) {
      return Result.fail(LogRotationError.from('mkdir', directory, error));
    }

    if (!fs.existsSync(activePath)) {
      return this.createFreshFile(now).map((): RotationReport => ({
        rotatedTo: null,
        removed: [],
        cleanupFailures: [],
      }));
    }

    const rotatedTo = this.nextRotatedName(now);
    try {
      fs.renameSync(activePath, rotatedTo);
    } catch (error) {
      return Result.fail(LogRotationError.from('rename', activePath, error));
    }

    const created = this.createFreshFile(now);
    if (created.isFailure) {
      return Result.fail(created.getError());
    }

    const cleanup = this.cleanupOldLogs();
    if (cleanup.isFailure) {
      const failure = cleanup.getError();
      return Result.ok({
        rotatedTo,
        removed: [],
        cleanupFailures: [{ path: failure.path, reason: failure.reason }],
      });
    }

    const report = cleanup.getValue();
    return Result.ok({
      rotatedTo,
      removed: report.removed,
      cleanupFailures: report.failed,
    });
  }

  /**
   * Deletes rotated files older than maxAge, and every file beyond the newest
   * maxFiles. The two rules are applied independently. A failed deletion is
   * recorded and the loop moves on.
   */
  cleanupOldLogs(): Result<CleanupReport, LogRotationError> {
    const listing = this.listRotatedFiles();
    if (listing.isFailure) {
      return Result.fail(listing.getError());
    }

    const { files, unreadable } = listing.getValue();
    const cutoff = this.clock.now() - this.policy.maxAgeMs;
    const removed: string[] = [];
    const failed: CleanupFailure[] = [...unreadable];

    files.forEach((file, index) => {
      const expired = file.modifiedAt < cutoff;
      const overflow = index >= this.policy.maxFiles;
      if (!expired && !overflow) {
        return;
      }
      try {
        fs.unlinkSync(file.path);
        removed.push(file.path);
      } catch (error) {
        failed.push({ path: file.path, reason: describeError(error) });
      }
    });

    return Result.ok({
      removed,
      failed,
      kept: files.length - removed.length,
    });
  }

  getStats(): Result<LogStats, LogRotationError> {
    const stats: LogStats = {
      currentSize: 0,
      currentAgeMs: 0,
      rotatedCount: 0,
      totalSize: 0,
    };

    let active: fs.Stats | undefined;
    try {
      active = fs.statSync(this.policy.filePath, { throwIfNoEntry: false });
    } catch (error) {
      return Result.fail(LogRotationError.from('stat', this.policy.filePath, error));
    }
    if (active) {
      stats.currentSize = active.size;
      stats.currentAgeMs = Math.max(0, this.clock.now() - active.mtimeMs);
    }

    const listing = this.listRotatedFiles();
    if (listing.isFailure) {
      return Result.fail(listing.getError());
    }

    const { files } = listing.getValue();
    stats.rotatedCount = files.length;
    stats.totalSize =
      files.reduce((sum, file) => sum + file.size, 0) + stats.currentSize;

    return Result.ok(stats);
  }

  /**
   * Siblings named `<basename>.*`, newest first. Files that vanish between
   * listing and stat are skipped; files that cannot be stat'ed are reported.
   */
  private listRotatedFiles(): Result<RotatedListing, LogRotationError> {
    const directory = path.dirname(this.policy.filePath);
    const prefix = `${path.basename(this.policy.filePath)}.`;

    let names: string[];
    try {
      names = fs.existsSync(directory) ? fs.readdirSync(directory) : [];
    } catch (error) {
      return Result.fail(LogRotationError.from('list', directory, error));
    }

    const files: RotatedLogFile[] = [];
    const unreadable: CleanupFailure[] = [];

    for (const name of names) {
      if (!name.startsWith(prefix)) {
        continue;
      }
      const filePath = path.join(directory, name);
      try {
        const stats = fs.statSync(filePath, { throwIfNoEntry: false });
        if (stats?.isFile()) {
          files.push({ path: filePath, modifiedAt: stats.mtimeMs, size: stats.size });
        }
      } catch (error) {
        unreadable.push({ path: filePath, reason: describeError(error) });
      }
    }

    files.sort(
      (a, b) => b.modifiedAt - a.modifiedAt || b.path.localeCompare(a.path),
    );

    return Result.ok({ files, unreadable });
  }

  private createFreshFile(now: number): Result<void, LogRotationError> {
    const stamp = DateTime.fromMillis(now).toFormat(BANNER_TIME_FORMAT);
    try {
      fs.writeFileSync(
        this.policy.filePath,
        `INFO: ${stamp} Log file created/rotated\n`,
      );
      return Result.ok();
    } catch (error) {
      return Result.fail(LogRotationError.from('create', this.policy.filePath, error));
    }
  }

  /**
   * Two rotations within the same second get `.1`, `.2`, ... so no history is
   * overwritten by the rename.
   */
  private nextRotatedName(now: number): string {
    const base = `${this.policy.filePath}.${DateTime.fromMillis(now).toFormat(ROTATED_SUFFIX_FORMAT)}`;
    if (!fs.existsSync(base)) {
      return base;
    }
    let attempt = 1;
    while (fs.existsSync(`${base}.${attempt}`)) {
      attempt++;
    }
    return `${base}.${attempt}`;
  }
}
