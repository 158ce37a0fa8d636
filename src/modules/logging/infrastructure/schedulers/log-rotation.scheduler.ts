import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';

import { describeError } from '../../domain/errors/log-rotation.error';
import { LogRotator } from '../adapters/log-rotator';

export const LOG_ROTATION_INTERVAL_NAME = 'log-rotation-check';

/**
 * Background check that rotates the active log file while the application is
 * idle. The interval period comes from configuration, so it is registered by
 * hand with the SchedulerRegistry instead of through a decorator.
 */
@Injectable()
export class LogRotationScheduler implements OnModuleDestroy {
  private readonly logger = new Logger(LogRotationScheduler.name);
  private onRotate?: () => void;
  private beforeCheck?: () => void;

  constructor(
    private readonly rotator: LogRotator,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  /**
   * Starts the periodic check. `beforeCheck` runs at the start of every tick;
   * `onRotate` runs after every successful rotation, before anything is
   * logged about it.
   */
  start(intervalMs: number, onRotate?: () => void, beforeCheck?: () => void): void {
    this.stop();
    this.onRotate = onRotate;
    this.beforeCheck = beforeCheck;

    const handle = setInterval(() => {
      this.checkRotation();
    }, intervalMs);
    handle.unref();

    this.schedulerRegistry.addInterval(LOG_ROTATION_INTERVAL_NAME, handle);
  }

  stop(): void {
    if (this.isRunning) {
      this.schedulerRegistry.deleteInterval(LOG_ROTATION_INTERVAL_NAME);
    }
  }

  get isRunning(): boolean {
    return this.schedulerRegistry.doesExist('interval', LOG_ROTATION_INTERVAL_NAME);
  }

  /**
   * One tick of the timer. Returns whether a rotation happened; never throws.
   */
  checkRotation(): boolean {
    try {
      this.beforeCheck?.();

      const due = this.rotator.shouldRotate();
      if (due.isFailure) {
        this.logger.error(`Error checking log rotation: ${due.getError().message}`);
        return false;
      }
      if (!due.getValue()) {
        return false;
      }

      const rotated = this.rotator.rotateLog();
      if (rotated.isFailure) {
        this.logger.error(`Error rotating log: ${rotated.getError().message}`);
        return false;
      }

      this.onRotate?.();

      const report = rotated.getValue();
      this.logger.log(`Log rotated by scheduler to ${report.rotatedTo ?? this.rotator.filePath}`);
      for (const failure of report.cleanupFailures) {
        this.logger.warn(`Could not remove old log ${failure.path}: ${failure.reason}`);
      }
      return true;
    } catch (error) {
      // Keep the interval alive
      this.logger.error(`Log rotation check failed: ${describeError(error)}`);
      return false;
    }
  }

  onModuleDestroy(): void {
    this.stop();
  }
}
