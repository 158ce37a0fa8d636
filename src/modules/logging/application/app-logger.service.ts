import * as fs from 'fs';
import * as path from 'path';
import { finished } from 'stream/promises';
import { format, inspect } from 'util';

// Nest Modules
import {
  Inject,
  Injectable,
  LoggerService,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';

// Third's Modules
import { DateTime } from 'luxon';
import { utilities } from 'nest-winston';
import * as winston from 'winston';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { Result } from '../../../common/types/result.type';
import {
  describeError,
  LogRotationError,
} from '../domain/errors/log-rotation.error';
import {
  LogOutputSettings,
  LogRotationPolicy,
} from '../domain/models/log-rotation-policy.model';
import {
  CleanupReport,
  describeLogStats,
  formatAge,
  formatSize,
  LogStats,
  RotationReport,
} from '../domain/models/log-stats.model';
import { LogRotator } from '../infrastructure/adapters/log-rotator';
import { LogRotationScheduler } from '../infrastructure/schedulers/log-rotation.scheduler';

const APP_NAME = 'TickerBoard';
const LOGGER_CONTEXT = 'AppLogger';
const TIMESTAMP_FORMAT = 'YYYY/MM/DD HH:mm:ss';
const FATAL_TIMESTAMP_FORMAT = 'yyyy/MM/dd HH:mm:ss';
const STACK_PATTERN = /\n\s+at /;

type WriteLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export type LogDestination = 'file' | 'fallback';

/**
 * `INFO: 2026/10/19 14:03:07 [Context] message`
 */
const fileLineFormat = winston.format.printf((info) => {
  const context =
    typeof info.context === 'string' && info.context ? `[${info.context}] ` : '';
  const timestamp = typeof info.timestamp === 'string' ? info.timestamp : '';
  const message =
    typeof info.message === 'string' ? info.message : JSON.stringify(info.message);
  const stack = typeof info.stack === 'string' ? `\n${info.stack}` : '';
  return `${info.level.toUpperCase()}: ${timestamp} ${context}${message}${stack}`;
});

interface SplitParams {
  context?: string;
  stack?: string;
  extras: unknown[];
}

/**
 * Nest appends the context as the last string argument, and `error` may carry
 * a stack trace before it.
 */
function splitParams(params: unknown[]): SplitParams {
  const rest = params.filter((param) => param !== undefined);
  const split: SplitParams = { extras: [] };

  const last = rest[rest.length - 1];
  if (typeof last === 'string' && !STACK_PATTERN.test(last)) {
    split.context = last;
    rest.pop();
  }

  for (const param of rest) {
    if (split.stack === undefined && typeof param === 'string' && STACK_PATTERN.test(param)) {
      split.stack = param;
    } else {
      split.extras.push(param);
    }
  }
  return split;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Error) {
    return value.message;
  }
  return inspect(value, { depth: 4, breakLength: Infinity });
}

/**
 * Application logger: every line goes to the active log file, and to stdout
 * when mirroring is on. Each write first asks the rotator whether the file is
 * due, so rotation also happens between scheduler ticks.
 *
 * When the file cannot be (re)opened the logger falls back to stdout and
 * keeps going; the next successful reopen switches back to the file.
 */
@Injectable()
export class AppLoggerService
  implements LoggerService, OnModuleInit, OnApplicationShutdown
{
  private readonly logger: winston.Logger;
  private readonly consoleTransport: winston.transports.ConsoleTransportInstance;

  private fileStream: fs.WriteStream | null = null;
  private fileTransport: winston.transports.StreamTransportInstance | null = null;
  private destination: LogDestination = 'fallback';
  private closed = false;

  constructor(
    private readonly rotator: LogRotator,
    private readonly scheduler: LogRotationScheduler,
    @Inject(INJECTION_TOKENS.LOG_ROTATION_POLICY)
    private readonly policy: LogRotationPolicy,
    @Inject(INJECTION_TOKENS.LOG_OUTPUT_SETTINGS)
    private readonly output: LogOutputSettings,
  ) {
    this.consoleTransport = new winston.transports.Console({
      silent: !output.mirrorToConsole,
      format: utilities.format.nestLike(APP_NAME, {
        colors: true,
        prettyPrint: true,
      }),
    });

    this.logger = winston.createLogger({
      level: output.level,
      format: winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
      transports: [this.consoleTransport],
    });

    this.checkAndRotate();
    this.attachFile();
  }

  onModuleInit(): void {
    this.scheduler.start(
      this.policy.checkIntervalMs,
      () => this.reopen(),
      () => this.retryFile(),
    );
    this.emit(
      'info',
      `Log rotation enabled: file=${this.policy.filePath}, ` +
        `maxSize=${formatSize(this.policy.maxSizeBytes)}, ` +
        `maxAge=${formatAge(this.policy.maxAgeMs)}, maxFiles=${this.policy.maxFiles}`,
      LOGGER_CONTEXT,
    );
    this.logStats();
  }

  async onApplicationShutdown(): Promise<void> {
    this.scheduler.stop();
    await this.close();
  }

  /*
   * LoggerService
   */

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('verbose', message, optionalParams);
  }

  /**
   * Writes the line synchronously to the active file and stderr, then exits
   * the process with status 1.
   */
  fatal(message: unknown, ...optionalParams: unknown[]): never {
    const { context, stack, extras } = splitParams(optionalParams);
    const text = [stringify(message), ...extras.map(stringify)].join(' ');
    const timestamp = DateTime.now().toFormat(FATAL_TIMESTAMP_FORMAT);
    const line =
      `FATAL: ${timestamp} ${context ? `[${context}] ` : ''}${text}` +
      `${stack ? `\n${stack}` : ''}\n`;

    try {
      fs.appendFileSync(this.policy.filePath, line);
    } catch (error) {
      process.stderr.write(`Failed to write fatal line to log file: ${describeError(error)}\n`);
    }
    process.stderr.write(line);
    process.exit(1);
  }

  /*
   * Info / error streams
   */

  info(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  /** printf-style info line, e.g. `infof('Fetched %d rows', 5)` */
  infof(template: string, ...args: unknown[]): void {
    this.write('info', format(template, ...args), []);
  }

  errorf(template: string, ...args: unknown[]): void {
    this.write('error', format(template, ...args), []);
  }

  /*
   * Log file management
   */

  getStats(): Result<LogStats, LogRotationError> {
    return this.rotator.getStats();
  }

  getDestination(): LogDestination {
    return this.destination;
  }

  /**
   * Rotates now regardless of thresholds.
   */
  forceRotate(): Result<RotationReport, LogRotationError> {
    return this.rotateNow();
  }

  cleanupOldLogs(): Result<CleanupReport, LogRotationError> {
    const result = this.rotator.cleanupOldLogs();
    if (result.isFailure) {
      this.emit('error', `Log cleanup failed: ${result.getError().message}`, LOGGER_CONTEXT);
      return result;
    }

    const report = result.getValue();
    this.emit(
      'info',
      `Log cleanup removed ${report.removed.length} file(s), kept ${report.kept}`,
      LOGGER_CONTEXT,
    );
    this.reportCleanupFailures(report.failed);
    return result;
  }

  /**
   * Releases the current file handle and opens the active path again. Called
   * after a rotation performed outside the logger.
   */
  reopen(): boolean {
    if (this.closed) {
      return false;
    }
    this.detachFile();
    return this.attachFile();
  }

  /**
   * Flushes pending lines and releases the file handle. Later writes only
   * reach the console.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    // Let lines still in the winston pipeline reach the file transport
    await new Promise<void>((resolve) => setImmediate(resolve));

    const stream = this.fileStream;
    this.detachFile();
    if (stream) {
      await finished(stream);
    }
  }

  /*
   * Internals
   */

  private write(level: WriteLevel, message: unknown, optionalParams: unknown[]): void {
    this.checkAndRotate();

    const { context, stack, extras } = splitParams(optionalParams);
    const text = [stringify(message), ...extras.map(stringify)].join(' ');
    const errorStack =
      stack ?? (level === 'error' && message instanceof Error ? message.stack : undefined);

    this.emit(level, text, context, errorStack);
  }

  /** Raw write, without the rotation check. */
  private emit(level: WriteLevel, message: string, context?: string, stack?: string): void {
    this.logger.log({ level, message, context, stack });
  }

  private checkAndRotate(): void {
    if (this.closed) {
      return;
    }

    const due = this.rotator.shouldRotate();
    if (due.isFailure) {
      this.emit(
        'error',
        `Failed to check log rotation: ${due.getError().message}`,
        LOGGER_CONTEXT,
      );
      return;
    }
    if (due.getValue()) {
      this.rotateNow();
    }
  }

  private rotateNow(): Result<RotationReport, LogRotationError> {
    this.detachFile();
    const result = this.rotator.rotateLog();
    if (!this.closed) {
      this.attachFile();
    }

    if (result.isFailure) {
      this.emit('error', `Log rotation failed: ${result.getError().message}`, LOGGER_CONTEXT);
      return result;
    }

    const report = result.getValue();
    this.emit(
      'info',
      report.rotatedTo
        ? `Log rotated to ${report.rotatedTo}`
        : `Log file created at ${this.policy.filePath}`,
      LOGGER_CONTEXT,
    );
    this.logStats();
    this.reportCleanupFailures(report.cleanupFailures);
    return result;
  }

  private logStats(): void {
    const stats = this.rotator.getStats();
    if (stats.isFailure) {
      this.emit('warn', `Could not read log stats: ${stats.getError().message}`, LOGGER_CONTEXT);
      return;
    }
    this.emit('info', `Log stats: ${describeLogStats(stats.getValue())}`, LOGGER_CONTEXT);
  }

  /**
   * While on the stdout fallback, tries the file again. Runs on every
   * scheduler tick, so a fallback without a pending rotation still ends.
   */
  private retryFile(): void {
    if (this.destination !== 'fallback' || this.closed) {
      return;
    }
    if (this.attachFile()) {
      this.emit('info', `Logging to ${this.policy.filePath} again`, LOGGER_CONTEXT);
    }
  }

  private reportCleanupFailures(failures: { path: string; reason: string }[]): void {
    for (const failure of failures) {
      this.emit(
        'warn',
        `Could not remove old log ${failure.path}: ${failure.reason}`,
        LOGGER_CONTEXT,
      );
    }
  }

  private attachFile(): boolean {
    if (this.fileStream) {
      return true;
    }
    const filePath = this.policy.filePath;

    let stream: fs.WriteStream;
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      const fd = fs.openSync(filePath, 'a');
      stream = fs.createWriteStream(filePath, { fd, flags: 'a' });
    } catch (error) {
      this.fallBack(LogRotationError.from('open', filePath, error));
      return false;
    }

    stream.on('error', (error) => this.onStreamError(stream, error));

    const transport = new winston.transports.Stream({ stream, format: fileLineFormat });
    this.logger.add(transport);

    this.fileStream = stream;
    this.fileTransport = transport;
    this.destination = 'file';
    this.consoleTransport.silent = !this.output.mirrorToConsole;
    return true;
  }

  private detachFile(): void {
    if (this.fileTransport) {
      this.logger.remove(this.fileTransport);
      this.fileTransport = null;
    }
    if (this.fileStream) {
      this.fileStream.end();
      this.fileStream = null;
    }
  }

  private fallBack(error: LogRotationError): void {
    this.destination = 'fallback';
    this.consoleTransport.silent = false;
    this.emit(
      'error',
      `${error.message}; logging to stdout instead`,
      LOGGER_CONTEXT,
    );
  }

  private onStreamError(stream: fs.WriteStream, error: Error): void {
    if (stream !== this.fileStream) {
      this.emit('warn', `Late write to a released log file failed: ${error.message}`, LOGGER_CONTEXT);
      return;
    }
    this.detachFile();
    this.fallBack(LogRotationError.from('open', this.policy.filePath, error));
  }
}
