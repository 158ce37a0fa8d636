import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import {
  getLogOutputSettings,
  getLogRotationPolicy,
} from '../../config/logging.config';
import { AppLoggerService } from './application/app-logger.service';
import { LogRotator } from './infrastructure/adapters/log-rotator';
import { LogsController } from './infrastructure/controllers/logs.controller';
import { LogRotationScheduler } from './infrastructure/schedulers/log-rotation.scheduler';

/**
 * Logging module: log file rotation, the background rotation check and the
 * application logger handed to Nest in main.ts.
 */
@Global()
@Module({
  controllers: [LogsController],
  providers: [
    {
      provide: INJECTION_TOKENS.LOG_ROTATION_POLICY,
      inject: [ConfigService],
      useFactory: getLogRotationPolicy,
    },
    {
      provide: INJECTION_TOKENS.LOG_OUTPUT_SETTINGS,
      inject: [ConfigService],
      useFactory: getLogOutputSettings,
    },
    LogRotator,
    LogRotationScheduler,
    AppLoggerService,
  ],
  exports: [AppLoggerService],
})
export class LoggingModule {}
