import { ConfigService } from '@nestjs/config';

import {
  HOUR_MS,
  LogOutputSettings,
  LogRotationPolicy,
} from '../modules/logging/domain/models/log-rotation-policy.model';
import { EnvVars } from './config.schema';

export const getLogRotationPolicy = (
  config: ConfigService<EnvVars, true>,
): LogRotationPolicy => ({
  filePath: config.get('LOG_FILE_PATH', { infer: true }),
  maxSizeBytes: config.get('LOG_MAX_SIZE_BYTES', { infer: true }),
  maxAgeMs: config.get('LOG_MAX_AGE_HOURS', { infer: true }) * HOUR_MS,
  maxFiles: config.get('LOG_MAX_FILES', { infer: true }),
  checkIntervalMs: config.get('LOG_ROTATION_CHECK_INTERVAL_MS', { infer: true }),
});

export const getLogOutputSettings = (
  config: ConfigService<EnvVars, true>,
): LogOutputSettings => ({
  mirrorToConsole: config.get('LOG_TO_CONSOLE', { infer: true }),
  level: config.get('LOG_LEVEL', { infer: true }),
});
