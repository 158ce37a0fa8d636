// Third´s Modules
import * as joi from 'joi';
import 'dotenv/config';

import {
  LOG_LEVELS,
  LogLevel,
} from '../modules/logging/domain/models/log-rotation-policy.model';

/**
 * Environment variables, after validation and defaults
 */
export type EnvVars = {
  PORT: number;
  FINNHUB_API_KEY: string;
  FINNHUB_BASE_URL: string;
  FINNHUB_MIN_INTERVAL_MS: number;
  FINNHUB_TIMEOUT_MS: number;
  MARKET_DATA_SOURCE: 'mock' | 'finnhub';
  WATCHLIST: string;
  CACHE_TTL_SECONDS: number;
  POLLING_INTERVAL_SECONDS: number;
  TICKER_LIMIT: number;
  LOG_FILE_PATH: string;
  LOG_MAX_SIZE_BYTES: number;
  LOG_MAX_AGE_HOURS: number;
  LOG_MAX_FILES: number;
  LOG_ROTATION_CHECK_INTERVAL_MS: number;
  LOG_TO_CONSOLE: boolean;
  LOG_LEVEL: LogLevel;
};

/**
 * Validate env variables
 */
export const configValidationSchema: joi.ObjectSchema<EnvVars> = joi
  .object<EnvVars>({
    PORT: joi.number().port().default(8080),

    // Market data
    FINNHUB_API_KEY: joi.string().required(),
    FINNHUB_BASE_URL: joi.string().uri().default('https://finnhub.io/api/v1'),
    FINNHUB_MIN_INTERVAL_MS: joi.number().integer().min(0).default(1000),
    FINNHUB_TIMEOUT_MS: joi.number().integer().positive().default(5000),
    MARKET_DATA_SOURCE: joi.string().valid('mock', 'finnhub').default('mock'),
    WATCHLIST: joi
      .string()
      .pattern(/^[A-Za-z.]+(,[A-Za-z.]+)*$/)
      .default('AAPL,GOOGL,MSFT,AMZN,TSLA'),

    // Dashboard
    CACHE_TTL_SECONDS: joi.number().integer().positive().default(60),
    POLLING_INTERVAL_SECONDS: joi.number().integer().positive().default(30),
    TICKER_LIMIT: joi.number().integer().min(1).max(50).default(5),

    // Logging
    LOG_FILE_PATH: joi.string().default('logs/app.log'),
    LOG_MAX_SIZE_BYTES: joi.number().integer().positive().default(10 * 1024 * 1024),
    LOG_MAX_AGE_HOURS: joi.number().positive().default(5 * 24),
    LOG_MAX_FILES: joi.number().integer().min(0).default(10),
    LOG_ROTATION_CHECK_INTERVAL_MS: joi.number().integer().min(1000).default(10 * 60 * 1000),
    LOG_TO_CONSOLE: joi.boolean().default(true),
    LOG_LEVEL: joi
      .string()
      .valid(...LOG_LEVELS)
      .default('info'),
  })
  .unknown(true);
