import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  InternalServerErrorException,
  Post,
} from '@nestjs/common';
import {
  ApiInternalServerErrorResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';

import { INJECTION_TOKENS } from '../../../../common/constants/injection-tokens';
import { AppLoggerService } from '../../application/app-logger.service';
import { LogRotationPolicy } from '../../domain/models/log-rotation-policy.model';
import { formatAge, formatSize } from '../../domain/models/log-stats.model';
import { LogActionResponseDto, LogStatusDto } from '../../dto/log-status.dto';

/**
 * LogsController - inspection and manual maintenance of the log files
 * Base route: /logs
 */
@ApiTags('Logs')
@Controller('logs')
export class LogsController {
  constructor(
    private readonly appLogger: AppLoggerService,
    @Inject(INJECTION_TOKENS.LOG_ROTATION_POLICY)
    private readonly policy: LogRotationPolicy,
  ) {}

  /**
   * GET /logs/status
   */
  @Get('status')
  @ApiOperation({ summary: 'Active log file, rotated files and rotation policy' })
  @ApiOkResponse({ type: LogStatusDto })
  @ApiInternalServerErrorResponse({ description: 'Log files could not be inspected' })
  getStatus(): LogStatusDto {
    const result = this.appLogger.getStats();
    if (result.isFailure) {
      throw new InternalServerErrorException(
        `Failed to get log stats: ${result.getError().message}`,
      );
    }

    const stats = result.getValue();
    const destination = this.appLogger.getDestination();
    return {
      status: destination === 'file' ? 'healthy' : 'degraded',
      destination,
      currentSize: formatSize(stats.currentSize),
      currentAge: formatAge(stats.currentAgeMs),
      rotatedFiles: stats.rotatedCount,
      totalSize: formatSize(stats.totalSize),
      maxSize: formatSize(this.policy.maxSizeBytes),
      maxAge: formatAge(this.policy.maxAgeMs),
      maxFiles: this.policy.maxFiles,
    };
  }

  /**
   * POST /logs/rotate
   */
  @Post('rotate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Rotate the active log file now' })
  @ApiOkResponse({ type: LogActionResponseDto })
  @ApiInternalServerErrorResponse({ description: 'Rotation failed' })
  rotate(): LogActionResponseDto {
    const result = this.appLogger.forceRotate();
    if (result.isFailure) {
      throw new InternalServerErrorException(
        `Failed to rotate log: ${result.getError().message}`,
      );
    }
    return { status: 'success', message: 'Log rotation completed' };
  }

  /**
   * POST /logs/cleanup
   */
  @Post('cleanup')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Delete rotated log files past retention' })
  @ApiOkResponse({ type: LogActionResponseDto })
  @ApiInternalServerErrorResponse({ description: 'Cleanup failed' })
  cleanup(): LogActionResponseDto {
    const result = this.appLogger.cleanupOldLogs();
    if (result.isFailure) {
      throw new InternalServerErrorException(
        `Failed to cleanup logs: ${result.getError().message}`,
      );
    }
    return { status: 'success', message: 'Log cleanup completed' };
  }
}
