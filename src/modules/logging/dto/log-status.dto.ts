import { ApiProperty } from '@nestjs/swagger';

import { LogDestination } from '../application/app-logger.service';

/**
 * LogStatusDto: state of the active log file and the rotation policy
 */
export class LogStatusDto {
  @ApiProperty({ example: 'healthy', enum: ['healthy', 'degraded'] })
  status!: 'healthy' | 'degraded';

  @ApiProperty({ description: 'Where log lines currently go', enum: ['file', 'fallback'] })
  destination!: LogDestination;

  @ApiProperty({ example: '1.2 MB' })
  currentSize!: string;

  @ApiProperty({ example: '0d 3h 12m' })
  currentAge!: string;

  @ApiProperty({ example: 3 })
  rotatedFiles!: number;

  @ApiProperty({ example: '25.4 MB' })
  totalSize!: string;

  @ApiProperty({ example: '10.0 MB' })
  maxSize!: string;

  @ApiProperty({ example: '5d 0h 0m' })
  maxAge!: string;

  @ApiProperty({ example: 10 })
  maxFiles!: number;
}

/**
 * LogActionResponseDto: outcome of a manual rotation or cleanup
 */
export class LogActionResponseDto {
  @ApiProperty({ example: 'success' })
  status!: 'success';

  @ApiProperty({ example: 'Log rotation completed' })
  message!: string;
}
