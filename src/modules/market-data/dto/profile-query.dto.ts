import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsOptional, IsString, Matches } from 'class-validator';

/**
 * ProfileQueryDto: query of GET /data/profile
 *
 * The symbol is trimmed and uppercased; an empty value means the default symbol.
 */
export class ProfileQueryDto {
  @ApiPropertyOptional({
    description: 'Ticker symbol',
    example: 'AAPL',
    default: 'AAPL',
  })
  @IsOptional()
  @Transform(({ value }) =>
    typeof value === 'string' ? value.trim().toUpperCase() || undefined : value,
  )
  @IsString({ message: 'symbol must be a string' })
  @Matches(/^[A-Z][A-Z0-9.-]{0,9}$/, {
    message: 'symbol must be 1-10 characters: letters, digits, dot or dash',
  })
  symbol?: string;
}
