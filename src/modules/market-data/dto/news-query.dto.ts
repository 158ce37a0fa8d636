import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, MaxLength } from 'class-validator';

import { NEWS_CATEGORIES } from '../domain/models/news-article.model';

export class NewsQueryDto {
  @ApiPropertyOptional({
    description: 'News category; unknown values fall back to general',
    enum: NEWS_CATEGORIES,
    default: 'general',
  })
  @IsOptional()
  @IsString({ message: 'category must be a string' })
  @MaxLength(32, { message: 'category cannot exceed 32 characters' })
  category?: string;
}
