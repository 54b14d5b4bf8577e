import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

export const NOVEL_SORTS = ['newest', 'oldest', 'large', 'small', 'alphabet', 'created'] as const;
export type NovelSort = (typeof NOVEL_SORTS)[number];

export class ListNovelsQueryDto {
  @ApiProperty({ description: '页码，从 1 开始', required: false, minimum: 1, maximum: 9999, default: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(9999)
  page?: number;

  @ApiProperty({
    description: '排序方式，默认 oldest',
    required: false,
    enum: NOVEL_SORTS,
    example: 'newest',
  })
  @IsOptional()
  @IsIn(NOVEL_SORTS)
  sort?: NovelSort;
}

export class SearchNovelsQueryDto {
  @ApiProperty({ description: 'Search text (title, English title or author)', required: false, maxLength: 50 })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  q?: string;
}
