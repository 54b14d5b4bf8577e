import { ApiProperty } from '@nestjs/swagger';
import { Novel } from '../../../entities/novel.entity';

export class NovelsPageDto {
  @ApiProperty({ type: [Novel] })
  novels!: Novel[];

  @ApiProperty()
  page!: number;

  @ApiProperty({ example: 12 })
  page_size!: number;

  @ApiProperty()
  total_count!: number;

  @ApiProperty()
  total_pages!: number;
}

export class NovelSearchResultDto {
  @ApiProperty({ type: [Novel], description: 'At most 20, most relevant first' })
  novels!: Novel[];

  @ApiProperty({ description: 'The trimmed query' })
  query!: string;
}

export class SitemapEntryDto {
  @ApiProperty({ example: 'nvl_a1b2c3d4' })
  id!: string;

  @ApiProperty()
  created_at!: Date;
}
