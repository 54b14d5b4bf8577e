import { ApiProperty } from '@nestjs/swagger';

export class ChapterSummaryDto {
  @ApiProperty({ example: 'chp_a1b2c3d4' })
  id!: string;

  @ApiProperty()
  chapter_num!: number;

  @ApiProperty()
  title!: string;

  @ApiProperty({ nullable: true, type: String })
  title_en!: string | null;
}

export class ChapterListDto {
  @ApiProperty({ type: [ChapterSummaryDto] })
  chapters!: ChapterSummaryDto[];

  @ApiProperty()
  novel_id!: string;

  @ApiProperty()
  count!: number;
}

export class ChapterSourceDto {
  @ApiProperty()
  name!: string;

  @ApiProperty({ nullable: true, type: String })
  logo_url!: string | null;
}

export class ChapterDetailDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  novel_id!: string;

  @ApiProperty()
  chapter_num!: number;

  @ApiProperty()
  title!: string;

  @ApiProperty({ nullable: true, type: String })
  title_en!: string | null;

  @ApiProperty()
  content!: string;

  @ApiProperty()
  created_at!: Date;

  @ApiProperty({ type: ChapterSourceDto, nullable: true })
  source!: ChapterSourceDto | null;
}
