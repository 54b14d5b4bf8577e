import { ApiProperty } from '@nestjs/swagger';
import { COMMENT_STATUSES, CommentStatus } from '../../../entities/comment.entity';

export class CommentViewDto {
  @ApiProperty({ example: 'cmt_a1b2c3d4' })
  id!: string;

  @ApiProperty()
  chapter_id!: string;

  @ApiProperty()
  user_id!: string;

  @ApiProperty({ description: 'Sanitized HTML' })
  content_html!: string;

  @ApiProperty({ enum: COMMENT_STATUSES })
  status!: CommentStatus;

  @ApiProperty()
  created_at!: Date;

  @ApiProperty()
  user_display_name!: string;

  @ApiProperty()
  user_avatar_seed!: string;

  @ApiProperty()
  user_has_custom_avatar!: boolean;
}

export class CommentsPageDto {
  @ApiProperty({ type: [CommentViewDto] })
  comments!: CommentViewDto[];

  @ApiProperty()
  page!: number;

  @ApiProperty({ example: 12 })
  page_size!: number;

  @ApiProperty()
  total_count!: number;

  @ApiProperty()
  total_pages!: number;
}
