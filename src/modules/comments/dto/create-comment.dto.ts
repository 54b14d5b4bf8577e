import { ApiProperty } from '@nestjs/swagger';
import { IsString, MaxLength } from 'class-validator';

export class CreateCommentDto {
  @ApiProperty({ description: 'Markdown body, 1-1000 characters', example: 'Great chapter, **thanks**!' })
  @IsString()
  // 精确长度（按字符计）在服务层校验
  @MaxLength(8000)
  content!: string;

  @ApiProperty({ description: 'Turnstile widget response token' })
  @IsString()
  @MaxLength(4096)
  turnstile_token!: string;
}
