import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsObject, IsOptional } from 'class-validator';

// 只声明需要的字段，其余字段由 ValidationPipe 的 whitelist 丢弃
export class TelegramUpdateDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  update_id?: number;

  @ApiPropertyOptional({
    description: 'Inline keyboard press',
    example: { id: '4382', data: 'approve:cmt_a1b2c3d4', message: { message_id: 17, text: '...' } },
  })
  @IsOptional()
  @IsObject()
  callback_query?: Record<string, unknown>;
}
