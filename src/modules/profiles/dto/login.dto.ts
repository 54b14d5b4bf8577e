import { ApiProperty } from '@nestjs/swagger';
import { IsString, MaxLength } from 'class-validator';

export class LoginWithCodeDto {
  @ApiProperty({ description: 'One-time sync code (case-insensitive)', example: 'K7MQ2XRP' })
  @IsString()
  @MaxLength(32)
  sync_code!: string;
}
