import { ApiProperty } from '@nestjs/swagger';
import { IsString, MaxLength } from 'class-validator';

export class CreateProfileDto {
  @ApiProperty({ description: 'Turnstile widget response token' })
  @IsString()
  @MaxLength(4096)
  turnstile_token!: string;
}
