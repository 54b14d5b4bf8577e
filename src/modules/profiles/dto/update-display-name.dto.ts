import { ApiProperty } from '@nestjs/swagger';
import { IsString, MaxLength } from 'class-validator';

export class UpdateDisplayNameDto {
  @ApiProperty({ description: 'New display name (letters, digits, spaces; max 15)', example: 'Quiet Owl' })
  @IsString()
  @MaxLength(256)
  display_name!: string;
}
