import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class UpdateAvatarDto {
  @ApiProperty({
    description: 'JPEG or PNG image, base64-encoded (a data: URL prefix is accepted)',
  })
  @IsString()
  @IsNotEmpty()
  image!: string;
}
