import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class PublicProfileDto {
  @ApiProperty({ example: 'usr_a1b2c3d4' })
  id!: string;

  @ApiProperty({ example: 'Quiet Owl' })
  display_name!: string;

  @ApiProperty({ example: '9f86d081884c7d65' })
  avatar_seed!: string;

  @ApiProperty()
  has_custom_avatar!: boolean;

  @ApiPropertyOptional({ nullable: true, type: String })
  avatar_url!: string | null;

  @ApiProperty()
  created_at!: Date;
}

export class ProfileWithTokenDto extends PublicProfileDto {
  @ApiProperty({ description: 'Keep this secret; it authenticates the profile' })
  secret_token!: string;
}

export class SyncCodeResponseDto {
  @ApiProperty({ example: 'K7MQ2XRP' })
  sync_code!: string;

  @ApiProperty({ description: 'ISO-8601 expiry (15 minutes after issue)' })
  expires_at!: string;
}

export class LoginResponseDto {
  @ApiProperty({ type: PublicProfileDto })
  profile!: PublicProfileDto;

  @ApiProperty()
  secret_token!: string;

  @ApiProperty({ description: 'Stored cookie bag' })
  cookies!: Record<string, { value: string; updated_at: number }>;
}
