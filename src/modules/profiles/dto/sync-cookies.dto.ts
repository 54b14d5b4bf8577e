import { ApiProperty } from '@nestjs/swagger';
import { IsObject } from 'class-validator';
import type { CookieBag } from '../../../types/cookie-bag.interface';

export class SyncCookiesDto {
  @ApiProperty({
    description:
      'Client preferences keyed by cookie name. Entries with invalid names or values are ignored.',
    example: { inkwell_theme: { value: 'dark', updated_at: 1717000000000 } },
  })
  @IsObject()
  cookies!: CookieBag;
}
