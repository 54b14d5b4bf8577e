import { Entity, Column, PrimaryColumn, CreateDateColumn } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import type { CookieBag } from '../types/cookie-bag.interface';

@Entity('users')
export class Profile {
  @ApiProperty({ description: 'Profile ID', example: 'usr_a1b2c3d4' })
  @PrimaryColumn({ type: 'varchar', length: 32 })
  id!: string;

  @Column({ type: 'varchar', length: 64, select: false })
  secret_token!: string;

  @ApiProperty({ description: 'Display name' })
  @Column({ type: 'varchar', length: 64 })
  display_name!: string;

  @ApiProperty({ description: 'Identicon seed' })
  @Column({ type: 'varchar', length: 32 })
  avatar_seed!: string;

  @ApiProperty({ description: 'Whether an uploaded avatar exists' })
  @Column({ type: 'boolean', default: false })
  has_custom_avatar!: boolean;

  @Column({ type: 'jsonb', default: () => `'{}'::jsonb`, select: false })
  cookies!: CookieBag;

  @Column({ type: 'varchar', length: 16, nullable: true, unique: true, select: false })
  sync_code!: string | null;

  @Column({ type: 'timestamptz', nullable: true, select: false })
  sync_code_expires_at!: Date | null;

  @ApiProperty({ description: 'Creation timestamp' })
  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @Column({ type: 'timestamptz', default: () => 'now()' })
  last_active_at!: Date;
}
