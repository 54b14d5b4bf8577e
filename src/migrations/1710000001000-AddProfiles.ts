import { MigrationInterface, QueryRunner } from 'typeorm';

export class AddProfiles1710000001000 implements MigrationInterface {
  name = 'AddProfiles1710000001000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS users (
        id VARCHAR(32) PRIMARY KEY DEFAULT generate_short_id('usr_'),
        secret_token VARCHAR(64) NOT NULL,
        display_name VARCHAR(64) NOT NULL,
        avatar_seed VARCHAR(32) NOT NULL,
        has_custom_avatar BOOLEAN NOT NULL DEFAULT false,
        cookies JSONB NOT NULL DEFAULT '{}'::jsonb,
        sync_code VARCHAR(16) UNIQUE,
        sync_code_expires_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        last_active_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_users_sync_code ON users (sync_code) WHERE sync_code IS NOT NULL`,
    );
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_users_last_active ON users (last_active_at)`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS users`);
  }
}
