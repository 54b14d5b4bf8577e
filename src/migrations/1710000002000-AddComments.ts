import { MigrationInterface, QueryRunner } from 'typeorm';

export class AddComments1710000002000 implements MigrationInterface {
  name = 'AddComments1710000002000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS comments (
        id VARCHAR(32) PRIMARY KEY DEFAULT generate_short_id('cmt_'),
        chapter_id VARCHAR(32) NOT NULL REFERENCES chapters(id) ON DELETE CASCADE,
        user_id VARCHAR(32) NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        content_html TEXT NOT NULL,
        status VARCHAR(16) NOT NULL DEFAULT 'pending'
          CHECK (status IN ('pending', 'approved', 'rejected')),
        moderation_message_id BIGINT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_comments_user_id ON comments (user_id)`);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_comments_chapter_status_created ON comments (chapter_id, status, created_at DESC)`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS comments`);
  }
}
