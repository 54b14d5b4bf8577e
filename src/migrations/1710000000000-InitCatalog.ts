import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitCatalog1710000000000 implements MigrationInterface {
  name = 'InitCatalog1710000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS pg_trgm`);

    // 管理脚本直接写库时使用；应用层自行生成 ID
    await queryRunner.query(`
      CREATE OR REPLACE FUNCTION generate_short_id(prefix TEXT)
      RETURNS TEXT AS $$
      DECLARE
        chars TEXT := 'abcdefghijklmnopqrstuvwxyz0123456789';
        result TEXT := prefix;
        i INTEGER;
      BEGIN
        FOR i IN 1..8 LOOP
          result := result || substr(chars, floor(random() * length(chars) + 1)::integer, 1);
        END LOOP;
        RETURN result;
      END;
      $$ LANGUAGE plpgsql
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS novels (
        id VARCHAR(32) PRIMARY KEY DEFAULT generate_short_id('nvl_'),
        title TEXT NOT NULL,
        title_en TEXT NOT NULL,
        author TEXT NOT NULL,
        year_start INTEGER NOT NULL,
        year_end INTEGER,
        status VARCHAR(16) NOT NULL DEFAULT 'ongoing'
          CHECK (status IN ('ongoing', 'completed', 'announced')),
        description TEXT,
        age_rating VARCHAR(8),
        cover_url TEXT,
        chapters_count INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        title_norm TEXT GENERATED ALWAYS AS (lower(regexp_replace(title, '[^[:alnum:]]', '', 'g'))) STORED,
        title_en_norm TEXT GENERATED ALWAYS AS (lower(regexp_replace(title_en, '[^[:alnum:]]', '', 'g'))) STORED,
        author_norm TEXT GENERATED ALWAYS AS (lower(regexp_replace(author, '[^[:alnum:]]', '', 'g'))) STORED
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_novels_trgm_search ON novels USING gin (title_norm gin_trgm_ops, title_en_norm gin_trgm_ops, author_norm gin_trgm_ops)`,
    );
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_novels_year_title ON novels (year_start, title)`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_novels_created_at ON novels (created_at DESC)`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_novels_chapters_count ON novels (chapters_count DESC)`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_novels_title_norm ON novels (title_norm)`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS sources (
        id VARCHAR(32) PRIMARY KEY DEFAULT generate_short_id('src_'),
        name TEXT NOT NULL UNIQUE,
        logo_url TEXT
      )
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS chapters (
        id VARCHAR(32) PRIMARY KEY DEFAULT generate_short_id('chp_'),
        novel_id VARCHAR(32) NOT NULL REFERENCES novels(id) ON DELETE CASCADE,
        chapter_num INTEGER NOT NULL,
        title TEXT NOT NULL,
        title_en TEXT,
        content TEXT NOT NULL,
        source_id VARCHAR(32) REFERENCES sources(id) ON DELETE SET NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        UNIQUE (novel_id, chapter_num)
      )
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_chapters_source_id ON chapters (source_id)`);

    await queryRunner.query(`
      CREATE OR REPLACE FUNCTION update_novel_chapter_count() RETURNS TRIGGER AS $$
      BEGIN
        IF (TG_OP = 'INSERT') THEN
          UPDATE novels SET chapters_count = chapters_count + 1 WHERE id = NEW.novel_id;
        ELSIF (TG_OP = 'DELETE') THEN
          UPDATE novels SET chapters_count = chapters_count - 1 WHERE id = OLD.novel_id;
        END IF;
        RETURN NULL;
      END;
      $$ LANGUAGE plpgsql
    `);
    await queryRunner.query(`DROP TRIGGER IF EXISTS trg_update_novel_chapter_count ON chapters`);
    await queryRunner.query(`
      CREATE TRIGGER trg_update_novel_chapter_count
      AFTER INSERT OR DELETE ON chapters
      FOR EACH ROW EXECUTE FUNCTION update_novel_chapter_count()
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TRIGGER IF EXISTS trg_update_novel_chapter_count ON chapters`);
    await queryRunner.query(`DROP FUNCTION IF EXISTS update_novel_chapter_count()`);
    await queryRunner.query(`DROP TABLE IF EXISTS chapters`);
    await queryRunner.query(`DROP TABLE IF EXISTS sources`);
    await queryRunner.query(`DROP TABLE IF EXISTS novels`);
    await queryRunner.query(`DROP FUNCTION IF EXISTS generate_short_id(TEXT)`);
  }
}
