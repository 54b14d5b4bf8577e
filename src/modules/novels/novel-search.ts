import { Novel, NOVEL_STATUSES, NovelStatus } from '../../entities/novel.entity';

export const SEARCH_LIMIT = 20;

/**
 * Lower-case letters and digits only. Used to skip queries with nothing
 * searchable; the query itself is normalized in SQL, like the `*_norm` columns.
 */
export function normalizeSearchQuery(q: string): string {
  return q.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
}

// 标题权重高于英文标题，作者最低
export const SEARCH_SQL = `
WITH q AS (
  SELECT lower(regexp_replace($1, '[^[:alnum:]]', '', 'g')) AS norm
)
SELECT
  n.id, n.title, n.title_en, n.author, n.year_start, n.year_end, n.status,
  n.description, n.age_rating, n.cover_url, n.chapters_count, n.created_at,
  (
    word_similarity(q.norm, n.title_norm) * 2.5 +
    word_similarity(q.norm, n.title_en_norm) * 2.0 +
    similarity(n.author_norm, q.norm) * 1.0
  ) AS relevance
FROM novels n, q
WHERE q.norm <% n.title_norm OR q.norm <% n.title_en_norm OR n.author_norm % q.norm
ORDER BY relevance DESC, n.created_at DESC
LIMIT ${SEARCH_LIMIT}`;

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null;
}

function isNovelStatus(val: unknown): val is NovelStatus {
  return NOVEL_STATUSES.some((s) => s === val);
}

function nullableString(val: unknown): string | null {
  return typeof val === 'string' ? val : null;
}

/** Maps one raw search row onto the entity shape; malformed rows yield null. */
export function novelFromRow(row: unknown): Novel | null {
  if (!isRecord(row)) return null;
  const { id, title, title_en, author, year_start, year_end, status, chapters_count, created_at } = row;
  if (
    typeof id !== 'string' ||
    typeof title !== 'string' ||
    typeof title_en !== 'string' ||
    typeof author !== 'string' ||
    typeof year_start !== 'number' ||
    !isNovelStatus(status) ||
    !(created_at instanceof Date)
  ) {
    return null;
  }
  const novel = new Novel();
  novel.id = id;
  novel.title = title;
  novel.title_en = title_en;
  novel.author = author;
  novel.year_start = year_start;
  novel.year_end = typeof year_end === 'number' ? year_end : null;
  novel.status = status;
  novel.description = nullableString(row.description);
  novel.age_rating = nullableString(row.age_rating);
  novel.cover_url = nullableString(row.cover_url);
  novel.chapters_count = typeof chapters_count === 'number' ? chapters_count : 0;
  novel.created_at = created_at;
  return novel;
}
