import { normalizeSearchQuery, novelFromRow, SEARCH_SQL } from '../novel-search';

describe('normalizeSearchQuery', () => {
  it('keeps only lower-cased letters and digits', () => {
    expect(normalizeSearchQuery('The Lord-of 2 Rings!')).toBe('thelordof2rings');
  });

  it('keeps non-latin letters', () => {
    expect(normalizeSearchQuery('Ночной Дозор')).toBe('ночнойдозор');
  });

  it('reduces punctuation-only input to empty', () => {
    expect(normalizeSearchQuery('?!-')).toBe('');
  });
});

describe('novelFromRow', () => {
  const row = {
    id: 'nvl_aaaa1111',
    title: 'Lantern Road',
    title_en: 'Lantern Road',
    author: 'M. Reyes',
    year_start: 2015,
    year_end: 2019,
    status: 'completed',
    description: 'A road.',
    age_rating: '16+',
    cover_url: null,
    chapters_count: 40,
    created_at: new Date('2024-01-01T00:00:00Z'),
    relevance: 3.1,
  };

  it('maps a complete row', () => {
    const novel = novelFromRow(row);
    expect(novel).toMatchObject({
      id: 'nvl_aaaa1111',
      year_end: 2019,
      status: 'completed',
      description: 'A road.',
      cover_url: null,
      chapters_count: 40,
    });
    expect(novel).not.toHaveProperty('relevance');
  });

  it('rejects rows with an unknown status', () => {
    expect(novelFromRow({ ...row, status: 'paused' })).toBeNull();
  });

  it('rejects non-objects', () => {
    expect(novelFromRow('nope')).toBeNull();
  });
});

describe('SEARCH_SQL', () => {
  it('normalizes the parameter with the generated-column expression', () => {
    expect(SEARCH_SQL).toContain("lower(regexp_replace($1, '[^[:alnum:]]', '', 'g')) AS norm");
    expect(SEARCH_SQL).toContain('LIMIT 20');
  });
});
