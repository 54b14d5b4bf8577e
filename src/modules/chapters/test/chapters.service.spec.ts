import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Chapter } from '../../../entities/chapter.entity';
import { CacheService } from '../../cache/cache.service';
import { ChaptersService } from '../chapters.service';
import { createRepoMock, RepoMock } from '../../../../test/repo-mocks';

function chapter(overrides: Partial<Chapter> = {}): Chapter {
  return {
    id: 'chp_aaaa1111',
    novel_id: 'nvl_aaaa1111',
    chapter_num: 1,
    title: 'Departure',
    title_en: null,
    content: 'It began at dusk.',
    source_id: null,
    source: null,
    created_at: new Date('2024-01-02T00:00:00Z'),
    ...overrides,
  };
}

describe('ChaptersService', () => {
  let service: ChaptersService;
  let repo: RepoMock<Chapter>;

  beforeEach(async () => {
    repo = createRepoMock<Chapter>();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChaptersService,
        CacheService,
        { provide: getRepositoryToken(Chapter), useValue: repo },
      ],
    }).compile();
    service = module.get(ChaptersService);
  });

  it('lists chapters by number with a count', async () => {
    repo.find.mockResolvedValueOnce([
      chapter(),
      chapter({ id: 'chp_bbbb2222', chapter_num: 2, title: 'Crossing', title_en: 'Crossing' }),
    ]);

    await expect(service.listByNovel('nvl_aaaa1111')).resolves.toEqual({
      chapters: [
        { id: 'chp_aaaa1111', chapter_num: 1, title: 'Departure', title_en: null },
        { id: 'chp_bbbb2222', chapter_num: 2, title: 'Crossing', title_en: 'Crossing' },
      ],
      novel_id: 'nvl_aaaa1111',
      count: 2,
    });
    expect(repo.find).toHaveBeenCalledWith({
      where: { novel_id: 'nvl_aaaa1111' },
      select: { id: true, chapter_num: true, title: true, title_en: true },
      order: { chapter_num: 'ASC' },
    });
  });

  it('returns an empty list for an unknown novel', async () => {
    repo.find.mockResolvedValueOnce([]);
    await expect(service.listByNovel('nvl_missing0')).resolves.toEqual({
      chapters: [],
      novel_id: 'nvl_missing0',
      count: 0,
    });
  });

  it('includes the source attribution', async () => {
    repo.findOne.mockResolvedValueOnce(
      chapter({
        source_id: 'src_aaaa1111',
        source: { id: 'src_aaaa1111', name: 'Night Shift', logo_url: 'https://cdn.test/ns.png' },
      }),
    );
    const detail = await service.getOne('chp_aaaa1111');
    expect(detail.source).toEqual({ name: 'Night Shift', logo_url: 'https://cdn.test/ns.png' });
    expect(detail.content).toBe('It began at dusk.');
    expect(detail).not.toHaveProperty('source_id');
  });

  it('reports a null source when none is linked', async () => {
    repo.findOne.mockResolvedValueOnce(chapter());
    await expect(service.getOne('chp_aaaa1111')).resolves.toMatchObject({ source: null });
  });

  it('throws 404 for an unknown chapter', async () => {
    repo.findOne.mockResolvedValueOnce(null);
    await expect(service.getOne('chp_missing0')).rejects.toBeInstanceOf(NotFoundException);
  });

  it('serves repeated reads from cache', async () => {
    repo.findOne.mockResolvedValueOnce(chapter());
    await service.getOne('chp_aaaa1111');
    await service.getOne('chp_aaaa1111');
    expect(repo.findOne).toHaveBeenCalledTimes(1);
  });
});
