import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsOrder, Repository } from 'typeorm';
import { Novel } from '../../entities/novel.entity';
import { CACHE_TTL, CacheService } from '../cache/cache.service';
import type { TtlCache } from '../cache/ttl-cache';
import { NovelSort } from './dto/list-novels.dto';
import { NovelSearchResultDto, NovelsPageDto, SitemapEntryDto } from './dto/novel-response.dto';
import { normalizeSearchQuery, novelFromRow, SEARCH_SQL } from './novel-search';

export const NOVELS_PAGE_SIZE = 12;
export const DEFAULT_NOVEL_SORT: NovelSort = 'oldest';

// 白名单排序，每种都对应固定的 ORDER BY
export const NOVEL_SORT_ORDER: Record<NovelSort, FindOptionsOrder<Novel>> = {
  newest: { year_start: 'DESC', title: 'ASC' },
  oldest: { year_start: 'ASC', title: 'ASC' },
  large: { chapters_count: 'DESC', title: 'ASC' },
  small: { chapters_count: 'ASC', title: 'ASC' },
  alphabet: { title_norm: 'ASC' },
  created: { created_at: 'DESC' },
};

@Injectable()
export class NovelsService {
  private readonly logger = new Logger(NovelsService.name);
  private readonly details: TtlCache<Novel>;
  private readonly pages: TtlCache<NovelsPageDto>;
  private readonly sitemap: TtlCache<SitemapEntryDto[]>;

  constructor(
    @InjectRepository(Novel) private readonly novels: Repository<Novel>,
    cache: CacheService,
  ) {
    this.details = cache.region<Novel>('novel', CACHE_TTL.novel);
    this.pages = cache.region<NovelsPageDto>('novels:page', CACHE_TTL.listing);
    this.sitemap = cache.region<SitemapEntryDto[]>('novels:sitemap', CACHE_TTL.sitemap);
  }

  list(page = 1, sort: NovelSort = DEFAULT_NOVEL_SORT): Promise<NovelsPageDto> {
    return this.pages.getOrFetch(`${page}:${sort}`, async () => {
      const total = await this.novels.count();
      const offset = (page - 1) * NOVELS_PAGE_SIZE;
      const totalPages = Math.ceil(total / NOVELS_PAGE_SIZE);
      // 超出末页时返回空列表，但保留真实总数
      if (offset >= total) {
        return { novels: [], page, page_size: NOVELS_PAGE_SIZE, total_count: total, total_pages: totalPages };
      }
      const novels = await this.novels.find({
        order: NOVEL_SORT_ORDER[sort],
        skip: offset,
        take: NOVELS_PAGE_SIZE,
      });
      return { novels, page, page_size: NOVELS_PAGE_SIZE, total_count: total, total_pages: totalPages };
    });
  }

  async search(q: string | undefined): Promise<NovelSearchResultDto> {
    const query = (q ?? '').trim();
    if (!normalizeSearchQuery(query)) return { novels: [], query };

    const rows: unknown = await this.novels.query(SEARCH_SQL, [query]);
    if (!Array.isArray(rows)) return { novels: [], query };
    const novels: Novel[] = [];
    for (const row of rows) {
      const novel = novelFromRow(row);
      if (novel) novels.push(novel);
      else this.logger.warn(`Skipping malformed search row for "${query}"`);
    }
    return { novels, query };
  }

  getOne(id: string): Promise<Novel> {
    return this.details.getOrFetch(id, async () => {
      const novel = await this.novels.findOne({ where: { id } });
      if (!novel) throw new NotFoundException('Novel not found');
      return novel;
    });
  }

  sitemapData(): Promise<SitemapEntryDto[]> {
    return this.sitemap.getOrFetch('all', async () => {
      const rows = await this.novels.find({
        select: { id: true, created_at: true },
        order: { created_at: 'DESC' },
      });
      return rows.map((n) => ({ id: n.id, created_at: n.created_at }));
    });
  }
}
