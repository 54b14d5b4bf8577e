import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Chapter } from '../../entities/chapter.entity';
import { CACHE_TTL, CacheService } from '../cache/cache.service';
import type { TtlCache } from '../cache/ttl-cache';
import { ChapterDetailDto, ChapterListDto } from './dto/chapter-response.dto';

@Injectable()
export class ChaptersService {
  private readonly lists: TtlCache<ChapterListDto>;
  private readonly details: TtlCache<ChapterDetailDto>;

  constructor(
    @InjectRepository(Chapter) private readonly chapters: Repository<Chapter>,
    cache: CacheService,
  ) {
    this.lists = cache.region<ChapterListDto>('chapters:list', CACHE_TTL.chapterList);
    this.details = cache.region<ChapterDetailDto>('chapter', CACHE_TTL.chapter);
  }

  // 未知小说返回空列表
  listByNovel(novelId: string): Promise<ChapterListDto> {
    return this.lists.getOrFetch(novelId, async () => {
      const rows = await this.chapters.find({
        where: { novel_id: novelId },
        select: { id: true, chapter_num: true, title: true, title_en: true },
        order: { chapter_num: 'ASC' },
      });
      const chapters = rows.map((c) => ({
        id: c.id,
        chapter_num: c.chapter_num,
        title: c.title,
        title_en: c.title_en,
      }));
      return { chapters, novel_id: novelId, count: chapters.length };
    });
  }

  getOne(id: string): Promise<ChapterDetailDto> {
    return this.details.getOrFetch(id, async () => {
      const c = await this.chapters.findOne({ where: { id }, relations: { source: true } });
      if (!c) throw new NotFoundException('Chapter not found');
      return {
        id: c.id,
        novel_id: c.novel_id,
        chapter_num: c.chapter_num,
        title: c.title,
        title_en: c.title_en,
        content: c.content,
        created_at: c.created_at,
        source: c.source ? { name: c.source.name, logo_url: c.source.logo_url } : null,
      };
    });
  }
}
