import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { TtlCache } from './ttl-cache';

const MINUTE = 60 * 1000;

export const CACHE_TTL = {
  novel: 10 * MINUTE,
  chapter: 30 * MINUTE,
  listing: 5 * MINUTE,
  chapterList: 5 * MINUTE,
  sitemap: 60 * MINUTE,
} as const;

const PRUNE_INTERVAL_MS = MINUTE;

@Injectable()
export class CacheService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CacheService.name);
  private readonly regions: TtlCache<unknown>[] = [];
  private pruneTimer?: NodeJS.Timeout;

  region<T>(name: string, ttlMs: number): TtlCache<T> {
    const cache = new TtlCache<T>(name, ttlMs);
    this.regions.push(cache);
    return cache;
  }

  onModuleInit() {
    this.pruneTimer = setInterval(() => this.pruneAll(), PRUNE_INTERVAL_MS);
    this.pruneTimer.unref();
  }

  onModuleDestroy() {
    if (this.pruneTimer) clearInterval(this.pruneTimer);
    this.pruneTimer = undefined;
  }

  pruneAll(): number {
    let removed = 0;
    for (const r of this.regions) removed += r.prune();
    if (removed > 0) this.logger.debug(`Pruned ${removed} expired cache entries`);
    return removed;
  }

  stats(): Record<string, number> {
    return Object.fromEntries(this.regions.map((r) => [r.name, r.size]));
  }
}
