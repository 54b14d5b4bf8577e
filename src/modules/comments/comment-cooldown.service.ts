import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';

export const COMMENT_COOLDOWN_MS = 30 * 1000;
const SWEEP_INTERVAL_MS = 5 * 60 * 1000;
const SWEEP_MAX_AGE_MS = 5 * 60 * 1000;

export type CooldownRelease = () => void;

/**
 * Per-author comment cooldown. A slot is reserved up front and released if
 * the comment is not created, so two parallel submissions cannot both pass.
 */
@Injectable()
export class CommentCooldownService implements OnModuleInit, OnModuleDestroy {
  private readonly lastComment = new Map<string, number>();
  private sweepTimer?: NodeJS.Timeout;

  onModuleInit() {
    this.sweepTimer = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();
  }

  onModuleDestroy() {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = undefined;
  }

  /** Returns null while the author is cooling down. */
  tryAcquire(authorId: string): CooldownRelease | null {
    const now = Date.now();
    const previous = this.lastComment.get(authorId);
    if (previous !== undefined && now - previous < COMMENT_COOLDOWN_MS) {
      return null;
    }
    this.lastComment.set(authorId, now);
    return () => {
      // 只回滚自己写入的值
      if (this.lastComment.get(authorId) !== now) return;
      if (previous === undefined) this.lastComment.delete(authorId);
      else this.lastComment.set(authorId, previous);
    };
  }

  sweep(): number {
    const now = Date.now();
    let removed = 0;
    for (const [authorId, at] of this.lastComment) {
      if (now - at > SWEEP_MAX_AGE_MS) {
        this.lastComment.delete(authorId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.lastComment.size;
  }
}
