import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { setTimeout as sleep } from 'timers/promises';
import { Comment } from '../../entities/comment.entity';
import { TelegramService } from './telegram.service';
import {
  buildModerationText,
  ModerationNotice,
  moderationKeyboard,
} from './telegram-format';

export type ModerationOutcome =
  | { status: 'delivered'; messageId: number; attempts: number }
  | { status: 'failed'; attempts: number; error: string }
  | { status: 'skipped'; reason: string };

export interface ModerationTask {
  commentId: string;
  /** Never rejects. */
  done: Promise<ModerationOutcome>;
}

export interface ModerationQueueStats {
  queued: number;
  delivered: number;
  failed: number;
  skipped: number;
  inFlight: number;
}

/**
 * Delivers moderation notices in the background. Each task is detached from
 * the request that created it; attempts are bounded and the outcome is
 * observable through the returned handle.
 */
@Injectable()
export class ModerationQueueService implements OnApplicationShutdown {
  private readonly logger = new Logger(ModerationQueueService.name);
  private readonly inFlight = new Set<Promise<ModerationOutcome>>();
  private readonly counters = { queued: 0, delivered: 0, failed: 0, skipped: 0 };
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly telegram: TelegramService,
    @InjectRepository(Comment) private readonly comments: Repository<Comment>,
    config: ConfigService,
  ) {
    this.maxAttempts = Math.max(1, Number(config.get<string>('MODERATION_MAX_ATTEMPTS', '3')) || 1);
    this.retryDelayMs = Math.max(0, Number(config.get<string>('MODERATION_RETRY_DELAY_MS', '1000')) || 0);
  }

  enqueue(notice: ModerationNotice): ModerationTask {
    this.counters.queued++;
    const done: Promise<ModerationOutcome> = this.deliver(notice).finally(() => {
      this.inFlight.delete(done);
    });
    this.inFlight.add(done);
    return { commentId: notice.commentId, done };
  }

  stats(): ModerationQueueStats {
    return { ...this.counters, inFlight: this.inFlight.size };
  }

  async onApplicationShutdown() {
    if (this.inFlight.size === 0) return;
    this.logger.log(`Waiting for ${this.inFlight.size} moderation deliveries`);
    await Promise.allSettled([...this.inFlight]);
  }

  private async deliver(notice: ModerationNotice): Promise<ModerationOutcome> {
    if (!this.telegram.isConfigured()) {
      this.counters.skipped++;
      this.logger.warn('Telegram credentials not set, skipping moderation notice');
      return { status: 'skipped', reason: 'telegram not configured' };
    }

    const text = buildModerationText(notice);
    const keyboard = moderationKeyboard(notice.commentId);
    let lastError = 'unknown error';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const messageId = await this.telegram.sendMessage(text, keyboard);
        await this.recordMessageId(notice.commentId, messageId);
        this.counters.delivered++;
        return { status: 'delivered', messageId, attempts: attempt };
      } catch (err) {
        lastError = err instanceof Error ? err.message : String(err);
        this.logger.warn(
          `Moderation notice for ${notice.commentId} failed (attempt ${attempt}/${this.maxAttempts}): ${lastError}`,
        );
        if (attempt < this.maxAttempts) await sleep(this.retryDelayMs * attempt);
      }
    }

    this.counters.failed++;
    this.logger.error(`Giving up on moderation notice for ${notice.commentId}: ${lastError}`);
    return { status: 'failed', attempts: this.maxAttempts, error: lastError };
  }

  // 消息已送达，记录失败不再重发
  private async recordMessageId(commentId: string, messageId: number): Promise<void> {
    try {
      await this.comments.update({ id: commentId }, { moderation_message_id: String(messageId) });
    } catch (err) {
      this.logger.error(`Failed to store moderation message id for ${commentId}`, err);
    }
  }
}
