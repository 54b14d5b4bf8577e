import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Comment } from '../../entities/comment.entity';
import { TelegramService } from './telegram.service';
import { isModerationAction, MODERATION_ACTIONS } from './telegram-format';
import type { ModerationCallback } from './telegram-update';

export type CallbackResult = 'ignored' | 'updated' | 'unchanged';

@Injectable()
export class ModerationService {
  private readonly logger = new Logger(ModerationService.name);

  constructor(
    @InjectRepository(Comment) private readonly comments: Repository<Comment>,
    private readonly telegram: TelegramService,
  ) {}

  async handleModerationCallback(cb: ModerationCallback): Promise<CallbackResult> {
    if (!isModerationAction(cb.action)) return 'ignored';
    const { status, result } = MODERATION_ACTIONS[cb.action];

    // 仅 pending 可以流转，approved / rejected 为终态
    let affected: number;
    try {
      const res = await this.comments.update({ id: cb.commentId, status: 'pending' }, { status });
      affected = res.affected ?? 0;
    } catch (err) {
      this.logger.error(`Failed to update comment ${cb.commentId} via webhook`, err);
      return 'ignored';
    }

    if (affected === 0) {
      this.logger.warn(`Comment ${cb.commentId} is missing or already moderated`);
      await this.answer(cb.callbackId, 'Already moderated');
      return 'unchanged';
    }
    this.logger.log(`Comment ${cb.commentId} status updated to ${status}`);

    if (cb.message) {
      try {
        await this.telegram.editMessageText(cb.message.messageId, `${cb.message.text}\n\n${result}`);
      } catch (err) {
        this.logger.warn(`Failed to edit moderation message ${cb.message.messageId}: ${String(err)}`);
      }
    }
    await this.answer(cb.callbackId, result);
    return 'updated';
  }

  private async answer(callbackId: string, text: string): Promise<void> {
    try {
      await this.telegram.answerCallbackQuery(callbackId, text);
    } catch (err) {
      this.logger.warn(`Failed to answer callback ${callbackId}: ${String(err)}`);
    }
  }
}
