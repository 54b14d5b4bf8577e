import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Comment } from '../../entities/comment.entity';
import { TelegramService } from './telegram.service';
import { ModerationQueueService } from './moderation-queue.service';
import { ModerationService } from './moderation.service';
import { TelegramWebhookController } from './telegram-webhook.controller';

@Module({
  imports: [TypeOrmModule.forFeature([Comment])],
  controllers: [TelegramWebhookController],
  providers: [TelegramService, ModerationQueueService, ModerationService],
  exports: [ModerationQueueService],
})
export class ModerationModule {}
