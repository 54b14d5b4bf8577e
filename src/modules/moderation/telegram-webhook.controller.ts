import {
  Body,
  Controller,
  ForbiddenException,
  Headers,
  HttpCode,
  Logger,
  Post,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { safeEqual } from '../../utils/constant-time';
import { TELEGRAM_SECRET_HEADER } from '../../types/request.interface';
import { TelegramService } from './telegram.service';
import { ModerationService } from './moderation.service';
import { parseModerationCallback } from './telegram-update';
import { TelegramUpdateDto } from './dto/telegram-update.dto';

@ApiTags('webhook')
@SkipThrottle()
@Controller('webhook')
export class TelegramWebhookController {
  private readonly logger = new Logger(TelegramWebhookController.name);

  constructor(
    private readonly telegram: TelegramService,
    private readonly moderation: ModerationService,
  ) {}

  @Post('telegram')
  @HttpCode(200)
  @ApiOperation({ summary: 'Telegram bot webhook (moderation buttons)' })
  @ApiHeader({ name: 'X-Telegram-Bot-Api-Secret-Token', required: true })
  @ApiResponse({ status: 200, description: 'Update acknowledged', schema: { example: {} } })
  @ApiResponse({ status: 403, description: 'Invalid webhook secret' })
  async telegramUpdate(
    @Headers(TELEGRAM_SECRET_HEADER) secret: string | undefined,
    @Body() update: TelegramUpdateDto,
  ) {
    const expected = this.telegram.webhookSecret;
    // 未配置密钥时拒绝所有请求
    if (!expected || !secret || !safeEqual(expected, secret)) {
      this.logger.warn('Rejected webhook call with invalid secret');
      throw new ForbiddenException('Invalid webhook secret');
    }
    const callback = parseModerationCallback(update);
    if (callback) await this.moderation.handleModerationCallback(callback);
    return {};
  }
}
