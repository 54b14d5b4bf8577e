import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AxiosInstance } from 'axios';
import { HTTP_CLIENT } from '../http/tokens';
import type { InlineKeyboardMarkup } from './telegram-format';

interface TelegramResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
}

interface SentMessage {
  message_id: number;
}

const REQUEST_TIMEOUT_MS = 10_000;

export class TelegramApiError extends Error {
  constructor(method: string, description: string) {
    super(`Telegram ${method} failed: ${description}`);
    this.name = 'TelegramApiError';
  }
}

/** Thin Bot API client. Every call throws on transport errors or `ok: false`. */
@Injectable()
export class TelegramService {
  private readonly logger = new Logger(TelegramService.name);
  private readonly apiUrl: string;
  private readonly botToken: string;
  private readonly chatId: string;
  readonly webhookSecret: string;

  constructor(
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
    config: ConfigService,
  ) {
    this.apiUrl = config
      .get<string>('TELEGRAM_API_URL', 'https://api.telegram.org')
      .replace(/\/$/, '');
    this.botToken = config.get<string>('TELEGRAM_BOT_TOKEN', '');
    this.chatId = config.get<string>('TELEGRAM_CHAT_ID', '');
    this.webhookSecret = config.get<string>('TELEGRAM_WEBHOOK_SECRET', '');
    if (!this.webhookSecret) {
      this.logger.warn('TELEGRAM_WEBHOOK_SECRET is not set; moderation webhook will reject all calls');
    }
  }

  isConfigured(): boolean {
    return Boolean(this.botToken && this.chatId);
  }

  private async call<T>(method: string, payload: Record<string, unknown>): Promise<T> {
    const url = `${this.apiUrl}/bot${this.botToken}/${method}`;
    const res = await this.http.post<TelegramResponse<T>>(url, payload, {
      timeout: REQUEST_TIMEOUT_MS,
      // Bot API 以 ok 字段表示结果，4xx 也需要读取 description
      validateStatus: () => true,
    });
    const body = res.data;
    if (!body || body.ok !== true || body.result === undefined) {
      throw new TelegramApiError(method, body?.description ?? `HTTP ${res.status}`);
    }
    return body.result;
  }

  async sendMessage(text: string, replyMarkup?: InlineKeyboardMarkup): Promise<number> {
    const sent = await this.call<SentMessage>('sendMessage', {
      chat_id: this.chatId,
      text,
      parse_mode: 'HTML',
      disable_web_page_preview: true,
      ...(replyMarkup ? { reply_markup: replyMarkup } : {}),
    });
    return sent.message_id;
  }

  // 不带 reply_markup，编辑后按钮随之移除
  async editMessageText(messageId: number, text: string): Promise<void> {
    await this.call<unknown>('editMessageText', {
      chat_id: this.chatId,
      message_id: messageId,
      text,
    });
  }

  async answerCallbackQuery(callbackQueryId: string, text: string): Promise<void> {
    await this.call<boolean>('answerCallbackQuery', {
      callback_query_id: callbackQueryId,
      text,
    });
  }
}
