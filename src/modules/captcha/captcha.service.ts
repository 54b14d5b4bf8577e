import { BadGatewayException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AxiosInstance } from 'axios';
import { HTTP_CLIENT } from '../http/tokens';

export type CaptchaScope = 'profile' | 'comment';

const DEFAULT_VERIFY_URL =
  'https://challenges.cloudflare.com/turnstile/v0/siteverify';

interface SiteVerifyResponse {
  success?: boolean;
  'error-codes'?: string[];
}

/** Turnstile site-verify client. Profile and comment widgets use separate secrets. */
@Injectable()
export class CaptchaService {
  private readonly logger = new Logger(CaptchaService.name);

  constructor(
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
    private readonly config: ConfigService,
  ) {}

  private secretFor(scope: CaptchaScope): string {
    const key = scope === 'comment' ? 'TURNSTILE_COMMENTS_SECRET' : 'TURNSTILE_SECRET';
    return this.config.get<string>(key, '');
  }

  async verify(token: string, scope: CaptchaScope): Promise<boolean> {
    const secret = this.secretFor(scope);
    if (!secret) {
      this.logger.warn(`Turnstile secret for "${scope}" is not configured, rejecting`);
      return false;
    }
    if (!token) return false;

    const url = this.config.get<string>('TURNSTILE_VERIFY_URL', DEFAULT_VERIFY_URL);
    const form = new URLSearchParams({ secret, response: token });
    let data: SiteVerifyResponse;
    try {
      const res = await this.http.post<SiteVerifyResponse>(url, form.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        timeout: 10_000,
      });
      data = res.data;
    } catch (err) {
      this.logger.error('Turnstile verification request failed', err);
      throw new BadGatewayException('Captcha verification unavailable');
    }
    if (data.success !== true) {
      this.logger.debug(
        `Turnstile rejected token: ${(data['error-codes'] ?? []).join(',') || 'unknown'}`,
      );
      return false;
    }
    return true;
  }
}
