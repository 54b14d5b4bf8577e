import { BadGatewayException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { CaptchaService } from '../captcha.service';
import { HTTP_CLIENT } from '../../http/tokens';

describe('CaptchaService', () => {
  let service: CaptchaService;
  const env: Record<string, string> = {};
  const http = { post: jest.fn() };
  const config = {
    get: jest.fn((key: string, def?: string) => env[key] ?? def),
  };

  beforeEach(async () => {
    for (const k of Object.keys(env)) delete env[k];
    env.TURNSTILE_SECRET = 'test-secret';
    env.TURNSTILE_COMMENTS_SECRET = 'test-comments-secret';
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CaptchaService,
        { provide: HTTP_CLIENT, useValue: http },
        { provide: ConfigService, useValue: config },
      ],
    }).compile();
    service = module.get(CaptchaService);
  });

  afterEach(() => jest.clearAllMocks());

  it('posts the profile secret as a form and accepts success', async () => {
    http.post.mockResolvedValueOnce({ data: { success: true } });
    await expect(service.verify('tok', 'profile')).resolves.toBe(true);
    expect(http.post).toHaveBeenCalledWith(
      'https://challenges.cloudflare.com/turnstile/v0/siteverify',
      'secret=test-secret&response=tok',
      expect.objectContaining({
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      }),
    );
  });

  it('uses the comments secret for comment scope', async () => {
    http.post.mockResolvedValueOnce({ data: { success: true } });
    await service.verify('tok', 'comment');
    expect(http.post.mock.calls[0][1]).toBe(
      'secret=test-comments-secret&response=tok',
    );
  });

  it('returns false when the verifier says no', async () => {
    http.post.mockResolvedValueOnce({
      data: { success: false, 'error-codes': ['invalid-input-response'] },
    });
    await expect(service.verify('bad', 'profile')).resolves.toBe(false);
  });

  it('rejects without calling out when the secret is missing', async () => {
    delete env.TURNSTILE_SECRET;
    await expect(service.verify('tok', 'profile')).resolves.toBe(false);
    expect(http.post).not.toHaveBeenCalled();
  });

  it('rejects an empty token without calling out', async () => {
    await expect(service.verify('', 'profile')).resolves.toBe(false);
    expect(http.post).not.toHaveBeenCalled();
  });

  it('maps transport failures to 502', async () => {
    http.post.mockRejectedValueOnce(new Error('ECONNRESET'));
    await expect(service.verify('tok', 'comment')).rejects.toBeInstanceOf(
      BadGatewayException,
    );
  });
});
