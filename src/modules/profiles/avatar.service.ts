import {
  Injectable,
  Logger,
  UnsupportedMediaTypeException,
} from '@nestjs/common';
import sharp from 'sharp';
import { Semaphore } from '../../utils/semaphore';

export const AVATAR_SIZE = 250;
export const AVATAR_QUALITY = 85;
export const AVATAR_CONCURRENCY = 5;

const ACCEPTED_FORMATS = new Set(['jpeg', 'png']);

@Injectable()
export class AvatarService {
  private readonly logger = new Logger(AvatarService.name);
  // 图像处理占用 CPU 与内存，限制同时处理数量
  private readonly slots = new Semaphore(AVATAR_CONCURRENCY);

  /**
   * Center-crops to a square, scales to 250×250 and re-encodes as JPEG.
   * Rejects with the semaphore's abort error if `signal` fires while waiting.
   */
  async process(input: Buffer, signal?: AbortSignal): Promise<Buffer> {
    return this.slots.run(() => this.render(input), signal);
  }

  private async render(input: Buffer): Promise<Buffer> {
    let format: string | undefined;
    try {
      ({ format } = await sharp(input).metadata());
    } catch (err) {
      this.logger.debug(`Avatar decode failed: ${String(err)}`);
      throw new UnsupportedMediaTypeException('Unsupported or corrupted image');
    }
    if (!format || !ACCEPTED_FORMATS.has(format)) {
      throw new UnsupportedMediaTypeException('Only JPEG and PNG images are accepted');
    }
    // 头部合法但数据截断或损坏时，解码发生在这里
    try {
      return await sharp(input)
        .resize(AVATAR_SIZE, AVATAR_SIZE, {
          fit: 'cover',
          position: 'centre',
          kernel: 'lanczos3',
        })
        .flatten({ background: '#ffffff' })
        .jpeg({ quality: AVATAR_QUALITY })
        .toBuffer();
    } catch (err) {
      this.logger.debug(`Avatar render failed: ${String(err)}`);
      throw new UnsupportedMediaTypeException('Unsupported or corrupted image');
    }
  }
}

const DATA_URL_PREFIX = /^data:[\w.+-]+\/[\w.+-]+;base64,/;

/** Decodes a base64 body (optionally a data: URL). Returns null when nothing decodes. */
export function decodeImagePayload(payload: string): Buffer | null {
  const b64 = payload.trim().replace(DATA_URL_PREFIX, '');
  if (!b64) return null;
  const buf = Buffer.from(b64, 'base64');
  return buf.length > 0 ? buf : null;
}
