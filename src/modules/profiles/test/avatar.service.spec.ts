import { UnsupportedMediaTypeException } from '@nestjs/common';
import sharp from 'sharp';
import { AvatarService, decodeImagePayload } from '../avatar.service';

function solid(width: number, height: number) {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } },
  });
}

describe('AvatarService', () => {
  const service = new AvatarService();

  it('crops a wide PNG to a 250×250 JPEG', async () => {
    const input = await solid(600, 200).png().toBuffer();
    const out = await service.process(input);
    const meta = await sharp(out).metadata();
    expect(meta.format).toBe('jpeg');
    expect(meta.width).toBe(250);
    expect(meta.height).toBe(250);
  });

  it('crops a 3000×1000 JPEG to 250×250', async () => {
    const input = await solid(3000, 1000).jpeg().toBuffer();
    const meta = await sharp(await service.process(input)).metadata();
    expect(meta.format).toBe('jpeg');
    expect([meta.width, meta.height]).toEqual([250, 250]);
  });

  it('upscales a small tall JPEG to 250×250', async () => {
    const input = await solid(40, 90).jpeg().toBuffer();
    const meta = await sharp(await service.process(input)).metadata();
    expect([meta.width, meta.height]).toEqual([250, 250]);
  });

  it('rejects WebP with 415', async () => {
    const input = await solid(50, 50).webp().toBuffer();
    await expect(service.process(input)).rejects.toBeInstanceOf(
      UnsupportedMediaTypeException,
    );
  });

  it('rejects a JPEG whose body is truncated with 415', async () => {
    const full = await solid(3000, 1000).jpeg().toBuffer();
    const truncated = full.subarray(0, Math.floor(full.length / 2));
    await expect(service.process(truncated)).rejects.toBeInstanceOf(
      UnsupportedMediaTypeException,
    );
  });

  it('rejects a PNG whose body is truncated with 415', async () => {
    const full = await solid(3000, 1000).png().toBuffer();
    const truncated = full.subarray(0, Math.floor(full.length / 2));
    await expect(service.process(truncated)).rejects.toBeInstanceOf(
      UnsupportedMediaTypeException,
    );
  });

  it('rejects bytes that are not an image with 415', async () => {
    await expect(
      service.process(Buffer.from('definitely not an image')),
    ).rejects.toBeInstanceOf(UnsupportedMediaTypeException);
  });
});

describe('decodeImagePayload', () => {
  it('accepts raw base64 and data URLs', () => {
    expect(decodeImagePayload('aGVsbG8=')?.toString()).toBe('hello');
    expect(
      decodeImagePayload('data:image/png;base64,aGVsbG8=')?.toString(),
    ).toBe('hello');
  });

  it('returns null for empty payloads', () => {
    expect(decodeImagePayload('   ')).toBeNull();
    expect(decodeImagePayload('data:image/png;base64,')).toBeNull();
  });
});
