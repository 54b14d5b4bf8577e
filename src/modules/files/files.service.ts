import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import {
  S3Client,
  PutObjectCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
  PutBucketPolicyCommand,
} from '@aws-sdk/client-s3';
import { ConfigService } from '@nestjs/config';
import { S3_CLIENT } from './tokens';

export interface PutObjectOptions {
  contentType?: string;
  cacheControl?: string;
}

@Injectable()
export class FilesService implements OnModuleInit {
  private readonly bucket: string;
  private readonly logger = new Logger(FilesService.name);

  constructor(
    @Inject(S3_CLIENT) private s3: S3Client,
    private config: ConfigService,
  ) {
    this.bucket = this.config.get<string>('S3_BUCKET', 'inkwell');
  }

  async onModuleInit() {
    if (this.config.get<string>('NODE_ENV') === 'test') return;
    try {
      await this.s3.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch {
      // 桶不存在时创建，并开放 avatars/ 前缀的匿名读取
      try {
        await this.s3.send(new CreateBucketCommand({ Bucket: this.bucket }));
        await this.setAvatarsPublic();
        this.logger.log(`Created bucket: ${this.bucket}`);
      } catch (err) {
        this.logger.error(`Ensure bucket failed: ${this.bucket}`, err);
      }
    }
  }

  async putObject(
    key: string,
    body: Buffer | Uint8Array | string,
    options: PutObjectOptions = {},
  ): Promise<string> {
    await this.s3.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: options.contentType,
        CacheControl: options.cacheControl,
      }),
    );
    return key;
  }

  async deleteObject(key: string): Promise<void> {
    await this.s3.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  getPublicUrl(key: string): string {
    const endpoint =
      this.config.get<string>('S3_PUBLIC_ENDPOINT') ||
      this.config.get<string>('S3_ENDPOINT') ||
      'http://localhost:9000';
    // path-style URL: http://host/bucket/key
    const encodedKey = key
      .split('/')
      .map((seg) => encodeURIComponent(seg))
      .join('/');
    return `${endpoint.replace(/\/$/, '')}/${this.bucket}/${encodedKey}`;
  }

  private async setAvatarsPublic() {
    const policy = {
      Version: '2012-10-17',
      Statement: [
        {
          Sid: 'PublicReadAvatars',
          Effect: 'Allow',
          Principal: '*',
          Action: ['s3:GetObject'],
          Resource: [`arn:aws:s3:::${this.bucket}/avatars/*`],
        },
      ],
    };
    await this.s3.send(
      new PutBucketPolicyCommand({
        Bucket: this.bucket,
        Policy: JSON.stringify(policy),
      }),
    );
  }
}
