import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule, ThrottlerModuleOptions } from '@nestjs/throttler';
import { serviceTokenSkip } from './service-token';

// 按客户端 IP 限流：默认 3 秒内 9 次（约 3 req/s，突发 9）
@Module({
  imports: [
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService): ThrottlerModuleOptions => ({
        throttlers: [
          {
            ttl: Number(config.get<string>('THROTTLE_TTL_MS', '3000')) || 3000,
            limit: Number(config.get<string>('THROTTLE_LIMIT', '9')) || 9,
          },
        ],
        skipIf: serviceTokenSkip(config.get<string>('SERVICE_TOKEN', '')),
      }),
    }),
  ],
  providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }],
})
export class RateLimitModule {}
