import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './modules/app/app.module';
import { swaggerInit } from './utils/swaggerInit';
import {
  PROFILE_ID_HEADER,
  SECRET_TOKEN_HEADER,
  SERVICE_TOKEN_HEADER,
} from './types/request.interface';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
  });

  // 头像以 base64 上传，放宽 JSON 体积
  app.useBodyParser('json', { limit: '8mb' });
  app.useBodyParser('urlencoded', { extended: true, limit: '1mb' });

  if (process.env.TRUST_PROXY === 'true') {
    app.set('trust proxy', true);
  }

  const origin = process.env.ALLOWED_ORIGIN || '*';
  if (origin === '*') {
    logger.warn('ALLOWED_ORIGIN is not set; allowing all origins');
  }
  app.enableCors({
    origin,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', PROFILE_ID_HEADER, SECRET_TOKEN_HEADER, SERVICE_TOKEN_HEADER],
  });

  // 启用全局验证管道
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );

  app.enableShutdownHooks();
  swaggerInit(app);
  const port = process.env.PORT ?? 3000;
  await app.listen(port);
  logger.log(`Listening on port ${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error('Failed to start', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
