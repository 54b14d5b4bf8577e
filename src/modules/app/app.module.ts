import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { DatabaseConfig } from '../../config/database.config';
import { DatabaseInitService } from '../../config/database-init.service';
import { CacheModule } from '../cache/cache.module';
import { HttpModule } from '../http/http.module';
import { FilesModule } from '../files/files.module';
import { CaptchaModule } from '../captcha/captcha.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { NovelsModule } from '../novels/novels.module';
import { ChaptersModule } from '../chapters/chapters.module';
import { ProfilesModule } from '../profiles/profiles.module';
import { CommentsModule } from '../comments/comments.module';
import { ModerationModule } from '../moderation/moderation.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    TypeOrmModule.forRootAsync({
      useClass: DatabaseConfig,
    }),
    CacheModule,
    HttpModule,
    FilesModule,
    CaptchaModule,
    RateLimitModule,
    NovelsModule,
    ChaptersModule,
    ProfilesModule,
    CommentsModule,
    ModerationModule,
  ],
  controllers: [AppController],
  providers: [AppService, DatabaseInitService],
})
export class AppModule {}
