import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Comment } from '../../entities/comment.entity';
import { Chapter } from '../../entities/chapter.entity';
import { CaptchaModule } from '../captcha/captcha.module';
import { ProfilesModule } from '../profiles/profiles.module';
import { ModerationModule } from '../moderation/moderation.module';
import { CommentsController } from './comments.controller';
import { CommentsService } from './comments.service';
import { CommentCooldownService } from './comment-cooldown.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Comment, Chapter]),
    CaptchaModule,
    ProfilesModule,
    ModerationModule,
  ],
  controllers: [CommentsController],
  providers: [CommentsService, CommentCooldownService],
})
export class CommentsModule {}
