import {
  BadRequestException,
  ForbiddenException,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Comment } from '../../entities/comment.entity';
import { Chapter } from '../../entities/chapter.entity';
import { newEntityId } from '../../utils/secure-random';
import type { ProfileCredentials } from '../../types/request.interface';
import { CaptchaService } from '../captcha/captcha.service';
import { ProfilesService } from '../profiles/profiles.service';
import { ModerationQueueService } from '../moderation/moderation-queue.service';
import { CommentCooldownService } from './comment-cooldown.service';
import { renderCommentMarkdown } from './comment-renderer';
import { CommentsPageDto, CommentViewDto } from './dto/comment-response.dto';

export const COMMENT_MAX_LENGTH = 1000;
export const COMMENTS_PAGE_SIZE = 12;

export interface NewComment {
  content: string;
  turnstileToken: string;
}

interface AuthorView {
  display_name: string;
  avatar_seed: string;
  has_custom_avatar: boolean;
}

@Injectable()
export class CommentsService {
  private readonly logger = new Logger(CommentsService.name);

  constructor(
    @InjectRepository(Comment) private readonly comments: Repository<Comment>,
    @InjectRepository(Chapter) private readonly chapters: Repository<Chapter>,
    private readonly profiles: ProfilesService,
    private readonly captcha: CaptchaService,
    private readonly cooldown: CommentCooldownService,
    private readonly moderation: ModerationQueueService,
  ) {}

  private toView(c: Comment, author: AuthorView | null | undefined): CommentViewDto {
    return {
      id: c.id,
      chapter_id: c.chapter_id,
      user_id: c.user_id,
      content_html: c.content_html,
      status: c.status,
      created_at: c.created_at,
      user_display_name: author?.display_name ?? '',
      user_avatar_seed: author?.avatar_seed ?? '',
      user_has_custom_avatar: author?.has_custom_avatar ?? false,
    };
  }

  /**
   * Checks run in a fixed order: length, cooldown, captcha, chapter, author.
   * The cooldown slot is given back if any later step fails.
   */
  async create(auth: ProfileCredentials, chapterId: string, input: NewComment): Promise<CommentViewDto> {
    const length = [...input.content].length;
    if (!input.content.trim() || length > COMMENT_MAX_LENGTH) {
      throw new BadRequestException(`Comment must be 1-${COMMENT_MAX_LENGTH} characters`);
    }

    const release = this.cooldown.tryAcquire(auth.profileId);
    if (!release) {
      throw new HttpException(
        'Please wait 30 seconds before posting another comment',
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }

    let saved: Comment;
    try {
      const passed = await this.captcha.verify(input.turnstileToken, 'comment');
      if (!passed) throw new BadRequestException('Captcha verification failed');

      const chapterCount = await this.chapters.count({ where: { id: chapterId } });
      if (chapterCount === 0) throw new NotFoundException('Chapter not found');

      if (!(await this.profiles.authenticate(auth.profileId, auth.secretToken))) {
        throw new ForbiddenException('Invalid credentials');
      }

      const contentHtml = renderCommentMarkdown(input.content);
      saved = await this.comments.save(
        this.comments.create({
          id: newEntityId('cmt_'),
          chapter_id: chapterId,
          user_id: auth.profileId,
          content_html: contentHtml,
          status: 'pending',
          moderation_message_id: null,
        }),
      );
    } catch (err) {
      release();
      throw err;
    }

    // 评论已入库，作者信息查询失败不影响送审
    const author = await this.profiles.findPublic(auth.profileId).catch((err: unknown) => {
      this.logger.warn(`Author lookup failed for ${auth.profileId}: ${String(err)}`);
      return null;
    });

    this.moderation.enqueue({
      commentId: saved.id,
      chapterId,
      authorName: author?.display_name ?? auth.profileId,
      contentHtml: saved.content_html,
    });

    this.logger.log(`Comment created: ${saved.id} by user ${auth.profileId}`);
    return this.toView(saved, author);
  }

  async listApproved(chapterId: string, page = 1): Promise<CommentsPageDto> {
    const [rows, total] = await this.comments.findAndCount({
      where: { chapter_id: chapterId, status: 'approved' },
      relations: { author: true },
      order: { created_at: 'DESC' },
      take: COMMENTS_PAGE_SIZE,
      skip: (page - 1) * COMMENTS_PAGE_SIZE,
    });
    return {
      comments: total === 0 ? [] : rows.map((c) => this.toView(c, c.author)),
      page,
      page_size: COMMENTS_PAGE_SIZE,
      total_count: total,
      total_pages: Math.ceil(total / COMMENTS_PAGE_SIZE),
    };
  }
}
