import { Body, Controller, Get, Param, Post, Query } from '@nestjs/common';
import {
  ApiBody,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';
import { CommentsService } from './comments.service';
import { CreateCommentDto } from './dto/create-comment.dto';
import { ListCommentsQueryDto } from './dto/list-comments.dto';
import { CommentsPageDto, CommentViewDto } from './dto/comment-response.dto';
import { ProfileAuth } from '../profiles/profile-auth.decorator';
import type { ProfileCredentials } from '../../types/request.interface';

@ApiTags('comments')
@Controller('chapters/:chapterId/comments')
export class CommentsController {
  constructor(private readonly comments: CommentsService) {}

  @Get()
  @ApiOperation({ summary: 'List approved comments, newest first (12 per page)' })
  @ApiParam({ name: 'chapterId', type: String })
  @ApiResponse({ status: 200, type: CommentsPageDto })
  list(@Param('chapterId') chapterId: string, @Query() query: ListCommentsQueryDto) {
    return this.comments.listApproved(chapterId, query.page ?? 1);
  }

  @Post()
  @ApiSecurity('profile-id')
  @ApiSecurity('secret-token')
  @ApiOperation({ summary: 'Post a comment; it stays pending until a moderator approves it' })
  @ApiParam({ name: 'chapterId', type: String })
  @ApiBody({ type: CreateCommentDto })
  @ApiResponse({ status: 201, type: CommentViewDto })
  @ApiResponse({ status: 400, description: 'Invalid length or captcha failed' })
  @ApiResponse({ status: 401, description: 'Missing credential headers' })
  @ApiResponse({ status: 403, description: 'Invalid credentials' })
  @ApiResponse({ status: 404, description: 'Chapter not found' })
  @ApiResponse({ status: 429, description: 'Author cooldown (30 s) in effect' })
  @ApiResponse({ status: 502, description: 'Captcha verifier unavailable' })
  create(
    @Param('chapterId') chapterId: string,
    @ProfileAuth() auth: ProfileCredentials,
    @Body() dto: CreateCommentDto,
  ) {
    return this.comments.create(auth, chapterId, {
      content: dto.content,
      turnstileToken: dto.turnstile_token,
    });
  }
}
