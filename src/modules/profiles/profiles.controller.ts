import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Patch,
  Post,
  Res,
} from '@nestjs/common';
import {
  ApiBody,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';
import type { Response } from 'express';
import { ProfilesService } from './profiles.service';
import { ProfileAuth } from './profile-auth.decorator';
import { decodeImagePayload } from './avatar.service';
import { CreateProfileDto } from './dto/create-profile.dto';
import { LoginWithCodeDto } from './dto/login.dto';
import { SyncCookiesDto } from './dto/sync-cookies.dto';
import { UpdateDisplayNameDto } from './dto/update-display-name.dto';
import { UpdateAvatarDto } from './dto/update-avatar.dto';
import {
  LoginResponseDto,
  ProfileWithTokenDto,
  PublicProfileDto,
  SyncCodeResponseDto,
} from './dto/profile-response.dto';
import type { ProfileCredentials } from '../../types/request.interface';
import { abortSignalFor } from '../../utils/request-abort';

const UNAUTHORIZED = {
  status: 401,
  description: 'Missing credential headers',
  schema: { example: { statusCode: 401, message: 'Profile credentials required', error: 'Unauthorized' } },
};
const FORBIDDEN = {
  status: 403,
  description: 'Secret token does not match',
  schema: { example: { statusCode: 403, message: 'Invalid secret token', error: 'Forbidden' } },
};

@ApiTags('profile')
@Controller('profile')
export class ProfilesController {
  constructor(private readonly profiles: ProfilesService) {}

  @Post()
  @ApiOperation({ summary: 'Create an anonymous profile (requires captcha)' })
  @ApiBody({ type: CreateProfileDto })
  @ApiResponse({ status: 201, type: ProfileWithTokenDto })
  @ApiResponse({ status: 400, description: 'Captcha verification failed' })
  create(@Body() dto: CreateProfileDto) {
    return this.profiles.create(dto.turnstile_token);
  }

  @Post('login')
  @HttpCode(200)
  @ApiOperation({ summary: 'Exchange a one-time sync code for the profile credentials' })
  @ApiBody({ type: LoginWithCodeDto })
  @ApiResponse({ status: 200, type: LoginResponseDto })
  @ApiResponse({ status: 404, description: 'Invalid or expired sync code' })
  login(@Body() dto: LoginWithCodeDto) {
    return this.profiles.loginWithCode(dto.sync_code);
  }

  @Post('sync-cookies')
  @HttpCode(200)
  @ApiSecurity('profile-id')
  @ApiSecurity('secret-token')
  @ApiOperation({ summary: 'Merge client preferences into the stored cookie bag' })
  @ApiBody({ type: SyncCookiesDto })
  @ApiResponse({ status: 200, description: 'Merged cookie bag' })
  @ApiResponse(UNAUTHORIZED)
  @ApiResponse(FORBIDDEN)
  syncCookies(@ProfileAuth() auth: ProfileCredentials, @Body() dto: SyncCookiesDto) {
    return this.profiles.syncCookies(auth.profileId, auth.secretToken, dto.cookies);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get public profile' })
  @ApiParam({ name: 'id', type: String })
  @ApiResponse({ status: 200, type: PublicProfileDto })
  @ApiResponse({ status: 404, description: 'Profile not found' })
  get(@Param('id') id: string) {
    return this.profiles.get(id);
  }

  @Delete(':id')
  @ApiSecurity('secret-token')
  @ApiOperation({ summary: 'Delete the profile and all its comments' })
  @ApiParam({ name: 'id', type: String })
  @ApiResponse({ status: 200, schema: { example: { ok: true } } })
  @ApiResponse(UNAUTHORIZED)
  @ApiResponse(FORBIDDEN)
  @ApiResponse({ status: 404, description: 'Profile not found' })
  remove(@ProfileAuth() auth: ProfileCredentials) {
    return this.profiles.delete(auth.profileId, auth.secretToken);
  }

  @Post(':id/sync-code')
  @ApiSecurity('secret-token')
  @ApiOperation({ summary: 'Issue a sync code valid for 15 minutes' })
  @ApiParam({ name: 'id', type: String })
  @ApiResponse({ status: 201, type: SyncCodeResponseDto })
  @ApiResponse(UNAUTHORIZED)
  @ApiResponse(FORBIDDEN)
  syncCode(@ProfileAuth() auth: ProfileCredentials) {
    return this.profiles.generateSyncCode(auth.profileId, auth.secretToken);
  }

  @Patch(':id/name')
  @ApiSecurity('secret-token')
  @ApiOperation({ summary: 'Change display name' })
  @ApiParam({ name: 'id', type: String })
  @ApiBody({ type: UpdateDisplayNameDto })
  @ApiResponse({ status: 200, type: PublicProfileDto })
  @ApiResponse({ status: 400, description: 'Invalid display name' })
  @ApiResponse(UNAUTHORIZED)
  @ApiResponse(FORBIDDEN)
  rename(@ProfileAuth() auth: ProfileCredentials, @Body() dto: UpdateDisplayNameDto) {
    return this.profiles.updateDisplayName(auth.profileId, auth.secretToken, dto.display_name);
  }

  @Post(':id/avatar')
  @ApiSecurity('secret-token')
  @ApiOperation({ summary: 'Upload a custom avatar (JPEG/PNG, cropped to 250×250)' })
  @ApiParam({ name: 'id', type: String })
  @ApiBody({ type: UpdateAvatarDto })
  @ApiResponse({ status: 201, type: PublicProfileDto })
  @ApiResponse({ status: 400, description: 'Image payload is not valid base64' })
  @ApiResponse({ status: 415, description: 'Unsupported image format' })
  @ApiResponse({ status: 502, description: 'Object storage unavailable' })
  @ApiResponse(UNAUTHORIZED)
  @ApiResponse(FORBIDDEN)
  avatar(
    @ProfileAuth() auth: ProfileCredentials,
    @Body() dto: UpdateAvatarDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    const image = decodeImagePayload(dto.image);
    if (!image) throw new BadRequestException('Image payload is empty or not base64');
    return this.profiles.updateAvatar(auth.profileId, auth.secretToken, image, abortSignalFor(res));
  }
}
