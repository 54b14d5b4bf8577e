import {
  BadGatewayException,
  BadRequestException,
  ForbiddenException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MoreThan, Repository } from 'typeorm';
import { Profile } from '../../entities/profile.entity';
import type { CookieBag } from '../../types/cookie-bag.interface';
import {
  newAvatarSeed,
  newEntityId,
  newSecretToken,
  newSyncCode,
  SYNC_CODE_LENGTH,
} from '../../utils/secure-random';
import { safeEqual } from '../../utils/constant-time';
import { isUniqueViolation } from '../../utils/db-errors';
import { SemaphoreAbortedError } from '../../utils/semaphore';
import { CaptchaService } from '../captcha/captcha.service';
import { FilesService } from '../files/files.service';
import { AvatarService } from './avatar.service';
import { filterValidCookies, mergeCookies } from './cookie-bag';
import { normalizeDisplayName, randomDisplayName } from './display-name';
import {
  LoginResponseDto,
  ProfileWithTokenDto,
  PublicProfileDto,
  SyncCodeResponseDto,
} from './dto/profile-response.dto';

export const SYNC_CODE_TTL_MS = 15 * 60 * 1000;
export const SYNC_CODE_MAX_ATTEMPTS = 5;

export function avatarKey(profileId: string): string {
  return `avatars/${profileId}.jpg`;
}

@Injectable()
export class ProfilesService {
  private readonly logger = new Logger(ProfilesService.name);

  constructor(
    @InjectRepository(Profile) private readonly repo: Repository<Profile>,
    private readonly captcha: CaptchaService,
    private readonly files: FilesService,
    private readonly avatars: AvatarService,
  ) {}

  toPublic(p: Pick<Profile, 'id' | 'display_name' | 'avatar_seed' | 'has_custom_avatar' | 'created_at'>): PublicProfileDto {
    return {
      id: p.id,
      display_name: p.display_name,
      avatar_seed: p.avatar_seed,
      has_custom_avatar: p.has_custom_avatar,
      avatar_url: p.has_custom_avatar ? this.files.getPublicUrl(avatarKey(p.id)) : null,
      created_at: p.created_at,
    };
  }

  async create(captchaToken: string): Promise<ProfileWithTokenDto> {
    const passed = await this.captcha.verify(captchaToken, 'profile');
    if (!passed) throw new BadRequestException('Captcha verification failed');

    const secretToken = newSecretToken();
    const profile = this.repo.create({
      id: newEntityId('usr_'),
      secret_token: secretToken,
      display_name: randomDisplayName(),
      avatar_seed: newAvatarSeed(),
      has_custom_avatar: false,
      cookies: {},
      sync_code: null,
      sync_code_expires_at: null,
    });
    const saved = await this.repo.save(profile);
    this.logger.log(`Profile created: ${saved.display_name} (${saved.id})`);
    return { ...this.toPublic(saved), secret_token: secretToken };
  }

  /** Unknown profile and wrong token both read as false. */
  async authenticate(profileId: string, secretToken: string): Promise<boolean> {
    if (!profileId || !secretToken) return false;
    const row = await this.repo.findOne({
      where: { id: profileId },
      select: { id: true, secret_token: true },
    });
    if (!row) return false;
    return safeEqual(row.secret_token, secretToken);
  }

  private async requireAuth(profileId: string, secretToken: string): Promise<void> {
    if (!(await this.authenticate(profileId, secretToken))) {
      this.logger.warn(`Rejected credentials for profile ${profileId}`);
      throw new ForbiddenException('Invalid secret token');
    }
  }

  /** Public view without the activity bump; null when unknown. */
  async findPublic(profileId: string): Promise<PublicProfileDto | null> {
    const profile = await this.repo.findOne({ where: { id: profileId } });
    return profile ? this.toPublic(profile) : null;
  }

  async get(profileId: string): Promise<PublicProfileDto> {
    const profile = await this.repo.findOne({ where: { id: profileId } });
    if (!profile) throw new NotFoundException('Profile not found');
    await this.touch(profileId);
    return this.toPublic(profile);
  }

  // last_active_at 只是统计用途，失败不影响请求
  private async touch(profileId: string): Promise<void> {
    try {
      await this.repo.update({ id: profileId }, { last_active_at: new Date() });
    } catch (err) {
      this.logger.warn(`Failed to bump last_active_at for ${profileId}: ${String(err)}`);
    }
  }

  async generateSyncCode(profileId: string, secretToken: string): Promise<SyncCodeResponseDto> {
    await this.requireAuth(profileId, secretToken);

    for (let attempt = 1; attempt <= SYNC_CODE_MAX_ATTEMPTS; attempt++) {
      const code = newSyncCode();
      const expiresAt = new Date(Date.now() + SYNC_CODE_TTL_MS);
      try {
        await this.repo.update(
          { id: profileId },
          { sync_code: code, sync_code_expires_at: expiresAt, last_active_at: new Date() },
        );
        this.logger.log(`Sync code generated for ${profileId}`);
        return { sync_code: code, expires_at: expiresAt.toISOString() };
      } catch (err) {
        if (!isUniqueViolation(err)) throw err;
        this.logger.warn(`Sync code collision for ${profileId} (attempt ${attempt})`);
      }
    }
    throw new InternalServerErrorException('Could not allocate a sync code');
  }

  async loginWithCode(rawCode: string): Promise<LoginResponseDto> {
    const code = rawCode.trim().toUpperCase();
    if (code.length !== SYNC_CODE_LENGTH) {
      throw new NotFoundException('Invalid or expired sync code');
    }

    const row = await this.repo.findOne({
      where: { sync_code: code, sync_code_expires_at: MoreThan(new Date()) },
      select: {
        id: true,
        secret_token: true,
        display_name: true,
        avatar_seed: true,
        has_custom_avatar: true,
        created_at: true,
        cookies: true,
      },
    });
    if (!row) throw new NotFoundException('Invalid or expired sync code');

    // 以同步码本身为条件清除，保证并发登录时只有一方成功
    const consumed = await this.repo.update(
      { id: row.id, sync_code: code },
      { sync_code: null, sync_code_expires_at: null, last_active_at: new Date() },
    );
    if (!consumed.affected) throw new NotFoundException('Invalid or expired sync code');

    this.logger.log(`Login via sync code: ${row.id}`);
    return {
      profile: this.toPublic(row),
      secret_token: row.secret_token,
      cookies: row.cookies ?? {},
    };
  }

  async syncCookies(profileId: string, secretToken: string, incoming: unknown): Promise<CookieBag> {
    await this.requireAuth(profileId, secretToken);
    const valid = filterValidCookies(incoming);

    const row = await this.repo.findOne({
      where: { id: profileId },
      select: { id: true, cookies: true },
    });
    if (!row) throw new NotFoundException('Profile not found');

    const merged = mergeCookies(row.cookies ?? {}, valid);
    await this.repo.update({ id: profileId }, { cookies: merged, last_active_at: new Date() });
    return merged;
  }

  async updateDisplayName(profileId: string, secretToken: string, rawName: string): Promise<PublicProfileDto> {
    await this.requireAuth(profileId, secretToken);
    const result = normalizeDisplayName(rawName);
    if (!result.ok) throw new BadRequestException(result.reason);

    await this.repo.update(
      { id: profileId },
      { display_name: result.name, last_active_at: new Date() },
    );
    this.logger.debug(`Display name for ${profileId} set to "${result.name}"`);
    return this.get(profileId);
  }

  async updateAvatar(
    profileId: string,
    secretToken: string,
    image: Buffer,
    signal?: AbortSignal,
  ): Promise<PublicProfileDto> {
    await this.requireAuth(profileId, secretToken);

    let jpeg: Buffer;
    try {
      jpeg = await this.avatars.process(image, signal);
    } catch (err) {
      if (err instanceof SemaphoreAbortedError) {
        throw new ServiceUnavailableException('Request aborted while waiting for image processing');
      }
      throw err;
    }

    try {
      await this.files.putObject(avatarKey(profileId), jpeg, {
        contentType: 'image/jpeg',
        cacheControl: 'public, max-age=3600',
      });
    } catch (err) {
      this.logger.error(`Avatar upload failed for ${profileId}`, err);
      throw new BadGatewayException('Avatar storage unavailable');
    }

    await this.repo.update(
      { id: profileId },
      { has_custom_avatar: true, last_active_at: new Date() },
    );
    return this.get(profileId);
  }

  async delete(profileId: string, secretToken: string): Promise<{ ok: true }> {
    await this.requireAuth(profileId, secretToken);
    const existing = await this.repo.findOne({
      where: { id: profileId },
      select: { id: true, has_custom_avatar: true },
    });

    const result = await this.repo.delete({ id: profileId });
    if (!result.affected) throw new NotFoundException('Profile not found');
    this.logger.log(`Profile deleted: ${profileId}`);

    if (existing?.has_custom_avatar) {
      try {
        await this.files.deleteObject(avatarKey(profileId));
      } catch (err) {
        this.logger.warn(`Failed to remove avatar for deleted profile ${profileId}: ${String(err)}`);
      }
    }
    return { ok: true };
  }
}
