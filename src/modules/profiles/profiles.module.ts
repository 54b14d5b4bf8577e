import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Profile } from '../../entities/profile.entity';
import { CaptchaModule } from '../captcha/captcha.module';
import { FilesModule } from '../files/files.module';
import { ProfilesController } from './profiles.controller';
import { ProfilesService } from './profiles.service';
import { AvatarService } from './avatar.service';

@Module({
  imports: [TypeOrmModule.forFeature([Profile]), CaptchaModule, FilesModule],
  controllers: [ProfilesController],
  providers: [ProfilesService, AvatarService],
  exports: [ProfilesService],
})
export class ProfilesModule {}
