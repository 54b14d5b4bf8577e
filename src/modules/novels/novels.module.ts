import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Novel } from '../../entities/novel.entity';
import { NovelsController } from './novels.controller';
import { NovelsService } from './novels.service';

@Module({
  imports: [TypeOrmModule.forFeature([Novel])],
  controllers: [NovelsController],
  providers: [NovelsService],
})
export class NovelsModule {}
