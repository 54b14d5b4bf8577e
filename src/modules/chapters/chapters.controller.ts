import { Controller, Get, Param } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ChaptersService } from './chapters.service';
import { ChapterDetailDto, ChapterListDto } from './dto/chapter-response.dto';

@ApiTags('chapters')
@Controller()
export class ChaptersController {
  constructor(private readonly chapters: ChaptersService) {}

  @Get('novels/:novelId/chapters')
  @ApiOperation({ summary: 'Chapter list of a novel, by chapter number' })
  @ApiParam({ name: 'novelId', type: String })
  @ApiResponse({ status: 200, type: ChapterListDto })
  listByNovel(@Param('novelId') novelId: string) {
    return this.chapters.listByNovel(novelId);
  }

  @Get('chapters/:id')
  @ApiOperation({ summary: 'Chapter with content and source attribution' })
  @ApiParam({ name: 'id', type: String })
  @ApiResponse({ status: 200, type: ChapterDetailDto })
  @ApiResponse({ status: 404, description: 'Chapter not found' })
  getOne(@Param('id') id: string) {
    return this.chapters.getOne(id);
  }
}
