import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Novel } from '../../entities/novel.entity';
import { NovelsService } from './novels.service';
import { ListNovelsQueryDto, SearchNovelsQueryDto } from './dto/list-novels.dto';
import { NovelSearchResultDto, NovelsPageDto, SitemapEntryDto } from './dto/novel-response.dto';

@ApiTags('novels')
@Controller('novels')
export class NovelsController {
  constructor(private readonly novels: NovelsService) {}

  @Get()
  @ApiOperation({ summary: 'List novels (12 per page)' })
  @ApiResponse({ status: 200, type: NovelsPageDto })
  @ApiResponse({ status: 400, description: 'Invalid page or sort' })
  list(@Query() query: ListNovelsQueryDto) {
    return this.novels.list(query.page ?? 1, query.sort);
  }

  @Get('sitemap-data')
  @ApiOperation({ summary: 'Id and creation time of every novel' })
  @ApiResponse({ status: 200, type: [SitemapEntryDto] })
  sitemapData() {
    return this.novels.sitemapData();
  }

  @Get('search')
  @ApiOperation({ summary: 'Fuzzy search over title, English title and author' })
  @ApiResponse({ status: 200, type: NovelSearchResultDto })
  search(@Query() query: SearchNovelsQueryDto) {
    return this.novels.search(query.q);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a novel by id' })
  @ApiParam({ name: 'id', type: String })
  @ApiResponse({ status: 200, type: Novel })
  @ApiResponse({ status: 404, description: 'Novel not found' })
  getOne(@Param('id') id: string) {
    return this.novels.getOne(id);
  }
}
