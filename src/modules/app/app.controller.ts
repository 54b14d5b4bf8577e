import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { AppService } from './app.service';

@ApiTags('app')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  @ApiOperation({ summary: 'Service status' })
  @ApiResponse({
    status: 200,
    description: 'Status and database connectivity',
    schema: { example: { status: 'ok', database: 'connected' } },
  })
  root() {
    return this.appService.root();
  }

  @Get('health')
  @SkipThrottle()
  @ApiOperation({ summary: 'Health check endpoint' })
  @ApiResponse({ status: 200, description: 'Database state and moderation queue counters' })
  healthCheck() {
    return this.appService.health();
  }
}
