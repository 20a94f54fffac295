import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { FeedsService } from './feeds.service';
import { FeedStatus } from './types';

@ApiTags('feeds')
@Controller('feeds')
export class FeedsController {
  constructor(private readonly feedsService: FeedsService) {}

  @Get()
  @ApiOperation({ summary: 'Connection state of every configured source' })
  getFeeds(): FeedStatus[] {
    return this.feedsService.getStatus();
  }
}
