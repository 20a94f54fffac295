import { Body, Controller, Delete, Get, HttpCode, Param, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CreateBookmarkDto } from './dto/bookmark.dto';
import { PanDto } from './dto/pan.dto';
import { PinchDto } from './dto/pinch.dto';
import { ProjectQueryDto } from './dto/project-query.dto';
import { ZoomDto } from './dto/zoom.dto';
import { PanOutcome, Projection, ViewportService } from './viewport.service';
import { Bookmark, TileRequest, ViewState } from './viewport.types';
import { ZoomOutcome } from './zoom-controller';

@ApiTags('viewport')
@Controller('viewport')
export class ViewportController {
  constructor(private readonly viewportService: ViewportService) {}

  @Get()
  getState(): ViewState {
    return this.viewportService.getState();
  }

  @Post('zoom')
  @HttpCode(200)
  @ApiOperation({ summary: 'Scroll-wheel zoom anchored at the cursor' })
  zoom(@Body() dto: ZoomDto): ZoomOutcome {
    return this.viewportService.zoom(dto);
  }

  @Post('pinch')
  @HttpCode(200)
  @ApiOperation({ summary: 'Multiply the continuous zoom by a pinch factor' })
  pinch(@Body() dto: PinchDto): ZoomOutcome {
    return this.viewportService.pinch(dto);
  }

  @Post('pan')
  @HttpCode(200)
  pan(@Body() dto: PanDto): PanOutcome {
    return this.viewportService.pan(dto);
  }

  @Get('project')
  @ApiOperation({ summary: 'Convert between geographic and screen coordinates' })
  project(@Query() query: ProjectQueryDto): Projection {
    return this.viewportService.project(query);
  }

  @Get('bookmarks')
  listBookmarks(): Bookmark[] {
    return this.viewportService.listBookmarks();
  }

  @Post('bookmarks')
  addBookmark(@Body() dto: CreateBookmarkDto): Bookmark {
    return this.viewportService.addBookmark(dto);
  }

  @Delete('bookmarks/:name')
  @HttpCode(204)
  removeBookmark(@Param('name') name: string): void {
    this.viewportService.removeBookmark(name);
  }

  @Post('bookmarks/:name/goto')
  @HttpCode(200)
  goToBookmark(@Param('name') name: string): { state: ViewState; tileRequest: TileRequest } {
    return this.viewportService.goToBookmark(name);
  }
}
