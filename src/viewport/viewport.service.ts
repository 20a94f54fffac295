import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Subscription } from 'rxjs';
import { ViewportConfig } from '../config/config.schema';
import { GeoPoint } from '../geo/geo';
import { CreateBookmarkDto } from './dto/bookmark.dto';
import { PanDto } from './dto/pan.dto';
import { PinchDto } from './dto/pinch.dto';
import { ProjectQueryDto } from './dto/project-query.dto';
import { ZoomDto } from './dto/zoom.dto';
import { ViewportGateway } from './viewport.gateway';
import { Bookmark, ScreenPoint, TileRequest, ViewState } from './viewport.types';
import { ZoomController, ZoomOutcome } from './zoom-controller';

export interface PanOutcome {
  state: ViewState;
  tileRequest: TileRequest | null;
}

export type Projection =
  | { latitude: number; longitude: number; screen: ScreenPoint }
  | { x: number; y: number; geo: GeoPoint };

function cursorOf(dto: { cursorX?: number; cursorY?: number }): ScreenPoint | undefined {
  if (dto.cursorX === undefined || dto.cursorY === undefined) {
    return undefined;
  }
  return { x: dto.cursorX, y: dto.cursorY };
}

/**
 * The one shared map view. Tile requests from the controller are pushed to
 * clients over the viewport gateway.
 */
@Injectable()
export class ViewportService implements OnModuleDestroy {
  private readonly logger = new Logger(ViewportService.name);
  private readonly controller: ZoomController;
  private readonly bookmarks = new Map<string, Bookmark>();
  private readonly subscription: Subscription;

  constructor(
    private readonly config: ConfigService,
    private readonly gateway: ViewportGateway,
  ) {
    const viewport = this.config.getOrThrow<ViewportConfig>('viewport');
    const center = { latitude: viewport.latitude, longitude: viewport.longitude };

    this.controller = new ZoomController(
      { center, zoomLevel: viewport.zoom_level, continuousZoom: 1, referencePoint: center },
      {
        minZoom: viewport.min_zoom,
        maxZoom: viewport.max_zoom,
        lineSensitivity: viewport.sensitivity,
        pixelSensitivity: viewport.pixel_sensitivity,
        viewport: { width: viewport.width, height: viewport.height },
        tileRadius: viewport.tile_radius,
        panThresholdDeg: viewport.pan_threshold_deg,
      },
    );

    this.subscription = this.controller.tileRequests$.subscribe((request) => {
      this.logger.debug(
        `[TILES] z${request.zoomLevel} around ${request.centerPoint.latitude.toFixed(4)},${request.centerPoint.longitude.toFixed(4)}`,
      );
      this.gateway.broadcastTileRequest(request);
    });
  }

  onModuleDestroy() {
    this.subscription.unsubscribe();
    this.controller.complete();
  }

  getState(): ViewState {
    return this.controller.getState();
  }

  zoom(dto: ZoomDto): ZoomOutcome {
    const outcome = this.controller.zoom(dto.delta, cursorOf(dto), dto.unit ?? 'line');
    this.logLevelChange(outcome);
    return outcome;
  }

  pinch(dto: PinchDto): ZoomOutcome {
    const target = this.controller.getState().continuousZoom * dto.factor;
    const outcome = this.controller.applyZoomFactor(target, cursorOf(dto));
    this.logLevelChange(outcome);
    return outcome;
  }

  pan(dto: PanDto): PanOutcome {
    const tileRequest = this.controller.pan({ x: dto.dx, y: dto.dy });
    return { state: this.controller.getState(), tileRequest };
  }

  project(query: ProjectQueryDto): Projection {
    if (query.latitude !== undefined && query.longitude !== undefined) {
      const geo = { latitude: query.latitude, longitude: query.longitude };
      return { ...geo, screen: this.controller.geoToScreen(geo) };
    }
    if (query.x !== undefined && query.y !== undefined) {
      return { x: query.x, y: query.y, geo: this.controller.screenToGeo({ x: query.x, y: query.y }) };
    }
    throw new BadRequestException('Provide either latitude and longitude, or x and y');
  }

  listBookmarks(): Bookmark[] {
    return [...this.bookmarks.values()];
  }

  addBookmark(dto: CreateBookmarkDto): Bookmark {
    if (this.bookmarks.has(dto.name)) {
      throw new ConflictException(`Bookmark ${dto.name} already exists`);
    }

    const current = this.controller.toBookmark(dto.name);
    const bookmark: Bookmark = {
      name: dto.name,
      latitude: dto.latitude ?? current.latitude,
      longitude: dto.longitude ?? current.longitude,
      zoomLevel: dto.zoomLevel ?? current.zoomLevel,
    };
    this.bookmarks.set(bookmark.name, bookmark);
    return bookmark;
  }

  removeBookmark(name: string): void {
    if (!this.bookmarks.delete(name)) {
      throw new NotFoundException(`Bookmark ${name} not found`);
    }
  }

  goToBookmark(name: string): { state: ViewState; tileRequest: TileRequest } {
    const bookmark = this.bookmarks.get(name);
    if (!bookmark) {
      throw new NotFoundException(`Bookmark ${name} not found`);
    }

    try {
      const tileRequest = this.controller.jumpTo(bookmark);
      return { state: this.controller.getState(), tileRequest };
    } catch (err) {
      if (err instanceof RangeError) {
        throw new BadRequestException(err.message);
      }
      throw err;
    }
  }

  private logLevelChange(outcome: ZoomOutcome) {
    if (outcome.levelChanged) {
      this.logger.log(`[ZOOM] Tile level ${outcome.previousLevel} -> ${outcome.state.zoomLevel}`);
    }
  }
}
