import { Observable, Subject } from 'rxjs';
import { GeoPoint, clampGeoPoint } from '../geo/geo';
import {
  MAX_ZOOM_LEVEL,
  MIN_ZOOM_LEVEL,
  PixelPoint,
  ZoomLevel,
  isValidZoomLevel,
  toGeo,
  toPixel,
} from '../projection/projection';
import { Bookmark, ScreenPoint, TileRequest, ViewState, ViewportSize } from './viewport.types';

/** Promote to the next tile level at or above this continuous zoom. */
export const ZOOM_UPGRADE_THRESHOLD = 1.5;
/** Demote to the previous tile level at or below this continuous zoom. */
export const ZOOM_DOWNGRADE_THRESHOLD = 0.75;

export type ScrollUnit = 'line' | 'pixel';

export interface ZoomControllerOptions {
  minZoom: number;
  maxZoom: number;
  /** Per wheel line. */
  lineSensitivity: number;
  /** Per trackpad pixel. */
  pixelSensitivity: number;
  viewport: ViewportSize;
  tileRadius: number;
  panThresholdDeg: number;
}

export interface ZoomOutcome {
  state: ViewState;
  levelChanged: boolean;
  previousLevel: ZoomLevel;
  tileRequest: TileRequest | null;
}

/**
 * Owns the discrete tile zoom level and the continuous zoom factor layered on
 * top of it. Every zoom keeps the geographic point under the cursor at the same
 * screen pixel, and level changes compensate the factor so the visual scale is
 * unchanged at the moment of transition.
 */
export class ZoomController {
  private state: ViewState;
  private lastTileRequestCenter: GeoPoint;
  private readonly tileRequests = new Subject<TileRequest>();

  readonly tileRequests$: Observable<TileRequest> = this.tileRequests.asObservable();

  constructor(
    initial: ViewState,
    private readonly options: ZoomControllerOptions,
  ) {
    if (!isValidZoomLevel(initial.zoomLevel)) {
      throw new RangeError(
        `Zoom level must be an integer in [${MIN_ZOOM_LEVEL}, ${MAX_ZOOM_LEVEL}], got ${initial.zoomLevel}`,
      );
    }
    if (options.minZoom <= 0 || options.minZoom > options.maxZoom) {
      throw new RangeError(`Invalid continuous zoom bounds [${options.minZoom}, ${options.maxZoom}]`);
    }

    this.state = {
      center: clampGeoPoint(initial.center),
      zoomLevel: initial.zoomLevel,
      continuousZoom: this.clampZoom(initial.continuousZoom),
      referencePoint: clampGeoPoint(initial.referencePoint),
    };
    this.lastTileRequestCenter = { ...this.state.center };
  }

  getState(): ViewState {
    return {
      center: { ...this.state.center },
      zoomLevel: this.state.zoomLevel,
      continuousZoom: this.state.continuousZoom,
      referencePoint: { ...this.state.referencePoint },
    };
  }

  screenToGeo(screen: ScreenPoint): GeoPoint {
    const { zoomLevel, continuousZoom, referencePoint } = this.state;
    const centerPixel = toPixel(this.state.center, zoomLevel, referencePoint);
    const offset = this.screenOffset(screen);

    return toGeo(
      {
        x: centerPixel.x + offset.x / continuousZoom,
        y: centerPixel.y + offset.y / continuousZoom,
      },
      zoomLevel,
      referencePoint,
    );
  }

  geoToScreen(point: GeoPoint): ScreenPoint {
    const { zoomLevel, continuousZoom, referencePoint } = this.state;
    const centerPixel = toPixel(this.state.center, zoomLevel, referencePoint);
    const pixel = toPixel(point, zoomLevel, referencePoint);

    return {
      x: this.options.viewport.width / 2 + (pixel.x - centerPixel.x) * continuousZoom,
      y: this.options.viewport.height / 2 + (pixel.y - centerPixel.y) * continuousZoom,
    };
  }

  /**
   * Scroll input. Negative deltas zoom in, matching wheel `deltaY` when the
   * wheel is rolled away from the user.
   */
  zoom(delta: number, cursor?: ScreenPoint, unit: ScrollUnit = 'line'): ZoomOutcome {
    const sensitivity =
      unit === 'pixel' ? this.options.pixelSensitivity : this.options.lineSensitivity;
    return this.applyZoomFactor(this.state.continuousZoom * (1 - delta * sensitivity), cursor);
  }

  /**
   * Sets the continuous zoom factor directly (pinch gestures) while keeping the
   * point under `cursor` fixed. Without a cursor the screen center is the anchor.
   */
  applyZoomFactor(target: number, cursor?: ScreenPoint): ZoomOutcome {
    const anchorScreen = cursor ?? this.screenCenter();
    const anchor = this.screenToGeo(anchorScreen);
    const offset = this.screenOffset(anchorScreen);
    const previousLevel = this.state.zoomLevel;

    this.state.continuousZoom = this.clampZoom(target);
    const levelChanged = this.checkLevelTransition();

    const { zoomLevel, continuousZoom, referencePoint } = this.state;
    const anchorPixel = toPixel(anchor, zoomLevel, referencePoint);
    this.state.center = toGeo(
      {
        x: anchorPixel.x - offset.x / continuousZoom,
        y: anchorPixel.y - offset.y / continuousZoom,
      },
      zoomLevel,
      referencePoint,
    );

    return {
      state: this.getState(),
      levelChanged,
      previousLevel,
      tileRequest: levelChanged ? this.requestTiles() : null,
    };
  }

  /**
   * Drags the map by a screen-space delta; the map content follows the pointer.
   * Returns a tile request once the center has drifted past the pan threshold.
   */
  pan(deltaScreen: ScreenPoint): TileRequest | null {
    const { zoomLevel, continuousZoom, referencePoint } = this.state;
    const centerPixel: PixelPoint = toPixel(this.state.center, zoomLevel, referencePoint);

    this.state.center = toGeo(
      {
        x: centerPixel.x - deltaScreen.x / continuousZoom,
        y: centerPixel.y - deltaScreen.y / continuousZoom,
      },
      zoomLevel,
      referencePoint,
    );

    const latDiff = Math.abs(this.state.center.latitude - this.lastTileRequestCenter.latitude);
    const lonDiff = Math.abs(this.state.center.longitude - this.lastTileRequestCenter.longitude);
    if (latDiff > this.options.panThresholdDeg || lonDiff > this.options.panThresholdDeg) {
      return this.requestTiles();
    }
    return null;
  }

  jumpTo(bookmark: Bookmark): TileRequest {
    if (!isValidZoomLevel(bookmark.zoomLevel)) {
      throw new RangeError(`Bookmark ${bookmark.name} has invalid zoom level ${bookmark.zoomLevel}`);
    }
    this.state.center = clampGeoPoint({
      latitude: bookmark.latitude,
      longitude: bookmark.longitude,
    });
    this.state.zoomLevel = bookmark.zoomLevel;
    this.state.continuousZoom = this.clampZoom(1);
    return this.requestTiles();
  }

  toBookmark(name: string): Bookmark {
    return {
      name,
      latitude: this.state.center.latitude,
      longitude: this.state.center.longitude,
      zoomLevel: this.state.zoomLevel,
    };
  }

  complete(): void {
    this.tileRequests.complete();
  }

  private checkLevelTransition(): boolean {
    const { continuousZoom, zoomLevel } = this.state;

    if (continuousZoom >= ZOOM_UPGRADE_THRESHOLD && zoomLevel < MAX_ZOOM_LEVEL) {
      this.state.continuousZoom = continuousZoom / 2;
      this.state.zoomLevel = zoomLevel + 1;
      return true;
    }
    if (continuousZoom <= ZOOM_DOWNGRADE_THRESHOLD && zoomLevel > MIN_ZOOM_LEVEL) {
      this.state.continuousZoom = continuousZoom * 2;
      this.state.zoomLevel = zoomLevel - 1;
      return true;
    }
    return false;
  }

  private requestTiles(): TileRequest {
    const request: TileRequest = {
      centerPoint: { ...this.state.center },
      zoomLevel: this.state.zoomLevel,
      radiusInTiles: this.options.tileRadius,
    };
    this.lastTileRequestCenter = { ...this.state.center };
    this.tileRequests.next(request);
    return request;
  }

  private screenCenter(): ScreenPoint {
    return { x: this.options.viewport.width / 2, y: this.options.viewport.height / 2 };
  }

  private screenOffset(screen: ScreenPoint): ScreenPoint {
    const center = this.screenCenter();
    return { x: screen.x - center.x, y: screen.y - center.y };
  }

  private clampZoom(value: number): number {
    return Math.min(this.options.maxZoom, Math.max(this.options.minZoom, value));
  }
}
