import { GeoPoint } from '../geo/geo';
import { ZoomLevel } from '../projection/projection';

export interface ViewState {
  center: GeoPoint;
  zoomLevel: ZoomLevel;
  continuousZoom: number;
  /** Geographic anchor of pixel space, shared with the tile layer. */
  referencePoint: GeoPoint;
}

export interface ScreenPoint {
  x: number;
  y: number;
}

export interface ViewportSize {
  width: number;
  height: number;
}

/** Emitted to the tile loader; the controller never fetches tiles itself. */
export interface TileRequest {
  centerPoint: GeoPoint;
  zoomLevel: ZoomLevel;
  radiusInTiles: number;
}

export interface Bookmark {
  name: string;
  latitude: number;
  longitude: number;
  zoomLevel: ZoomLevel;
}
