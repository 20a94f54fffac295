import { GeoPoint, clampGeoPoint, toRadians } from '../geo/geo';

export type ZoomLevel = number;

export interface PixelPoint {
  x: number;
  y: number;
}

export const MIN_ZOOM_LEVEL = 0;
export const MAX_ZOOM_LEVEL = 19;
export const TILE_SIZE = 256;

export function isValidZoomLevel(zoom: number): zoom is ZoomLevel {
  return Number.isInteger(zoom) && zoom >= MIN_ZOOM_LEVEL && zoom <= MAX_ZOOM_LEVEL;
}

export function pixelsPerDegreeLongitude(zoom: ZoomLevel): number {
  return (2 ** zoom * TILE_SIZE) / 360;
}

/**
 * Slippy-map style projection relative to a reference point, which maps to the
 * pixel origin. X grows east, Y grows south like tile rows and screen space.
 *
 * Latitude is scaled by the Mercator factor 1/cos(lat) evaluated at the
 * reference latitude rather than at the point itself. This keeps the mapping
 * linear and consistent with the tile layer for viewports spanning up to a few
 * hundred nautical miles; it is a known approximation and drifts from true
 * Mercator further from the reference.
 */
export function toPixel(point: GeoPoint, zoom: ZoomLevel, reference: GeoPoint): PixelPoint {
  const p = clampGeoPoint(point);
  const ref = clampGeoPoint(reference);
  const ppd = pixelsPerDegreeLongitude(zoom);
  const latitudeScale = ppd / Math.cos(toRadians(ref.latitude));

  return {
    x: (p.longitude - ref.longitude) * ppd,
    y: (ref.latitude - p.latitude) * latitudeScale,
  };
}

export function toGeo(pixel: PixelPoint, zoom: ZoomLevel, reference: GeoPoint): GeoPoint {
  const ref = clampGeoPoint(reference);
  const ppd = pixelsPerDegreeLongitude(zoom);
  const latitudeScale = ppd / Math.cos(toRadians(ref.latitude));

  return clampGeoPoint({
    latitude: ref.latitude - pixel.y / latitudeScale,
    longitude: ref.longitude + pixel.x / ppd,
  });
}
