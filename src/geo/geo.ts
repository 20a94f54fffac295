export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/** WGS-84 mean radius */
export const EARTH_RADIUS_NM = 3440.065;

export const MERCATOR_LAT_LIMIT = 85.0511;

/** At or above this altitude (feet) altitudes are expressed as flight levels. */
export const FL_THRESHOLD = 18000;

export function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

export function toDegrees(rad: number): number {
  return (rad * 180) / Math.PI;
}

export function clampLatitude(latitude: number): number {
  return Math.min(MERCATOR_LAT_LIMIT, Math.max(-MERCATOR_LAT_LIMIT, latitude));
}

export function clampLongitude(longitude: number): number {
  return Math.min(180, Math.max(-180, longitude));
}

export function clampGeoPoint(point: GeoPoint): GeoPoint {
  return {
    latitude: clampLatitude(point.latitude),
    longitude: clampLongitude(point.longitude),
  };
}

/**
 * Great-circle distance between two points using the haversine formula.
 */
export function haversineDistanceNauticalMiles(a: GeoPoint, b: GeoPoint): number {
  const lat1 = toRadians(a.latitude);
  const lat2 = toRadians(b.latitude);
  const deltaLat = toRadians(b.latitude - a.latitude);
  const deltaLon = toRadians(b.longitude - a.longitude);

  const h =
    Math.sin(deltaLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(deltaLon / 2) ** 2;

  return EARTH_RADIUS_NM * 2 * Math.asin(Math.sqrt(h));
}

/**
 * Forward azimuth from `a` to `b`, clockwise from north in [0, 360).
 * Identical points have no defined bearing; 0 is returned for them.
 */
export function initialBearingDegrees(a: GeoPoint, b: GeoPoint): number {
  if (a.latitude === b.latitude && a.longitude === b.longitude) {
    return 0;
  }

  const lat1 = toRadians(a.latitude);
  const lat2 = toRadians(b.latitude);
  const deltaLon = toRadians(b.longitude - a.longitude);

  const x = Math.sin(deltaLon) * Math.cos(lat2);
  const y =
    Math.cos(lat1) * Math.sin(lat2) -
    Math.sin(lat1) * Math.cos(lat2) * Math.cos(deltaLon);

  const bearing = toDegrees(Math.atan2(x, y));
  if (!Number.isFinite(bearing)) {
    return 0;
  }
  return ((bearing % 360) + 360) % 360;
}

/**
 * Dead-reckoning along a great circle: where an aircraft at `origin` flying
 * `headingDeg` at `speedKnots` will be after `minutes`.
 */
export function projectPosition(
  origin: GeoPoint,
  headingDeg: number,
  speedKnots: number,
  minutes: number,
): GeoPoint {
  const distanceNm = (speedKnots / 60) * minutes;
  if (distanceNm === 0) {
    return { latitude: origin.latitude, longitude: origin.longitude };
  }

  const angularDistance = distanceNm / EARTH_RADIUS_NM;
  const heading = toRadians(headingDeg);
  const lat1 = toRadians(origin.latitude);
  const lon1 = toRadians(origin.longitude);

  const lat2 = Math.asin(
    Math.sin(lat1) * Math.cos(angularDistance) +
      Math.cos(lat1) * Math.sin(angularDistance) * Math.cos(heading),
  );
  const lon2 =
    lon1 +
    Math.atan2(
      Math.sin(heading) * Math.sin(angularDistance) * Math.cos(lat1),
      Math.cos(angularDistance) - Math.sin(lat1) * Math.sin(lat2),
    );

  return {
    latitude: toDegrees(lat2),
    longitude: ((toDegrees(lon2) + 540) % 360) - 180,
  };
}

export function formatAltitude(altitude: number | undefined): string {
  if (altitude === undefined) {
    return '---';
  }
  if (altitude >= FL_THRESHOLD) {
    return `FL${String(Math.trunc(altitude / 100)).padStart(3, '0')}`;
  }
  return `${altitude} ft`;
}
