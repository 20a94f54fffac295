import { AircraftReport } from '../tracks/track.types';

function asObject(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

function asFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function asString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseAircraft(entry: unknown): AircraftReport | null {
  const raw = asObject(entry);
  if (!raw) {
    return null;
  }

  const identifier = asString(raw.hex)?.toLowerCase();
  if (!identifier) {
    return null;
  }

  const report: AircraftReport = { identifier };

  const lat = asFiniteNumber(raw.lat);
  const lon = asFiniteNumber(raw.lon);
  if (lat !== undefined && lon !== undefined) {
    report.position = { latitude: lat, longitude: lon };
  }

  if (raw.alt_baro === 'ground') {
    report.altitude = 0;
    report.onGround = true;
  } else {
    const altitude = asFiniteNumber(raw.alt_baro) ?? asFiniteNumber(raw.alt_geom);
    if (altitude !== undefined) {
      report.altitude = Math.round(altitude);
      report.onGround = false;
    }
  }

  const heading =
    asFiniteNumber(raw.track) ?? asFiniteNumber(raw.true_heading) ?? asFiniteNumber(raw.mag_heading);
  if (heading !== undefined) {
    report.heading = heading;
  }

  const speed = asFiniteNumber(raw.gs);
  if (speed !== undefined) {
    report.speed = speed;
  }

  const verticalRate = asFiniteNumber(raw.baro_rate) ?? asFiniteNumber(raw.geom_rate);
  if (verticalRate !== undefined) {
    report.verticalRate = Math.round(verticalRate);
  }

  const callsign = asString(raw.flight);
  if (callsign) {
    report.callsign = callsign;
  }

  const squawk = asString(raw.squawk);
  if (squawk) {
    report.squawk = squawk;
  }

  return report;
}

/**
 * Normalises an `aircraft.json` payload (or a bare array of entries) into
 * reports. Entries without a usable identifier are dropped.
 */
export function parseAircraftReports(payload: unknown): AircraftReport[] {
  const entries = Array.isArray(payload) ? payload : asObject(payload)?.aircraft;
  if (!Array.isArray(entries)) {
    return [];
  }

  const reports: AircraftReport[] = [];
  for (const entry of entries) {
    const report = parseAircraft(entry);
    if (report) {
      reports.push(report);
    }
  }
  return reports;
}
