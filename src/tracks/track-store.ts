import { clampGeoPoint, formatAltitude } from '../geo/geo';
import { emergencyOf } from './emergency';
import { DEFAULT_STALENESS, StalenessOptions, stalenessOpacity, trailOpacity } from './staleness';
import { AircraftReport, MergeResult, Track, TrackView } from './track.types';

export interface TrackStoreOptions {
  trailSampleIntervalMs: number;
  staleness: StalenessOptions;
}

export const DEFAULT_TRACK_STORE_OPTIONS: TrackStoreOptions = {
  trailSampleIntervalMs: 2000,
  staleness: DEFAULT_STALENESS,
};

export function normalizeIdentifier(identifier: string): string {
  return identifier.trim().toLowerCase();
}

function isValidPosition(report: AircraftReport): boolean {
  return (
    report.position !== undefined &&
    Number.isFinite(report.position.latitude) &&
    Number.isFinite(report.position.longitude)
  );
}

/**
 * Writes every field the report carries onto the track and leaves the rest
 * alone. Shared by the single-source and the fusion paths.
 */
export function applyPartialUpdate(track: Track, report: AircraftReport, now: number): void {
  track.identifier = normalizeIdentifier(report.identifier);
  track.lastUpdate = now;

  if (report.position && isValidPosition(report)) {
    track.position = clampGeoPoint(report.position);
  }
  if (report.altitude !== undefined) {
    track.altitude = report.altitude;
  }
  if (report.heading !== undefined) {
    track.heading = report.heading;
  }
  if (report.speed !== undefined) {
    track.groundSpeed = report.speed;
  }
  if (report.verticalRate !== undefined) {
    track.verticalRate = report.verticalRate;
  }
  if (report.callsign !== undefined) {
    track.label = report.callsign;
  }
  if (report.squawk !== undefined) {
    track.squawk = report.squawk;
  }
  if (report.onGround !== undefined) {
    track.onGround = report.onGround;
  }
}

/**
 * Authoritative set of tracked aircraft, one per identifier. A track only
 * exists once a report with a valid position has been seen for it.
 */
export class TrackStore {
  private readonly tracks = new Map<string, Track>();
  private readonly options: TrackStoreOptions;

  constructor(options: Partial<TrackStoreOptions> = {}) {
    this.options = { ...DEFAULT_TRACK_STORE_OPTIONS, ...options };
  }

  get size(): number {
    return this.tracks.size;
  }

  get(identifier: string): Track | undefined {
    return this.tracks.get(normalizeIdentifier(identifier));
  }

  list(): Track[] {
    return [...this.tracks.values()];
  }

  clear(): void {
    this.tracks.clear();
  }

  /** Single-source update: every report overwrites the fields it carries. */
  upsert(identifier: string, report: AircraftReport, now = Date.now()): MergeResult {
    return this.merge(identifier, report, now, () => true);
  }

  /**
   * Creates or updates a track. `shouldOverwrite` decides, for an existing
   * track, whether the report's fields are written; the track's `lastUpdate`
   * is refreshed either way.
   */
  merge(
    identifier: string,
    report: AircraftReport,
    now: number,
    shouldOverwrite: (track: Track) => boolean,
  ): MergeResult {
    const key = normalizeIdentifier(identifier);
    if (!key) {
      return { outcome: 'ignored', overwritten: false };
    }

    const existing = this.tracks.get(key);
    if (!existing) {
      if (!report.position || !isValidPosition(report)) {
        return { outcome: 'ignored', overwritten: false };
      }

      const track: Track = {
        identifier: key,
        position: clampGeoPoint(report.position),
        firstSeen: now,
        lastUpdate: now,
        trail: [],
        sources: new Map(),
      };
      applyPartialUpdate(track, { ...report, identifier: key }, now);
      this.tracks.set(key, track);
      return { outcome: 'created', overwritten: true, track };
    }

    if (shouldOverwrite(existing)) {
      applyPartialUpdate(existing, { ...report, identifier: key }, now);
      return { outcome: 'updated', overwritten: true, track: existing };
    }

    existing.lastUpdate = now;
    return { outcome: 'updated', overwritten: false, track: existing };
  }

  /**
   * Appends the track's current position to its trail, at most once per
   * sampling interval however often the track is updated.
   */
  recordTrailSample(identifier: string, now = Date.now()): boolean {
    const track = this.get(identifier);
    if (!track) {
      return false;
    }

    if (
      track.lastTrailSampleAt !== undefined &&
      now - track.lastTrailSampleAt < this.options.trailSampleIntervalMs
    ) {
      return false;
    }

    track.trail.push({
      position: { ...track.position },
      altitude: track.altitude,
      recordedAt: now,
    });
    track.lastTrailSampleAt = now;
    return true;
  }

  recordTrailSamples(now = Date.now()): number {
    let recorded = 0;
    for (const identifier of this.tracks.keys()) {
      if (this.recordTrailSample(identifier, now)) {
        recorded++;
      }
    }
    return recorded;
  }

  /** Trails are time-ordered, so only the front ever needs trimming. */
  pruneTrails(maxAgeSeconds: number, now = Date.now()): number {
    const cutoff = now - maxAgeSeconds * 1000;
    let pruned = 0;

    for (const track of this.tracks.values()) {
      let drop = 0;
      while (drop < track.trail.length && track.trail[drop].recordedAt < cutoff) {
        drop++;
      }
      if (drop > 0) {
        track.trail.splice(0, drop);
        pruned += drop;
      }
    }
    return pruned;
  }

  /** Single-source mode: drops every track missing from the latest full batch. */
  removeAbsent(currentIdentifiers: Set<string>): string[] {
    const present = new Set([...currentIdentifiers].map(normalizeIdentifier));
    const removed: string[] = [];

    for (const identifier of this.tracks.keys()) {
      if (!present.has(identifier)) {
        removed.push(identifier);
      }
    }
    for (const identifier of removed) {
      this.tracks.delete(identifier);
    }
    return removed;
  }

  stalenessOpacity(track: Track, now = Date.now()): number {
    return stalenessOpacity((now - track.lastUpdate) / 1000, this.options.staleness);
  }

  toView(track: Track, now = Date.now()): TrackView {
    return {
      identifier: track.identifier,
      label: track.label ?? null,
      position: { ...track.position },
      altitude: track.altitude ?? null,
      altitudeLabel: formatAltitude(track.altitude),
      heading: track.heading ?? null,
      groundSpeed: track.groundSpeed ?? null,
      verticalRate: track.verticalRate ?? null,
      squawk: track.squawk ?? null,
      emergency: emergencyOf(track.squawk),
      onGround: track.onGround ?? null,
      lastUpdate: new Date(track.lastUpdate).toISOString(),
      opacity: this.stalenessOpacity(track, now),
      trail: track.trail.map((point) => ({
        latitude: point.position.latitude,
        longitude: point.position.longitude,
        altitude: point.altitude ?? null,
        recordedAt: new Date(point.recordedAt).toISOString(),
        opacity: trailOpacity((now - point.recordedAt) / 1000),
      })),
      primarySource: track.primarySource ?? null,
      sources: [...track.sources.keys()],
    };
  }
}
