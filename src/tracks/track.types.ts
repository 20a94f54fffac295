import { GeoPoint } from '../geo/geo';
import { EmergencyType } from './emergency';

/**
 * One aircraft report as delivered by a feed. Every field except the
 * identifier is optional; absence means "unchanged", never "cleared".
 */
export interface AircraftReport {
  /** ICAO 24-bit address as hex */
  identifier: string;
  position?: GeoPoint;
  /** feet */
  altitude?: number;
  /** degrees true */
  heading?: number;
  /** knots */
  speed?: number;
  /** feet per minute */
  verticalRate?: number;
  callsign?: string;
  squawk?: string;
  onGround?: boolean;
}

export interface SourcedReport extends AircraftReport {
  sourceName: string;
  sourcePriority?: number;
}

export interface TrailPoint {
  position: GeoPoint;
  altitude?: number;
  /** epoch ms */
  recordedAt: number;
}

export interface SourceRecord {
  sourceName: string;
  priority: number;
  lastUpdate: number;
}

export interface Track {
  identifier: string;
  label?: string;
  position: GeoPoint;
  altitude?: number;
  heading?: number;
  groundSpeed?: number;
  verticalRate?: number;
  squawk?: string;
  onGround?: boolean;
  firstSeen: number;
  lastUpdate: number;
  /** Oldest first. */
  trail: TrailPoint[];
  lastTrailSampleAt?: number;
  /** Fusion mode only. */
  primarySource?: string;
  sources: Map<string, SourceRecord>;
}

export type MergeOutcome = 'created' | 'updated' | 'ignored';

export interface MergeResult {
  outcome: MergeOutcome;
  /** Whether the report's fields were written to the track. */
  overwritten: boolean;
  track?: Track;
}

/** JSON shape of a track for the HTTP and WebSocket surfaces. */
export interface TrackView {
  identifier: string;
  label: string | null;
  position: GeoPoint;
  altitude: number | null;
  altitudeLabel: string;
  heading: number | null;
  groundSpeed: number | null;
  verticalRate: number | null;
  squawk: string | null;
  /** Derived from the squawk code. */
  emergency: EmergencyType | null;
  onGround: boolean | null;
  lastUpdate: string;
  opacity: number;
  trail: Array<{
    latitude: number;
    longitude: number;
    altitude: number | null;
    recordedAt: string;
    opacity: number;
  }>;
  primarySource: string | null;
  sources: string[];
}
