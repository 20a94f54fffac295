import {
  GeoPoint,
  haversineDistanceNauticalMiles,
  initialBearingDegrees,
  toRadians,
} from '../geo/geo';

export const NUM_SECTORS = 36;
export const DEGREES_PER_SECTOR = 360 / NUM_SECTORS;

export interface CoverageSector {
  index: number;
  maxRangeNm: number;
  avgRangeNm: number;
  /** Distinct aircraft seen in this sector. */
  aircraftCount: number;
}

export interface CoverageStats {
  maxRangeNm: number;
  avgMaxRangeNm: number;
  activeSectors: number;
  totalSectors: number;
  uniqueAircraft: number;
  totalObservations: number;
}

export function bearingToSector(bearing: number): number {
  const normalized = ((bearing % 360) + 360) % 360;
  return Math.min(Math.floor(normalized / DEGREES_PER_SECTOR), NUM_SECTORS - 1);
}

function emptySector(index: number): CoverageSector {
  return { index, maxRangeNm: 0, avgRangeNm: 0, aircraftCount: 0 };
}

/**
 * Receiver coverage by bearing sector. Each aircraft counts once per sector it
 * has been seen in; the sector's max range keeps growing with every
 * observation.
 */
export class CoverageAggregator {
  private sectors: CoverageSector[] = Array.from({ length: NUM_SECTORS }, (_, i) => emptySector(i));
  private readonly sectorsSeen = new Map<string, Set<number>>();
  private overallMaxRangeNm = 0;

  constructor(
    private readonly receiverLocation: GeoPoint,
    public enabled = true,
  ) {}

  getReceiverLocation(): GeoPoint {
    return { ...this.receiverLocation };
  }

  observe(identifier: string, position: GeoPoint, receiverLocation: GeoPoint = this.receiverLocation): void {
    if (!this.enabled) {
      return;
    }

    const range = haversineDistanceNauticalMiles(receiverLocation, position);
    const sectorIndex = bearingToSector(initialBearingDegrees(receiverLocation, position));
    const sector = this.sectors[sectorIndex];

    let seen = this.sectorsSeen.get(identifier);
    if (!seen) {
      seen = new Set();
      this.sectorsSeen.set(identifier, seen);
    }

    if (!seen.has(sectorIndex)) {
      seen.add(sectorIndex);
      sector.aircraftCount++;
      sector.avgRangeNm += (range - sector.avgRangeNm) / sector.aircraftCount;
    }
    if (range > sector.maxRangeNm) {
      sector.maxRangeNm = range;
    }
    if (range > this.overallMaxRangeNm) {
      this.overallMaxRangeNm = range;
    }
  }

  getSectors(): CoverageSector[] {
    return this.sectors.map((sector) => ({ ...sector }));
  }

  /**
   * One vertex per sector at its max range along the sector's center bearing.
   * Uses 60 nm per degree with a cos(latitude) longitude correction, which is
   * fine for drawing and nothing else. Empty sectors collapse to the receiver.
   */
  getPolygonPoints(): GeoPoint[] {
    const receiver = this.receiverLocation;
    const lonScale = 60 * Math.cos(toRadians(receiver.latitude));

    return this.sectors.map((sector) => {
      if (sector.maxRangeNm <= 0) {
        return { ...receiver };
      }
      const bearing = toRadians(sector.index * DEGREES_PER_SECTOR + DEGREES_PER_SECTOR / 2);
      return {
        latitude: receiver.latitude + (sector.maxRangeNm * Math.cos(bearing)) / 60,
        longitude: receiver.longitude + (sector.maxRangeNm * Math.sin(bearing)) / lonScale,
      };
    });
  }

  getStats(): CoverageStats {
    const active = this.sectors.filter((sector) => sector.maxRangeNm > 0);
    const totalObservations = this.sectors.reduce((sum, sector) => sum + sector.aircraftCount, 0);

    return {
      maxRangeNm: this.overallMaxRangeNm,
      avgMaxRangeNm:
        active.length > 0
          ? active.reduce((sum, sector) => sum + sector.maxRangeNm, 0) / active.length
          : 0,
      activeSectors: active.length,
      totalSectors: NUM_SECTORS,
      uniqueAircraft: this.sectorsSeen.size,
      totalObservations,
    };
  }

  reset(): void {
    this.sectors = Array.from({ length: NUM_SECTORS }, (_, i) => emptySector(i));
    this.sectorsSeen.clear();
    this.overallMaxRangeNm = 0;
  }
}
