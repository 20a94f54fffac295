export interface AltitudeBandStats {
  groundTo10k: number;
  tenTo25k: number;
  twentyFiveTo40k: number;
  above40k: number;
  unknown: number;
  total: number;
}

export function altitudeBands(tracks: Iterable<{ altitude?: number }>): AltitudeBandStats {
  const stats: AltitudeBandStats = {
    groundTo10k: 0,
    tenTo25k: 0,
    twentyFiveTo40k: 0,
    above40k: 0,
    unknown: 0,
    total: 0,
  };

  for (const { altitude } of tracks) {
    stats.total++;
    if (altitude === undefined) {
      stats.unknown++;
    } else if (altitude < 10000) {
      stats.groundTo10k++;
    } else if (altitude < 25000) {
      stats.tenTo25k++;
    } else if (altitude < 40000) {
      stats.twentyFiveTo40k++;
    } else {
      stats.above40k++;
    }
  }
  return stats;
}
