import { CoverageStats } from '../coverage/coverage-aggregator';
import { TrackingMode } from '../config/config.schema';
import { FusionStats } from '../fusion/fusion-engine';

export interface FrameResult {
  frame: number;
  /** Sources whose snapshot was locked this frame. */
  skippedSources: number;
  reportsApplied: number;
  removed: string[];
  trailSamples: number;
  trailPointsPruned: number;
  tracks: number;
}

export interface TrackingStats {
  mode: TrackingMode;
  frames: number;
  skippedReads: number;
  fusion: FusionStats;
  coverage: CoverageStats;
}
