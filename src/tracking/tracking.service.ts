import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { SourceConfig, TrackingConfig, TrackingMode } from '../config/config.schema';
import { CoverageAggregator } from '../coverage/coverage-aggregator';
import { GeoPoint } from '../geo/geo';
import { FeedConnection } from '../feeds/feed-connection';
import { FeedsService } from '../feeds/feeds.service';
import { FusionEngine } from '../fusion/fusion-engine';
import { activeEmergencies } from '../tracks/emergency';
import { TrackStore, normalizeIdentifier } from '../tracks/track-store';
import { AircraftReport, MergeResult } from '../tracks/track.types';
import { TrackingGateway } from './tracking.gateway';
import { FrameResult, TrackingStats } from './tracking.types';

export const FRAME_INTERVAL_NAME = 'tracking-frame';

/**
 * Owns the track store and drives it from the feed snapshots, one frame at a
 * time. Feeds never touch the store; everything here runs on the event loop
 * between timer callbacks.
 */
@Injectable()
export class TrackingService implements OnModuleDestroy {
  private readonly logger = new Logger(TrackingService.name);
  private readonly tracking: TrackingConfig;
  private readonly store: TrackStore;
  private readonly fusion: FusionEngine;
  private readonly coverage: CoverageAggregator;

  private readonly lastVersions = new Map<string, number>();
  private isRunning = false;
  private frames = 0;
  private skippedReads = 0;

  constructor(
    private readonly feedsService: FeedsService,
    private readonly gateway: TrackingGateway,
    private readonly config: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.tracking = this.config.getOrThrow<TrackingConfig>('tracking');
    const sources = this.config.get<SourceConfig[]>('sources') ?? [];
    const receiver = this.config.getOrThrow<GeoPoint>('receiver');

    this.store = new TrackStore({
      trailSampleIntervalMs: this.tracking.trail.sample_interval_ms,
      staleness: {
        freshSeconds: this.tracking.staleness.fresh_seconds,
        staleSeconds: this.tracking.staleness.stale_seconds,
        minOpacity: this.tracking.staleness.min_opacity,
      },
    });
    this.fusion = new FusionEngine(sources, this.store);
    this.coverage = new CoverageAggregator(
      { latitude: receiver.latitude, longitude: receiver.longitude },
      this.config.get<boolean>('coverage.enabled') ?? true,
    );
  }

  get mode(): TrackingMode {
    return this.tracking.mode;
  }

  getStore(): TrackStore {
    return this.store;
  }

  getCoverage(): CoverageAggregator {
    return this.coverage;
  }

  startTracking(): void {
    if (this.isRunning) {
      this.logger.warn('[WARN] Tracking already running');
      return;
    }
    this.isRunning = true;

    this.feedsService.start();
    const interval = setInterval(() => this.runFrame(), this.tracking.frame_interval_ms);
    this.schedulerRegistry.addInterval(FRAME_INTERVAL_NAME, interval);

    this.logger.log(
      `[INIT] Tracking in ${this.tracking.mode} mode, frame every ${this.tracking.frame_interval_ms}ms`,
    );
  }

  async stopTracking(): Promise<void> {
    if (!this.isRunning) {
      return;
    }
    this.isRunning = false;

    if (this.schedulerRegistry.doesExist('interval', FRAME_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(FRAME_INTERVAL_NAME);
    }
    await this.feedsService.stop();
    this.logger.log('[STOP] Tracking stopped');
  }

  async onModuleDestroy(): Promise<void> {
    await this.stopTracking();
  }

  /**
   * One frame: read snapshots, update the store, sample and prune trails,
   * feed coverage, then broadcast.
   */
  tick(now = Date.now()): FrameResult {
    this.frames++;
    const result: FrameResult = {
      frame: this.frames,
      skippedSources: 0,
      reportsApplied: 0,
      removed: [],
      trailSamples: 0,
      trailPointsPruned: 0,
      tracks: 0,
    };

    const accepted: MergeResult[] = [];
    const connections = this.feedsService.getConnections();

    if (this.tracking.mode === 'single') {
      const connection = connections[0];
      if (connection) {
        const batch = this.readNewBatch(connection, result);
        if (batch) {
          for (const report of batch) {
            accepted.push(this.store.upsert(report.identifier, report, now));
          }
          result.removed = this.store.removeAbsent(
            new Set(batch.map((report) => normalizeIdentifier(report.identifier))),
          );
        }
      }
    } else {
      for (const connection of connections) {
        const batch = this.readNewBatch(connection, result);
        if (!batch) {
          continue;
        }
        for (const report of batch) {
          accepted.push(
            this.fusion.mergeReport(
              { ...report, sourceName: connection.source.name, sourcePriority: connection.source.priority },
              now,
            ),
          );
        }
      }
    }

    result.trailSamples = this.store.recordTrailSamples(now);
    result.trailPointsPruned = this.store.pruneTrails(this.tracking.trail.max_age_seconds, now);

    for (const merge of accepted) {
      if (merge.track) {
        result.reportsApplied++;
        this.coverage.observe(merge.track.identifier, merge.track.position);
      }
    }

    result.tracks = this.store.size;
    if (result.removed.length > 0) {
      this.logger.debug(`[FRAME] Removed ${result.removed.length} track(s) absent from the latest batch`);
    }

    this.gateway.broadcastFrame({
      timestamp: new Date(now).toISOString(),
      tracks: this.store.list().map((track) => this.store.toView(track, now)),
      emergencies: activeEmergencies(this.store.list()),
      stats: this.getStats(),
    });

    return result;
  }

  getStats(): TrackingStats {
    const connected = this.feedsService
      .getStatus()
      .filter((feed) => feed.connection.status === 'connected').length;

    return {
      mode: this.tracking.mode,
      frames: this.frames,
      skippedReads: this.skippedReads,
      fusion: this.fusion.getStats(connected),
      coverage: this.coverage.getStats(),
    };
  }

  /** `null` when the snapshot is locked or holds nothing new since last frame. */
  private readNewBatch(connection: FeedConnection, result: FrameResult): AircraftReport[] | null {
    const snapshot = connection.snapshot.tryRead();
    if (!snapshot) {
      result.skippedSources++;
      this.skippedReads++;
      return null;
    }

    const name = connection.source.name;
    if (snapshot.version === (this.lastVersions.get(name) ?? 0)) {
      return null;
    }
    this.lastVersions.set(name, snapshot.version);
    return snapshot.reports;
  }

  private runFrame(): void {
    try {
      this.tick();
    } catch (err) {
      this.logger.error('[FRAME] Frame failed', err instanceof Error ? err.stack : String(err));
    }
  }
}
