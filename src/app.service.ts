import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { FeedsService } from './feeds/feeds.service';
import { TrackingService } from './tracking/tracking.service';

export interface HealthReport {
  status: 'ok' | 'degraded';
  uptimeSeconds: number;
  mode: string;
  tracks: number;
  feeds: Array<{ name: string; status: string }>;
}

@Injectable()
export class AppService implements OnApplicationBootstrap {
  private readonly logger = new Logger(AppService.name);
  private readonly startedAt = Date.now();

  constructor(
    private readonly trackingService: TrackingService,
    private readonly feedsService: FeedsService,
  ) {}

  /**
   * Auto-start feeds and the frame loop when the application boots
   */
  onApplicationBootstrap() {
    this.logger.log('[INIT] Starting track fusion...');
    this.trackingService.startTracking();
  }

  getHello(): string {
    return `Airspace Fusion API - ${this.trackingService.mode} mode`;
  }

  /** Degraded while no enabled feed is connected. */
  healthCheck(): HealthReport {
    const feeds = this.feedsService
      .getStatus()
      .filter((feed) => feed.enabled)
      .map((feed) => ({ name: feed.name, status: feed.connection.status }));

    return {
      status: feeds.some((feed) => feed.status === 'connected') ? 'ok' : 'degraded',
      uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
      mode: this.trackingService.mode,
      tracks: this.trackingService.getStore().size,
      feeds,
    };
  }
}
