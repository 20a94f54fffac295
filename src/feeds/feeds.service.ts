import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { FeedsConfig, SourceConfig, TrackingMode } from '../config/config.schema';
import { FeedConnection } from './feed-connection';
import { FeedStatus } from './types';

const DEFAULT_FEEDS: FeedsConfig = {
  poll_interval_ms: 1000,
  retry_delay_ms: 5000,
  timeout_ms: 3000,
};

@Injectable()
export class FeedsService implements OnModuleDestroy {
  private readonly logger = new Logger(FeedsService.name);
  private readonly sources: SourceConfig[];
  private readonly connections: FeedConnection[];

  constructor(
    private readonly httpService: HttpService,
    private readonly config: ConfigService,
  ) {
    this.sources = this.config.get<SourceConfig[]>('sources') ?? [];
    const mode = this.config.get<TrackingMode>('tracking.mode') ?? 'fusion';
    const options = this.config.get<FeedsConfig>('feeds') ?? DEFAULT_FEEDS;

    let active = this.sources.filter((source) => source.enabled);
    if (mode === 'single' && active.length > 1) {
      this.logger.warn(
        `Single mode uses only "${active[0].name}"; ignoring ${active.length - 1} other enabled source(s)`,
      );
      active = active.slice(0, 1);
    }

    this.connections = active.map((source) => new FeedConnection(source, this.httpService, options));
  }

  start(): void {
    if (this.connections.length === 0) {
      this.logger.warn('No enabled sources configured');
    }
    for (const connection of this.connections) {
      connection.start();
    }
  }

  async stop(): Promise<void> {
    await Promise.all(this.connections.map((connection) => connection.stop()));
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  getConnections(): FeedConnection[] {
    return [...this.connections];
  }

  /** Every configured source, including disabled ones. */
  getStatus(): FeedStatus[] {
    return this.sources.map((source) => {
      const connection = this.connections.find((c) => c.source.name === source.name);
      if (connection) {
        return connection.getStatus();
      }
      return {
        name: source.name,
        url: source.url,
        enabled: source.enabled,
        priority: source.priority,
        connection: { status: 'disconnected' },
        aircraftCount: 0,
        messagesReceived: 0,
        lastMessageAt: null,
      };
    });
  }
}
