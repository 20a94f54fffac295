import { HttpService } from '@nestjs/axios';
import { Logger } from '@nestjs/common';
import { firstValueFrom } from 'rxjs';
import { FeedsConfig, SourceConfig } from '../config/config.schema';
import { parseAircraftReports } from './aircraft-report.parser';
import { FeedSnapshot } from './feed-snapshot';
import { ConnectionState, FeedStatus } from './types';

/**
 * Polls one source's `aircraft.json` and publishes each batch into its
 * snapshot. A failed request puts the connection in the error state and the
 * next attempt waits `retry_delay_ms`.
 */
export class FeedConnection {
  private readonly logger: Logger;
  readonly snapshot = new FeedSnapshot();

  private isRunning = false;
  private pollTimer: NodeJS.Timeout | null = null;
  private status: ConnectionState = { status: 'disconnected' };
  private messagesReceived = 0;
  private lastMessageAt: number | null = null;
  private aircraftCount = 0;

  constructor(
    readonly source: SourceConfig,
    private readonly httpService: HttpService,
    private readonly options: FeedsConfig,
  ) {
    this.logger = new Logger(`${FeedConnection.name}:${source.name}`);
  }

  get running(): boolean {
    return this.isRunning;
  }

  start(): void {
    if (this.isRunning) {
      return;
    }
    this.isRunning = true;
    this.logger.log(`[${this.source.name}] Polling ${this.source.url}`);
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    await this.transition({ status: 'disconnected' });
  }

  /** One fetch-and-publish cycle; reschedules itself while running. */
  async poll(): Promise<void> {
    this.pollTimer = null;
    if (!this.isRunning) {
      return;
    }

    let delay = this.options.poll_interval_ms;
    try {
      await this.fetchOnce();
    } catch (err) {
      if (!this.isRunning) {
        return;
      }
      const message = err instanceof Error ? err.message : JSON.stringify(err);
      this.logger.error(`[${this.source.name}] Error fetching data`, message);
      await this.transition({ status: 'error', message });
      this.logger.warn(`[${this.source.name}] Retrying in ${this.options.retry_delay_ms}ms`);
      delay = this.options.retry_delay_ms;
    }

    if (this.isRunning) {
      this.schedule(delay);
    }
  }

  getStatus(): FeedStatus {
    return {
      name: this.source.name,
      url: this.source.url,
      enabled: this.source.enabled,
      priority: this.source.priority,
      connection: this.status,
      aircraftCount: this.aircraftCount,
      messagesReceived: this.messagesReceived,
      lastMessageAt: this.lastMessageAt === null ? null : new Date(this.lastMessageAt).toISOString(),
    };
  }

  private async fetchOnce(): Promise<void> {
    if (this.status.status !== 'connected') {
      await this.transition({ status: 'connecting' });
    }

    const response = await firstValueFrom(
      this.httpService.get<unknown>(this.source.url, { timeout: this.options.timeout_ms }),
    );
    // stopped while the request was in flight
    if (!this.isRunning) {
      return;
    }
    const reports = parseAircraftReports(response.data);
    const now = Date.now();

    await this.snapshot.publish(reports, now);
    this.messagesReceived += reports.length;
    this.lastMessageAt = now;
    this.aircraftCount = reports.length;

    if (this.isRunning) {
      await this.transition({ status: 'connected' });
    }
  }

  private async transition(next: ConnectionState): Promise<void> {
    const changed = next.status !== this.status.status;
    this.status = next;
    await this.snapshot.setConnection(next);
    if (changed && next.status !== 'error') {
      this.logger.log(`[${this.source.name}] ${next.status}`);
    }
  }

  private schedule(delayMs: number): void {
    this.pollTimer = setTimeout(() => {
      this.poll().catch((err: unknown) =>
        this.logger.error(`[${this.source.name}] Poll failed`, String(err)),
      );
    }, delayMs);
  }
}
