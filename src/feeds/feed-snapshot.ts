import { Mutex } from 'async-mutex';
import { AircraftReport } from '../tracks/track.types';
import { ConnectionState, SnapshotValue } from './types';

/**
 * Latest-value cell shared between a feed's poll loop and the frame tick.
 * Writers replace the whole value under the lock; readers never wait.
 */
export class FeedSnapshot {
  private readonly mutex = new Mutex();
  private value: SnapshotValue = {
    reports: [],
    connection: { status: 'disconnected' },
    version: 0,
    updatedAt: null,
  };

  async publish(reports: AircraftReport[], now = Date.now()): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.value = {
        ...this.value,
        reports,
        version: this.value.version + 1,
        updatedAt: now,
      };
    });
  }

  async setConnection(connection: ConnectionState): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.value = { ...this.value, connection };
    });
  }

  /** `null` while a writer holds the lock; the caller skips this frame. */
  tryRead(): SnapshotValue | null {
    if (this.mutex.isLocked()) {
      return null;
    }
    return this.value;
  }

  /** Holds the lock until the returned release is called. */
  async lock(): Promise<() => void> {
    return this.mutex.acquire();
  }
}
