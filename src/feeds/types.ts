import { AircraftReport } from '../tracks/track.types';

export type ConnectionState =
  | { status: 'disconnected' }
  | { status: 'connecting' }
  | { status: 'connected' }
  | { status: 'error'; message: string };

export interface SnapshotValue {
  reports: AircraftReport[];
  connection: ConnectionState;
  /** Bumped on every published batch. */
  version: number;
  updatedAt: number | null;
}

export interface FeedStatus {
  name: string;
  url: string;
  enabled: boolean;
  priority: number;
  connection: ConnectionState;
  aircraftCount: number;
  messagesReceived: number;
  lastMessageAt: string | null;
}
