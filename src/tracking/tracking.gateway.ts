import {
  WebSocketGateway,
  WebSocketServer,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { Logger } from '@nestjs/common';
import { EmergencyInfo } from '../tracks/emergency';
import { TrackView } from '../tracks/track.types';
import { TrackingStats } from './tracking.types';

export interface FrameBroadcast {
  timestamp: string;
  tracks: TrackView[];
  emergencies: EmergencyInfo[];
  stats: TrackingStats;
}

@WebSocketGateway({
  cors: {
    origin: '*',
  },
  namespace: '/tracking',
})
export class TrackingGateway implements OnGatewayConnection, OnGatewayDisconnect {
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(TrackingGateway.name);

  handleConnection(client: Socket) {
    this.logger.log(`Client connected: ${client.id}`);
  }

  handleDisconnect(client: Socket) {
    this.logger.log(`Client disconnected: ${client.id}`);
  }

  /**
   * Pushes the current frame to every connected client
   */
  broadcastFrame(frame: FrameBroadcast) {
    this.server.emit('tracks-update', frame);
  }
}
