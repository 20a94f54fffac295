import { WebSocketGateway, WebSocketServer } from '@nestjs/websockets';
import { Server } from 'socket.io';
import { TileRequest } from './viewport.types';

@WebSocketGateway({
  cors: {
    origin: '*',
  },
  namespace: '/viewport',
})
export class ViewportGateway {
  @WebSocketServer()
  server!: Server;

  broadcastTileRequest(request: TileRequest) {
    this.server.emit('tiles-needed', request);
  }
}
