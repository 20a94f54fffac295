import { Module } from '@nestjs/common';
import { ViewportController } from './viewport.controller';
import { ViewportGateway } from './viewport.gateway';
import { ViewportService } from './viewport.service';

@Module({
  controllers: [ViewportController],
  providers: [ViewportService, ViewportGateway],
})
export class ViewportModule {}
