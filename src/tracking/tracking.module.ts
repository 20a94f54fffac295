import { Module } from '@nestjs/common';
import { FeedsModule } from '../feeds/feeds.module';
import { CoverageController } from './coverage.controller';
import { TrackingGateway } from './tracking.gateway';
import { TrackingService } from './tracking.service';
import { TracksController } from './tracks.controller';

@Module({
  imports: [FeedsModule],
  controllers: [TracksController, CoverageController],
  providers: [TrackingService, TrackingGateway],
  exports: [TrackingService],
})
export class TrackingModule {}
