import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { AltitudeBandStats, altitudeBands } from '../coverage/altitude-bands';
import { EmergencyInfo, activeEmergencies } from '../tracks/emergency';
import { PredictedPosition, predictTrack } from '../tracks/prediction';
import { Track, TrackView } from '../tracks/track.types';
import { TrackingService } from './tracking.service';
import { TrackingStats } from './tracking.types';

@ApiTags('tracks')
@Controller('tracks')
export class TracksController {
  constructor(private readonly trackingService: TrackingService) {}

  @Get()
  @ApiOperation({ summary: 'Every track currently held' })
  getTracks(): TrackView[] {
    const store = this.trackingService.getStore();
    const now = Date.now();
    return store.list().map((track) => store.toView(track, now));
  }

  @Get('stats')
  getStats(): TrackingStats {
    return this.trackingService.getStats();
  }

  @Get('stats/altitude-bands')
  getAltitudeBands(): AltitudeBandStats {
    return altitudeBands(this.trackingService.getStore().list());
  }

  @Get('emergencies')
  @ApiOperation({ summary: 'Tracks squawking 7500, 7600 or 7700' })
  getEmergencies(): EmergencyInfo[] {
    return activeEmergencies(this.trackingService.getStore().list());
  }

  @Get(':id')
  getTrack(@Param('id') id: string): TrackView {
    return this.trackingService.getStore().toView(this.findTrack(id));
  }

  @Get(':id/prediction')
  @ApiOperation({ summary: 'Dead-reckoned positions at 1, 5 and 15 minutes' })
  getPrediction(@Param('id') id: string): { identifier: string; predictions: PredictedPosition[] } {
    const track = this.findTrack(id);
    return { identifier: track.identifier, predictions: predictTrack(track) };
  }

  private findTrack(id: string): Track {
    const track = this.trackingService.getStore().get(id);
    if (!track) {
      throw new NotFoundException(`Track ${id} not found`);
    }
    return track;
  }
}
