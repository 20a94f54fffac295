import { Controller, Get, HttpCode, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CoverageSector, CoverageStats } from '../coverage/coverage-aggregator';
import { GeoPoint } from '../geo/geo';
import { TrackingService } from './tracking.service';

@ApiTags('coverage')
@Controller('coverage')
export class CoverageController {
  constructor(private readonly trackingService: TrackingService) {}

  @Get()
  getCoverage(): {
    enabled: boolean;
    receiver: GeoPoint;
    stats: CoverageStats;
    sectors: CoverageSector[];
  } {
    const coverage = this.trackingService.getCoverage();
    return {
      enabled: coverage.enabled,
      receiver: coverage.getReceiverLocation(),
      stats: coverage.getStats(),
      sectors: coverage.getSectors(),
    };
  }

  @Get('polygon')
  getPolygon(): GeoPoint[] {
    return this.trackingService.getCoverage().getPolygonPoints();
  }

  @Post('reset')
  @HttpCode(204)
  reset(): void {
    this.trackingService.getCoverage().reset();
  }
}
