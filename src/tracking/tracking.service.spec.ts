import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { FeedSnapshot } from '../feeds/feed-snapshot';
import { FeedsService } from '../feeds/feeds.service';
import { AircraftReport } from '../tracks/track.types';
import { TrackingGateway } from './tracking.gateway';
import { FRAME_INTERVAL_NAME, TrackingService } from './tracking.service';

describe('TrackingService', () => {
  const local = {
    source: { name: 'local', url: 'http://localhost:9999/aircraft.json', enabled: true, priority: 200 },
    snapshot: new FeedSnapshot(),
  };
  const remote = {
    source: { name: 'remote', url: 'http://localhost:8888/aircraft.json', enabled: true, priority: 50 },
    snapshot: new FeedSnapshot(),
  };

  const mockFeedsService = {
    start: jest.fn(),
    stop: jest.fn().mockResolvedValue(undefined),
    getConnections: jest.fn(),
    getStatus: jest.fn().mockReturnValue([]),
  };

  const mockGateway = {
    broadcastFrame: jest.fn(),
  };

  const alpha = (latitude: number, altitude: number): AircraftReport => ({
    identifier: 'a1b2c3',
    position: { latitude, longitude: 0 },
    altitude,
  });
  const bravo: AircraftReport = { identifier: '4ca7b3', position: { latitude: 0, longitude: 0.5 } };

  let service: TrackingService;
  let schedulerRegistry: SchedulerRegistry;

  async function createService(mode: 'single' | 'fusion'): Promise<void> {
    const values: Record<string, unknown> = {
      tracking: {
        mode,
        frame_interval_ms: 250,
        trail: { sample_interval_ms: 2000, max_age_seconds: 300 },
        staleness: { fresh_seconds: 10, stale_seconds: 30, min_opacity: 0.1 },
      },
      receiver: { latitude: 0, longitude: 0 },
      'coverage.enabled': true,
      sources: [local.source, remote.source],
    };
    const mockConfigService = {
      get: jest.fn((key: string) => values[key]),
      getOrThrow: jest.fn((key: string) => values[key]),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TrackingService,
        SchedulerRegistry,
        { provide: FeedsService, useValue: mockFeedsService },
        { provide: TrackingGateway, useValue: mockGateway },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<TrackingService>(TrackingService);
    schedulerRegistry = module.get<SchedulerRegistry>(SchedulerRegistry);
  }

  beforeEach(() => {
    jest.clearAllMocks();
    local.snapshot = new FeedSnapshot();
    remote.snapshot = new FeedSnapshot();
  });

  describe('single mode', () => {
    beforeEach(async () => {
      mockFeedsService.getConnections.mockReturnValue([local]);
      await createService('single');
    });

    it('should drop tracks missing from the latest batch', async () => {
      await local.snapshot.publish([alpha(1, 10000), bravo]);
      expect(service.tick(1000).tracks).toBe(2);

      await local.snapshot.publish([alpha(1.1, 11000)]);
      const frame = service.tick(2000);

      expect(frame.removed).toEqual(['4ca7b3']);
      expect(service.getStore().list().map((t) => t.identifier)).toEqual(['a1b2c3']);
      expect(service.getStore().get('a1b2c3')?.altitude).toBe(11000);
    });

    it('should leave the store alone when no new batch arrived', async () => {
      await local.snapshot.publish([alpha(1, 10000), bravo]);
      service.tick(1000);

      const frame = service.tick(1250);

      expect(frame.reportsApplied).toBe(0);
      expect(frame.removed).toEqual([]);
      expect(frame.tracks).toBe(2);
    });
  });

  describe('fusion mode', () => {
    beforeEach(async () => {
      mockFeedsService.getConnections.mockReturnValue([local, remote]);
      await createService('fusion');
    });

    it('should keep the higher-priority source as primary', async () => {
      await local.snapshot.publish([alpha(1, 10000)]);
      await remote.snapshot.publish([alpha(2, 20000), bravo]);

      const frame = service.tick(1000);

      expect(frame.reportsApplied).toBe(3);
      const track = service.getStore().get('a1b2c3');
      expect(track?.altitude).toBe(10000);
      expect(track?.position).toEqual({ latitude: 1, longitude: 0 });
      expect(track?.primarySource).toBe('local');
      expect([...(track?.sources.keys() ?? [])]).toEqual(['local', 'remote']);
      expect(service.getStore().get('4ca7b3')?.primarySource).toBe('remote');
    });

    it('should never remove tracks missing from a batch', async () => {
      await local.snapshot.publish([alpha(1, 10000)]);
      await remote.snapshot.publish([bravo]);
      service.tick(1000);

      await local.snapshot.publish([]);
      await remote.snapshot.publish([]);
      const frame = service.tick(2000);

      expect(frame.removed).toEqual([]);
      expect(frame.tracks).toBe(2);
    });

    it('should skip a source whose snapshot is locked and pick it up next frame', async () => {
      await local.snapshot.publish([alpha(1, 10000)]);
      const release = await local.snapshot.lock();

      const skipped = service.tick(1000);
      expect(skipped.skippedSources).toBe(1);
      expect(skipped.tracks).toBe(0);

      release();
      const next = service.tick(1250);
      expect(next.skippedSources).toBe(0);
      expect(next.tracks).toBe(1);
      expect(service.getStats().skippedReads).toBe(1);
    });

    it('should sample trails, feed coverage and broadcast each frame', async () => {
      await local.snapshot.publish([alpha(1, 10000)]);
      await remote.snapshot.publish([alpha(2, 20000), bravo]);

      const frame = service.tick(1000);

      expect(frame.trailSamples).toBe(2);
      expect(service.getStats().coverage.uniqueAircraft).toBe(2);
      expect(mockGateway.broadcastFrame).toHaveBeenCalledTimes(1);

      const [broadcast] = mockGateway.broadcastFrame.mock.calls[0];
      expect(broadcast.timestamp).toBe('1970-01-01T00:00:01.000Z');
      expect(broadcast.tracks).toHaveLength(2);
      expect(broadcast.emergencies).toEqual([]);
      expect(broadcast.stats.fusion).toEqual({
        totalSources: 2,
        connectedSources: 0,
        totalTracks: 2,
        totalMessages: 3,
        messagesBySource: { local: 1, remote: 2 },
      });
    });
  });

  describe('lifecycle', () => {
    beforeEach(async () => {
      jest.useFakeTimers();
      mockFeedsService.getConnections.mockReturnValue([local]);
      await createService('single');
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should register the frame interval and start the feeds', async () => {
      service.startTracking();

      expect(mockFeedsService.start).toHaveBeenCalledTimes(1);
      expect(schedulerRegistry.doesExist('interval', FRAME_INTERVAL_NAME)).toBe(true);

      await local.snapshot.publish([bravo]);
      jest.advanceTimersByTime(250);
      expect(service.getStore().size).toBe(1);

      await service.onModuleDestroy();
      expect(schedulerRegistry.doesExist('interval', FRAME_INTERVAL_NAME)).toBe(false);
      expect(mockFeedsService.stop).toHaveBeenCalledTimes(1);
    });
  });
});
