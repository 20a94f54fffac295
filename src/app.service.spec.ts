import { Test, TestingModule } from '@nestjs/testing';
import { AppService } from './app.service';
import { FeedsService } from './feeds/feeds.service';
import { TrackingService } from './tracking/tracking.service';
import { TrackStore } from './tracks/track-store';

describe('AppService', () => {
  let service: AppService;

  const mockTrackingService = {
    mode: 'fusion',
    startTracking: jest.fn(),
    getStore: jest.fn(() => new TrackStore()),
  };

  const mockFeedsService = {
    getStatus: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AppService,
        { provide: TrackingService, useValue: mockTrackingService },
        { provide: FeedsService, useValue: mockFeedsService },
      ],
    }).compile();

    service = module.get<AppService>(AppService);
  });

  it('should name the tracking mode', () => {
    expect(service.getHello()).toBe('Airspace Fusion API - fusion mode');
  });

  it('should start tracking on bootstrap', () => {
    service.onApplicationBootstrap();
    expect(mockTrackingService.startTracking).toHaveBeenCalledTimes(1);
  });

  it('should report ok while an enabled feed is connected', () => {
    mockFeedsService.getStatus.mockReturnValue([
      { name: 'local', enabled: true, connection: { status: 'connected' } },
      { name: 'remote', enabled: true, connection: { status: 'error', message: 'timeout' } },
      { name: 'spare', enabled: false, connection: { status: 'disconnected' } },
    ]);

    expect(service.healthCheck()).toMatchObject({
      status: 'ok',
      mode: 'fusion',
      tracks: 0,
      feeds: [
        { name: 'local', status: 'connected' },
        { name: 'remote', status: 'error' },
      ],
    });
  });

  it('should report degraded with no connected feed', () => {
    mockFeedsService.getStatus.mockReturnValue([
      { name: 'local', enabled: true, connection: { status: 'connecting' } },
    ]);

    expect(service.healthCheck().status).toBe('degraded');
  });
});
