import { Test, TestingModule } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { FeedsService } from './feeds.service';

describe('FeedsService', () => {
  const mockHttpService = {
    get: jest.fn(),
  };

  const sources = [
    { name: 'local-receiver', url: 'http://localhost:9999/aircraft.json', enabled: true, priority: 200 },
    { name: 'remote-aggregator', url: 'http://localhost:8888/aircraft.json', enabled: true, priority: 50 },
    { name: 'spare', url: 'http://localhost:7777/aircraft.json', enabled: false, priority: 10 },
  ];

  async function createService(mode: 'single' | 'fusion'): Promise<FeedsService> {
    const values: Record<string, unknown> = {
      sources,
      'tracking.mode': mode,
      feeds: { poll_interval_ms: 1000, retry_delay_ms: 5000, timeout_ms: 3000 },
    };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FeedsService,
        { provide: HttpService, useValue: mockHttpService },
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => values[key]) } },
      ],
    }).compile();

    return module.get<FeedsService>(FeedsService);
  }

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should open a connection per enabled source in fusion mode', async () => {
    const service = await createService('fusion');

    expect(service.getConnections().map((c) => c.source.name)).toEqual([
      'local-receiver',
      'remote-aggregator',
    ]);
  });

  it('should use only the first enabled source in single mode', async () => {
    const service = await createService('single');

    expect(service.getConnections().map((c) => c.source.name)).toEqual(['local-receiver']);
  });

  it('should report disabled sources as disconnected', async () => {
    const service = await createService('fusion');

    const status = service.getStatus();
    expect(status).toHaveLength(3);
    expect(status[2]).toEqual({
      name: 'spare',
      url: 'http://localhost:7777/aircraft.json',
      enabled: false,
      priority: 10,
      connection: { status: 'disconnected' },
      aircraftCount: 0,
      messagesReceived: 0,
      lastMessageAt: null,
    });
  });

  it('should start and stop every connection', async () => {
    jest.useFakeTimers();
    const service = await createService('fusion');

    service.start();
    expect(service.getConnections().every((c) => c.running)).toBe(true);

    await service.onModuleDestroy();
    expect(service.getConnections().some((c) => c.running)).toBe(false);
    jest.useRealTimers();
  });
});
