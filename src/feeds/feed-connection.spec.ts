import { Test, TestingModule } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { Subject, of, throwError } from 'rxjs';
import { FeedConnection } from './feed-connection';

describe('FeedConnection', () => {
  const mockHttpService = {
    get: jest.fn(),
  };

  const source = {
    name: 'local-receiver',
    url: 'http://localhost:9999/data/aircraft.json',
    enabled: true,
    priority: 200,
  };

  const options = { poll_interval_ms: 1000, retry_delay_ms: 5000, timeout_ms: 3000 };

  let connection: FeedConnection;
  let setTimeoutSpy: jest.SpyInstance;

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.useFakeTimers();
    setTimeoutSpy = jest.spyOn(global, 'setTimeout');

    const module: TestingModule = await Test.createTestingModule({
      providers: [{ provide: HttpService, useValue: mockHttpService }],
    }).compile();

    connection = new FeedConnection(source, module.get(HttpService), options);
  });

  async function untilRequested(): Promise<void> {
    for (let i = 0; i < 50 && mockHttpService.get.mock.calls.length === 0; i++) {
      await Promise.resolve();
    }
  }

  afterEach(async () => {
    await connection.stop();
    setTimeoutSpy.mockRestore();
    jest.useRealTimers();
  });

  it('should publish parsed reports and poll again after the interval', async () => {
    mockHttpService.get.mockReturnValue(
      of({
        data: {
          now: 1700000000,
          messages: 5,
          aircraft: [{ hex: 'ABC123', lat: 1, lon: 2, alt_baro: 35000 }, { flight: 'NOHEX' }],
        },
      }),
    );

    connection.start();
    await connection.poll();

    expect(mockHttpService.get).toHaveBeenCalledWith(source.url, { timeout: 3000 });

    const value = connection.snapshot.tryRead();
    expect(value?.version).toBe(1);
    expect(value?.connection).toEqual({ status: 'connected' });
    expect(value?.reports).toEqual([
      {
        identifier: 'abc123',
        position: { latitude: 1, longitude: 2 },
        altitude: 35000,
        onGround: false,
      },
    ]);
    expect(setTimeoutSpy).toHaveBeenLastCalledWith(expect.any(Function), 1000);

    expect(connection.getStatus()).toMatchObject({
      name: 'local-receiver',
      connection: { status: 'connected' },
      aircraftCount: 1,
      messagesReceived: 1,
    });
  });

  it('should enter the error state and wait the retry delay when a request fails', async () => {
    mockHttpService.get.mockReturnValue(throwError(() => new Error('connect ECONNREFUSED')));

    connection.start();
    await connection.poll();

    const value = connection.snapshot.tryRead();
    expect(value?.version).toBe(0);
    expect(value?.connection).toEqual({ status: 'error', message: 'connect ECONNREFUSED' });
    expect(connection.getStatus().connection).toEqual({
      status: 'error',
      message: 'connect ECONNREFUSED',
    });
    expect(setTimeoutSpy).toHaveBeenLastCalledWith(expect.any(Function), 5000);
  });

  it('should keep the last batch after a failure', async () => {
    mockHttpService.get.mockReturnValueOnce(of({ data: { aircraft: [{ hex: 'abc123' }] } }));
    mockHttpService.get.mockReturnValueOnce(throwError(() => new Error('socket hang up')));

    connection.start();
    await connection.poll();
    await connection.poll();

    expect(connection.snapshot.tryRead()?.reports).toEqual([{ identifier: 'abc123' }]);
  });

  it('should not fetch once stopped', async () => {
    connection.start();
    await connection.stop();
    await connection.poll();

    expect(mockHttpService.get).not.toHaveBeenCalled();
    expect(connection.snapshot.tryRead()?.connection).toEqual({ status: 'disconnected' });
    expect(connection.running).toBe(false);
  });

  it('should drop a response that arrives after stop', async () => {
    const pending = new Subject<{ data: unknown }>();
    mockHttpService.get.mockReturnValue(pending);

    connection.start();
    const inFlight = connection.poll();
    await untilRequested();
    await connection.stop();

    pending.next({ data: { aircraft: [{ hex: 'abc123', lat: 1, lon: 2 }] } });
    pending.complete();
    await inFlight;

    expect(mockHttpService.get).toHaveBeenCalledTimes(1);
    expect(connection.running).toBe(false);
    expect(connection.getStatus().connection).toEqual({ status: 'disconnected' });
    expect(connection.snapshot.tryRead()).toMatchObject({
      connection: { status: 'disconnected' },
      version: 0,
      reports: [],
    });
    expect(setTimeoutSpy).not.toHaveBeenLastCalledWith(expect.any(Function), 1000);
  });

  it('should not enter the error state when a request fails after stop', async () => {
    const pending = new Subject<{ data: unknown }>();
    mockHttpService.get.mockReturnValue(pending);

    connection.start();
    const inFlight = connection.poll();
    await untilRequested();
    await connection.stop();

    pending.error(new Error('socket hang up'));
    await inFlight;

    expect(connection.getStatus().connection).toEqual({ status: 'disconnected' });
  });
});
