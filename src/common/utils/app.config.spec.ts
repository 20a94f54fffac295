import { parseConfig } from './app.config';

const minimal = `
api:
  enabled: true
tracking:
  mode: single
receiver:
  latitude: 37.6872
  longitude: -97.3301
viewport:
  latitude: 37.6872
  longitude: -97.3301
sources:
  - name: local-receiver
    url: http://localhost:8080/data/aircraft.json
    enabled: true
`;

describe('parseConfig', () => {
  const originalDocker = process.env.DOCKER;

  afterEach(() => {
    if (originalDocker === undefined) {
      delete process.env.DOCKER;
    } else {
      process.env.DOCKER = originalDocker;
    }
  });

  it('should fill in defaults', () => {
    delete process.env.DOCKER;
    const config = parseConfig(minimal);

    expect(config.api.port).toBe(1937);
    expect(config.tracking.frame_interval_ms).toBe(250);
    expect(config.tracking.trail).toEqual({ sample_interval_ms: 2000, max_age_seconds: 300 });
    expect(config.tracking.staleness).toEqual({
      fresh_seconds: 10,
      stale_seconds: 30,
      min_opacity: 0.1,
    });
    expect(config.viewport.zoom_level).toBe(10);
    expect(config.feeds.retry_delay_ms).toBe(5000);
    expect(config.sources[0].priority).toBe(100);
    expect(config.coverage.enabled).toBe(true);
  });

  it('should rewrite localhost sources inside docker', () => {
    process.env.DOCKER = '1';
    const config = parseConfig(minimal);
    expect(config.sources[0].url).toBe('http://host.docker.internal:8080/data/aircraft.json');
  });

  it('should report every validation error', () => {
    const broken = minimal
      .replace('mode: single', 'mode: round-robin')
      .replace('latitude: 37.6872\n  longitude: -97.3301\nviewport', 'latitude: 137\n  longitude: -97.3301\nviewport');

    expect(() => parseConfig(broken)).toThrow(/"tracking\.mode" must be one of/);
    expect(() => parseConfig(broken)).toThrow(/"receiver\.latitude" must be less than or equal to 90/);
  });

  it('should reject a zoom level outside 0..19', () => {
    const broken = minimal.replace(
      'viewport:\n  latitude: 37.6872',
      'viewport:\n  zoom_level: 22\n  latitude: 37.6872',
    );
    expect(() => parseConfig(broken)).toThrow(/viewport\.zoom_level/);
  });
});
