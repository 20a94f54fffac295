import { predictTrack } from './prediction';

describe('predictTrack', () => {
  const position = { latitude: 0, longitude: 0 };

  it('should project along the heading for each horizon', () => {
    const predictions = predictTrack({ position, heading: 0, groundSpeed: 600 });

    expect(predictions.map((p) => p.minutes)).toEqual([1, 5, 15]);
    // 10 nm north per minute at 600 kt
    expect(predictions[0].position.latitude).toBeCloseTo((10 / 3440.065) * (180 / Math.PI), 9);
    expect(predictions[0].position.longitude).toBeCloseTo(0, 9);
    expect(predictions[2].position.latitude).toBeCloseTo((150 / 3440.065) * (180 / Math.PI), 9);
  });

  it('should return the origin for a zero horizon', () => {
    expect(predictTrack({ position, heading: 90, groundSpeed: 450 }, [0])).toEqual([
      { minutes: 0, position: { latitude: 0, longitude: 0 } },
    ]);
  });

  it('should not predict without heading or speed', () => {
    expect(predictTrack({ position, groundSpeed: 450 })).toEqual([]);
    expect(predictTrack({ position, heading: 90 })).toEqual([]);
  });

  it('should not predict for a nearly stationary track', () => {
    expect(predictTrack({ position, heading: 90, groundSpeed: 9.9 })).toEqual([]);
  });
});
