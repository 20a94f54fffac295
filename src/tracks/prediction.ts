import { GeoPoint, projectPosition } from '../geo/geo';
import { Track } from './track.types';

export const DEFAULT_PREDICTION_HORIZONS_MINUTES = [1, 5, 15];

/** Below this ground speed (knots) a track is treated as stationary. */
export const MIN_PREDICTION_SPEED_KNOTS = 10;

export interface PredictedPosition {
  minutes: number;
  position: GeoPoint;
}

/**
 * Dead-reckoned positions at each horizon. Empty when the track has no
 * heading or speed, or is barely moving.
 */
export function predictTrack(
  track: Pick<Track, 'position' | 'heading' | 'groundSpeed'>,
  horizonsMinutes: number[] = DEFAULT_PREDICTION_HORIZONS_MINUTES,
): PredictedPosition[] {
  const { heading, groundSpeed } = track;
  if (heading === undefined || groundSpeed === undefined || groundSpeed < MIN_PREDICTION_SPEED_KNOTS) {
    return [];
  }

  return horizonsMinutes.map((minutes) => ({
    minutes,
    position: projectPosition(track.position, heading, groundSpeed, minutes),
  }));
}
