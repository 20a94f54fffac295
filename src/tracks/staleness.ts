export interface StalenessOptions {
  freshSeconds: number;
  staleSeconds: number;
  minOpacity: number;
}

export const DEFAULT_STALENESS: StalenessOptions = {
  freshSeconds: 10,
  staleSeconds: 30,
  minOpacity: 0.1,
};

/**
 * Display opacity for data that is `elapsedSeconds` old: fully opaque while
 * fresh, then a linear fade down to the floor once fully stale.
 */
export function stalenessOpacity(
  elapsedSeconds: number,
  options: StalenessOptions = DEFAULT_STALENESS,
): number {
  const { freshSeconds, staleSeconds, minOpacity } = options;

  if (elapsedSeconds <= freshSeconds) {
    return 1;
  }
  if (elapsedSeconds >= staleSeconds) {
    return minOpacity;
  }

  const progress = (elapsedSeconds - freshSeconds) / (staleSeconds - freshSeconds);
  return 1 - progress * (1 - minOpacity);
}

/** Trail segments stay solid for `solidSeconds`, then fade out over `fadeSeconds`. */
export function trailOpacity(ageSeconds: number, solidSeconds = 225, fadeSeconds = 75): number {
  if (ageSeconds < solidSeconds) {
    return 1;
  }
  if (ageSeconds < solidSeconds + fadeSeconds) {
    return 1 - (ageSeconds - solidSeconds) / fadeSeconds;
  }
  return 0;
}
