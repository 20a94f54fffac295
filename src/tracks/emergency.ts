import { Track } from './track.types';

export type EmergencyType = 'hijack' | 'radio-failure' | 'general';

const EMERGENCY_SQUAWKS: Record<string, EmergencyType> = {
  '7500': 'hijack',
  '7600': 'radio-failure',
  '7700': 'general',
};

const DESCRIPTIONS: Record<EmergencyType, string> = {
  hijack: 'HIJACK',
  'radio-failure': 'RADIO FAILURE',
  general: 'EMERGENCY',
};

export interface EmergencyInfo {
  identifier: string;
  callsign: string | null;
  squawk: string;
  type: EmergencyType;
  description: string;
}

export function emergencyOf(squawk: string | undefined): EmergencyType | null {
  if (squawk === undefined) {
    return null;
  }
  return EMERGENCY_SQUAWKS[squawk.trim()] ?? null;
}

/** Tracks currently squawking an emergency code, recomputed on every call. */
export function activeEmergencies(tracks: Iterable<Track>): EmergencyInfo[] {
  const active: EmergencyInfo[] = [];
  for (const track of tracks) {
    const type = emergencyOf(track.squawk);
    if (type && track.squawk !== undefined) {
      active.push({
        identifier: track.identifier,
        callsign: track.label ?? null,
        squawk: track.squawk,
        type,
        description: DESCRIPTIONS[type],
      });
    }
  }
  return active;
}
