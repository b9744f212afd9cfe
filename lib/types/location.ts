/**
 * Location samples -- what a player's device reports when they claim to be
 * standing at a piece of evidence.
 *
 * A sample is created per discovery attempt and never mutated. The server
 * keeps the last few samples per player (see PlayerHistory) to judge whether
 * a new sample is physically consistent with the previous ones.
 */

import type { Coordinate } from './common';

export const LOCATION_PROVIDERS = ['gps', 'network', 'passive', 'unknown'] as const;

/** Which positioning source produced the fix, as reported by the OS */
export type LocationProvider = typeof LOCATION_PROVIDERS[number];

export interface AccuracyReport {
  /** Radius of the 68% confidence circle, in meters */
  horizontalAccuracyMeters: number;

  verticalAccuracyMeters?: number;

  /** When the device captured the fix (epoch ms) */
  capturedAt: number;

  provider: LocationProvider;
}

export interface LocationSample {
  readonly coordinate: Readonly<Coordinate>;
  readonly accuracy: Readonly<AccuracyReport>;
  readonly speedMetersPerSecond?: number;
  readonly bearingDegrees?: number;
  readonly altitudeMeters?: number;
}
