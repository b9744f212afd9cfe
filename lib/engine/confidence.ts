import type { LocationSample } from '../types/location';
import { HIGH_ACCURACY_METERS, PROVIDER_CONFIDENCE } from './constants';

/** Points lost per meter of horizontal error beyond 10 m */
const ACCURACY_PENALTY = 0.01;
/** Points lost per meter of raw distance beyond 20 m */
const DISTANCE_PENALTY = 0.01;
const DISTANCE_GRACE_METERS = 20;
/** Points lost per second of fix age beyond 10 s */
const STALENESS_PENALTY = 0.001;
const STALENESS_GRACE_SECONDS = 10;

/**
 * Trust score for a sample at a given raw distance from its target.
 *
 * Starts at 1.0, subtracts linear penalties for accuracy, distance and fix
 * age, scales by how much the provider is trusted, and clamps to [0, 1].
 */
export function scoreConfidence(
  sample: LocationSample,
  distanceMeters: number,
  now: number,
): number {
  const acc = sample.accuracy.horizontalAccuracyMeters;
  const secondsSinceFix = (now - sample.accuracy.capturedAt) / 1000;

  let score = 1.0;
  score -= ACCURACY_PENALTY * Math.max(0, acc - HIGH_ACCURACY_METERS);
  score -= DISTANCE_PENALTY * Math.max(0, distanceMeters - DISTANCE_GRACE_METERS);
  score -= STALENESS_PENALTY * Math.max(0, secondsSinceFix - STALENESS_GRACE_SECONDS);
  score *= PROVIDER_CONFIDENCE[sample.accuracy.provider] ?? PROVIDER_CONFIDENCE.unknown;

  if (Number.isNaN(score)) return 0;
  return Math.max(0, Math.min(1, score));
}
