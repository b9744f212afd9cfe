import type { LocationProvider, LocationSample } from '../types/location';
import { advisoryRadius } from './adaptive-radius';

export type QualityLevel = 'excellent' | 'good' | 'fair' | 'poor';

export interface LocationQuality {
  qualityLevel: QualityLevel;
  accuracyMeters: number;
  provider: LocationProvider;
  /** ISO timestamp of the fix */
  capturedAt: string;
  /** Accuracy within 50 m and the fix younger than 30 s */
  isReliable: boolean;
  /** Advisory radius with no place type applied */
  recommendedRadiusMeters: number;
}

const RELIABLE_ACCURACY_METERS = 50;
const RELIABLE_MAX_AGE_SECONDS = 30;

/**
 * Summary of how usable a fix is, for the client's GPS status indicator.
 */
export function describeLocationQuality(sample: LocationSample, now: number): LocationQuality {
  const acc = sample.accuracy.horizontalAccuracyMeters;
  const ageSeconds = (now - sample.accuracy.capturedAt) / 1000;

  return {
    qualityLevel: qualityLevel(acc),
    accuracyMeters: acc,
    provider: sample.accuracy.provider,
    capturedAt: new Date(sample.accuracy.capturedAt).toISOString(),
    isReliable: acc <= RELIABLE_ACCURACY_METERS && ageSeconds < RELIABLE_MAX_AGE_SECONDS,
    recommendedRadiusMeters: advisoryRadius(acc),
  };
}

export function qualityLevel(accuracyMeters: number): QualityLevel {
  if (accuracyMeters <= 5) return 'excellent';
  if (accuracyMeters <= 10) return 'good';
  if (accuracyMeters <= 25) return 'fair';
  return 'poor';
}
