import type { LocationSample } from '../types/location';
import type { RejectionCode } from '../types/discovery';
import { isValidLatitude, isValidLongitude } from './geo-math';
import {
  MAX_FIX_AGE_SECONDS,
  MAX_REPORTED_SPEED_MPS,
  MIN_ACCURACY_THRESHOLD_METERS,
} from './constants';
import { logEvent } from '../lambda/shared/log';

export type ReadingCheck =
  | { ok: true }
  | { ok: false; code: Extract<RejectionCode, 'InvalidReading' | 'LowAccuracy'>; reason: string };

/**
 * Basic sanity checks on a raw sample. The first failing check wins and
 * nothing else about the sample is computed.
 *
 * - coordinates in range
 * - horizontal accuracy <= 100 m
 * - capturedAt within 300 s of server time, in either direction
 * - reported speed <= 50 m/s
 */
export function checkReading(sample: LocationSample, now: number): ReadingCheck {
  const result = runChecks(sample, now);
  if (!result.ok) {
    logEvent('reading_rejected', { code: result.code, reason: result.reason });
  }
  return result;
}

function runChecks(sample: LocationSample, now: number): ReadingCheck {
  const { coordinate, accuracy, speedMetersPerSecond } = sample;

  if (!isValidLatitude(coordinate.lat)) {
    return { ok: false, code: 'InvalidReading', reason: `Invalid latitude: ${coordinate.lat}` };
  }
  if (!isValidLongitude(coordinate.lng)) {
    return { ok: false, code: 'InvalidReading', reason: `Invalid longitude: ${coordinate.lng}` };
  }

  const acc = accuracy.horizontalAccuracyMeters;
  if (!Number.isFinite(acc) || acc < 0) {
    return { ok: false, code: 'InvalidReading', reason: `Invalid horizontal accuracy: ${acc}` };
  }
  if (acc > MIN_ACCURACY_THRESHOLD_METERS) {
    return {
      ok: false,
      code: 'LowAccuracy',
      reason: `GPS accuracy too low: ${acc}m (max ${MIN_ACCURACY_THRESHOLD_METERS}m)`,
    };
  }

  const ageSeconds = Math.abs(now - accuracy.capturedAt) / 1000;
  if (!Number.isFinite(ageSeconds) || ageSeconds > MAX_FIX_AGE_SECONDS) {
    return {
      ok: false,
      code: 'InvalidReading',
      reason: `GPS fix timestamp is ${Math.round(ageSeconds)}s away from server time (max ${MAX_FIX_AGE_SECONDS}s)`,
    };
  }

  if (speedMetersPerSecond !== undefined && speedMetersPerSecond > MAX_REPORTED_SPEED_MPS) {
    return {
      ok: false,
      code: 'InvalidReading',
      reason: `Reported speed is implausible: ${speedMetersPerSecond}m/s (max ${MAX_REPORTED_SPEED_MPS}m/s)`,
    };
  }

  return { ok: true };
}
