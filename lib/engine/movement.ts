import type { LocationSample } from '../types/location';
import type { MovementCheck } from '../types/discovery';
import { haversineDistance, secondsBetween } from './geo-math';
import { MAX_WALKING_SPEED_MPS } from './constants';

/**
 * Walking-speed check between the previous sample and the current one.
 *
 * Reported in validation diagnostics only. Whether a player moving faster
 * than 5 m/s should be refused is undecided, so this never affects isValid;
 * the spoof detector's 28 m/s check is the one that gates.
 */
export function checkWalkingSpeed(
  current: LocationSample,
  previous: LocationSample | undefined,
): MovementCheck {
  if (!previous) return { check: 'no_history', withinWalkingSpeed: true };

  const secondsElapsed = secondsBetween(previous.accuracy.capturedAt, current.accuracy.capturedAt);
  if (!(secondsElapsed > 0)) return { check: 'invalid_time', withinWalkingSpeed: false };

  const distanceMovedMeters = haversineDistance(previous.coordinate, current.coordinate);
  const impliedSpeedMetersPerSecond = distanceMovedMeters / secondsElapsed;

  return {
    check: 'movement',
    withinWalkingSpeed: impliedSpeedMetersPerSecond <= MAX_WALKING_SPEED_MPS,
    impliedSpeedMetersPerSecond,
    secondsElapsed,
    distanceMovedMeters,
  };
}
