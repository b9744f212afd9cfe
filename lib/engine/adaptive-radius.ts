import {
  ADVISORY_RADIUS_MAX_METERS,
  ADVISORY_RADIUS_MIN_METERS,
  DISCOVERY_BASE_RADIUS_METERS,
  POI_RADIUS_MODIFIERS,
} from './constants';

/**
 * Suggested "get within X m" distance shown to the player.
 *
 * Grows with the device's reported error (up to +20 m) and with the size of
 * the place (parks are big, cafes are small). This is guidance only: the
 * accept/reject decision always uses DISCOVERY_BASE_RADIUS_METERS.
 */
export function advisoryRadius(horizontalAccuracyMeters: number, poiType?: string): number {
  const accuracyFactor = Math.min(2.0, horizontalAccuracyMeters / 10);
  let radius = DISCOVERY_BASE_RADIUS_METERS + accuracyFactor * 10;

  const key = poiType?.toLowerCase();
  if (key !== undefined && Object.hasOwn(POI_RADIUS_MODIFIERS, key)) {
    radius *= POI_RADIUS_MODIFIERS[key];
  }

  if (Number.isNaN(radius)) return ADVISORY_RADIUS_MAX_METERS;
  return Math.max(ADVISORY_RADIUS_MIN_METERS, Math.min(ADVISORY_RADIUS_MAX_METERS, radius));
}
