import type { Evidence, EvidenceImportance } from '../types/evidence';
import { IMPORTANCE_BASE_POINTS } from './constants';

/**
 * Discovery bonus: importance base points scaled by how close the player
 * got (raw distance), truncated to an integer.
 *
 *   <= 10 m  x1.5
 *   <= 30 m  x1.2
 *   <= 50 m  x1.0
 *   else     x0.8
 */
export function discoveryBonus(importance: EvidenceImportance, distanceMeters: number): number {
  const base = IMPORTANCE_BASE_POINTS[importance] ?? IMPORTANCE_BASE_POINTS.background;
  return Math.floor(base * distanceMultiplier(distanceMeters));
}

export function distanceMultiplier(distanceMeters: number): number {
  if (distanceMeters <= 10) return 1.5;
  if (distanceMeters <= 30) return 1.2;
  if (distanceMeters <= 50) return 1.0;
  return 0.8;
}

/**
 * Nudge toward what is left after a discovery. Nothing is said while more
 * than three pieces remain.
 */
export function nextClueText(remaining: Evidence[]): string | undefined {
  if (remaining.length === 0) {
    return 'All evidence found. Time to make your deduction.';
  }
  if (remaining.length === 1) {
    return `The last piece of evidence seems to be near ${remaining[0].poiName}.`;
  }
  if (remaining.length <= 3) {
    const places = remaining.slice(0, 2).map((ev) => ev.poiName);
    return `Try searching around ${places.join(', ')} for the remaining evidence.`;
  }
  return undefined;
}
