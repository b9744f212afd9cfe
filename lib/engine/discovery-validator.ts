import type { LocationSample } from '../types/location';
import type { TargetPoint } from '../types/evidence';
import type { MovementCheck, ValidationResult } from '../types/discovery';
import type { PlayerHistory } from './player-history';
import { checkReading } from './reading-guard';
import { haversineDistance, isValidCoordinate } from './geo-math';
import { scoreConfidence } from './confidence';
import { advisoryRadius } from './adaptive-radius';
import { checkWalkingSpeed } from './movement';
import {
  DISCOVERY_BASE_RADIUS_METERS,
  HIGH_ACCURACY_METERS,
  MIN_CONFIDENCE_SCORE,
} from './constants';

export interface DiscoveryValidatorOptions {
  /** Source of the walking-speed diagnostics; omitted means no movement data */
  history?: PlayerHistory;
  clock?: () => number;
}

/**
 * The accept/reject decision for one discovery attempt.
 *
 * A sample is accepted when its accuracy-adjusted distance is within the
 * fixed 50 m discovery radius and its confidence score is at least 0.7.
 * The advisory radius is computed for messaging but takes no part in the
 * decision.
 *
 * Pure synchronous computation; the only state read is the player history.
 */
export class DiscoveryValidator {
  private history: PlayerHistory | undefined;
  private clock: () => number;

  constructor(options: DiscoveryValidatorOptions = {}) {
    this.history = options.history;
    this.clock = options.clock ?? Date.now;
  }

  validate(sample: LocationSample, target: TargetPoint, playerId?: string): ValidationResult {
    const now = this.clock();
    const acc = sample.accuracy.horizontalAccuracyMeters;

    const reading = checkReading(sample, now);
    if (!reading.ok) {
      return rejectedBeforeDistance(acc, { code: reading.code, reason: reading.reason });
    }

    if (!isValidCoordinate(target.coordinate)) {
      return rejectedBeforeDistance(acc, {
        code: 'InternalError',
        reason: `Target location is malformed: ${JSON.stringify(target.coordinate)}`,
      });
    }

    const distance = haversineDistance(sample.coordinate, target.coordinate);
    const confidenceScore = scoreConfidence(sample, distance, now);
    const accuracyAdjustedDistance = Math.max(0, distance - acc);
    const advisoryRadiusMeters = advisoryRadius(acc, target.poiType);

    const withinRadius = accuracyAdjustedDistance <= DISCOVERY_BASE_RADIUS_METERS;
    const confident = confidenceScore >= MIN_CONFIDENCE_SCORE;
    const isValid = withinRadius && confident;

    return {
      isValid,
      confidenceScore,
      distanceToTargetMeters: distance,
      accuracyAdjustedDistanceMeters: accuracyAdjustedDistance,
      diagnostics: {
        ...(isValid
          ? {}
          : {
              rejection: withinRadius
                ? {
                    code: 'LowAccuracy' as const,
                    reason: `Confidence ${confidenceScore.toFixed(2)} is below ${MIN_CONFIDENCE_SCORE}`,
                  }
                : {
                    code: 'TooFar' as const,
                    reason: `Accuracy-adjusted distance ${accuracyAdjustedDistance.toFixed(1)}m exceeds ${DISCOVERY_BASE_RADIUS_METERS}m`,
                  },
            }),
        gpsAccuracyMeters: acc,
        discoveryRadiusMeters: DISCOVERY_BASE_RADIUS_METERS,
        advisoryRadiusMeters,
        confidenceFactors: {
          highAccuracy: acc <= HIGH_ACCURACY_METERS,
          secondsSinceFix: (now - sample.accuracy.capturedAt) / 1000,
          provider: sample.accuracy.provider,
        },
        movement: playerId !== undefined ? this.movementFor(sample, playerId) : undefined,
      },
    };
  }

  private movementFor(sample: LocationSample, playerId: string): MovementCheck | undefined {
    if (!this.history) return undefined;
    // The spoof detector may already have recorded this sample; compare
    // against the one before it.
    const previous = this.history.recent(playerId, 3).filter((s) => s !== sample);
    return checkWalkingSpeed(sample, previous[previous.length - 1]);
  }
}

function rejectedBeforeDistance(
  gpsAccuracyMeters: number,
  rejection: NonNullable<ValidationResult['diagnostics']['rejection']>,
): ValidationResult {
  return {
    isValid: false,
    confidenceScore: 0,
    distanceToTargetMeters: null,
    accuracyAdjustedDistanceMeters: null,
    diagnostics: {
      rejection,
      gpsAccuracyMeters,
      discoveryRadiusMeters: DISCOVERY_BASE_RADIUS_METERS,
    },
  };
}
