import type { LocationSample } from '../types/location';
import type { SpoofIndicators, SpoofingAssessment } from '../types/discovery';
import type { PlayerHistory } from './player-history';
import { haversineDistance, secondsBetween } from './geo-math';
import {
  IMPOSSIBLE_SPEED_MPS,
  JUMP_DISTANCE_METERS,
  JUMP_WINDOW_SECONDS,
  PROVIDER_LOOKBACK_SAMPLES,
  SPOOF_LOOKBACK_SAMPLES,
  SUSPICIOUS_ACCURACY_METERS,
} from './constants';

/**
 * Heuristic check for fabricated location fixes.
 *
 * Each assessment compares the sample with the player's recent history and
 * then records the sample, so the next call sees it as "previous". Four
 * independent indicators are raised:
 *
 * - suspiciousAccuracy: sub-meter accuracy, which consumer GPS does not report
 * - impossibleMovement: > 28 m/s (~100 km/h) since the previous sample
 * - locationJump: > 100 m in under 5 s
 * - providerInconsistency: the last 3 samples mix gps with another provider
 *
 * A raised indicator is a soft signal. Nothing here bans or flags the player.
 */
export class SpoofDetector {
  private history: PlayerHistory;

  constructor(history: PlayerHistory) {
    this.history = history;
  }

  assess(sample: LocationSample, playerId: string): SpoofingAssessment {
    const recent = this.history.recent(playerId, SPOOF_LOOKBACK_SAMPLES);

    const indicators: SpoofIndicators = {
      suspiciousAccuracy: sample.accuracy.horizontalAccuracyMeters < SUSPICIOUS_ACCURACY_METERS,
      ...analyzeMovement(recent, sample),
    };

    this.history.append(playerId, sample);

    const raised = Object.values(indicators).filter(Boolean).length;
    return {
      isLikelySpoofed: raised > 0,
      indicators,
      riskScore: raised / Object.keys(indicators).length,
    };
  }
}

/**
 * Movement-based indicators against the history that existed before the
 * current sample arrived.
 */
export function analyzeMovement(
  recent: LocationSample[],
  current: LocationSample,
): Omit<SpoofIndicators, 'suspiciousAccuracy'> {
  const result = {
    impossibleMovement: false,
    locationJump: false,
    providerInconsistency: false,
  };
  if (recent.length === 0) return result;

  const last = recent[recent.length - 1];
  const dt = secondsBetween(last.accuracy.capturedAt, current.accuracy.capturedAt);

  if (dt > 0) {
    const distance = haversineDistance(last.coordinate, current.coordinate);
    if (distance / dt > IMPOSSIBLE_SPEED_MPS) result.impossibleMovement = true;
    if (dt < JUMP_WINDOW_SECONDS && distance > JUMP_DISTANCE_METERS) result.locationJump = true;
  }

  const providers = recent.slice(-PROVIDER_LOOKBACK_SAMPLES).map((s) => s.accuracy.provider);
  if (new Set(providers).size > 1 && providers.includes('gps')) {
    result.providerInconsistency = true;
  }

  return result;
}
