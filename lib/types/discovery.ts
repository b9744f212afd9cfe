/**
 * Results produced by the location-trust engine. All of these are plain
 * in-process values; the HTTP handlers decide how they are rendered.
 */

import type { Evidence } from './evidence';
import type { LocationProvider } from './location';

/** Why a sample or a discovery attempt was turned down */
export type RejectionCode =
  | 'InvalidReading'
  | 'LowAccuracy'
  | 'TooFar'
  | 'LikelySpoofed'
  | 'NotFound'
  | 'GameNotFound'
  | 'GameNotActive'
  | 'InternalError';

export type DiscoveryCode = 'Discovered' | 'AlreadyDiscovered' | RejectionCode;

/**
 * Informational walking-speed check against the previous sample.
 * Attached to diagnostics only; it does not affect isValid.
 */
export type MovementCheck =
  | { check: 'no_history'; withinWalkingSpeed: true }
  | { check: 'invalid_time'; withinWalkingSpeed: false }
  | {
      check: 'movement';
      withinWalkingSpeed: boolean;
      impliedSpeedMetersPerSecond: number;
      secondsElapsed: number;
      distanceMovedMeters: number;
    };

export interface ValidationDiagnostics {
  /** Present when the sample was rejected before the distance check */
  rejection?: { code: RejectionCode; reason: string };

  gpsAccuracyMeters: number;

  /** The fixed gating radius */
  discoveryRadiusMeters: number;

  /** Guidance shown to the player; never used to gate acceptance */
  advisoryRadiusMeters?: number;

  confidenceFactors?: {
    highAccuracy: boolean;
    secondsSinceFix: number;
    provider: LocationProvider;
  };

  movement?: MovementCheck;
}

export interface ValidationResult {
  isValid: boolean;

  /** 0..1 */
  confidenceScore: number;

  /** null when the sample was rejected before any distance was computed */
  distanceToTargetMeters: number | null;

  /** max(0, distance - horizontal accuracy) */
  accuracyAdjustedDistanceMeters: number | null;

  diagnostics: ValidationDiagnostics;
}

export interface SpoofIndicators {
  suspiciousAccuracy: boolean;
  impossibleMovement: boolean;
  locationJump: boolean;
  providerInconsistency: boolean;
}

export interface SpoofingAssessment {
  isLikelySpoofed: boolean;
  indicators: SpoofIndicators;

  /** Fraction of indicators raised, 0..1 */
  riskScore: number;
}

export interface DiscoveryOutcome {
  success: boolean;
  code: DiscoveryCode;
  bonusPoints: number;
  nextClueText?: string;
  message: string;

  /** Raw distance to the evidence, when it was computed */
  distanceMeters?: number;

  /** The discovered evidence (success only) */
  evidence?: Evidence;

  validation?: ValidationResult;
  spoofing?: SpoofingAssessment;
}
