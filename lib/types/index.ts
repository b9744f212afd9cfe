/**
 * Barrel export for all shared types.
 *
 * Usage:
 *   import type { GameSession, LocationSample } from '../types/index';
 */

export type { Coordinate } from './common';
export type { AccuracyReport, LocationProvider, LocationSample } from './location';
export { LOCATION_PROVIDERS } from './location';
export type { Evidence, EvidenceImportance, TargetPoint } from './evidence';
export type { GameRules, GameSession, GameStatus } from './game';
export { DEFAULT_GAME_RULES } from './game';
export type {
  DiscoveryCode,
  DiscoveryOutcome,
  MovementCheck,
  RejectionCode,
  SpoofIndicators,
  SpoofingAssessment,
  ValidationDiagnostics,
  ValidationResult,
} from './discovery';
