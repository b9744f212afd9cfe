import type { EvidenceImportance } from '../types/evidence';
import type { LocationProvider } from '../types/location';

export const EARTH_RADIUS_METERS = 6371000;

// ============================================
// Reading sanity
// ============================================

/** Fixes worse than this are refused outright */
export const MIN_ACCURACY_THRESHOLD_METERS = 100;

/** Max |server time - capturedAt| before a fix counts as stale or future-dated */
export const MAX_FIX_AGE_SECONDS = 300;

/** ~180 km/h; nobody walks this fast */
export const MAX_REPORTED_SPEED_MPS = 50;

// ============================================
// Discovery decision
// ============================================

export const DISCOVERY_BASE_RADIUS_METERS = 50;
export const MIN_CONFIDENCE_SCORE = 0.7;
export const HIGH_ACCURACY_METERS = 10;

export const PROVIDER_CONFIDENCE: Record<LocationProvider, number> = {
  gps: 1.0,
  network: 0.8,
  passive: 0.6,
  unknown: 0.5,
};

// ============================================
// Advisory radius
// ============================================

export const ADVISORY_RADIUS_MIN_METERS = 20;
export const ADVISORY_RADIUS_MAX_METERS = 100;

export const POI_RADIUS_MODIFIERS: Record<string, number> = {
  park: 1.5,
  landmark: 1.3,
  station: 1.2,
  library: 1.0,
  cafe: 0.8,
  restaurant: 0.8,
};

// ============================================
// Spoof detection
// ============================================

export const PLAYER_HISTORY_LENGTH = 10;
export const SPOOF_LOOKBACK_SAMPLES = 5;
export const PROVIDER_LOOKBACK_SAMPLES = 3;
export const SUSPICIOUS_ACCURACY_METERS = 1.0;

/** ~100 km/h */
export const IMPOSSIBLE_SPEED_MPS = 28;

export const JUMP_WINDOW_SECONDS = 5;
export const JUMP_DISTANCE_METERS = 100;

/** Informational only; see movement.ts */
export const MAX_WALKING_SPEED_MPS = 5;

// ============================================
// Scoring
// ============================================

export const IMPORTANCE_BASE_POINTS: Record<EvidenceImportance, number> = {
  critical: 50,
  important: 30,
  misleading: 20,
  background: 10,
};

export const HINT_PENALTY_POINTS = 5;
