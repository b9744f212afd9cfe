import type { GameSession } from '../types/game';
import type { Evidence, TargetPoint } from '../types/evidence';
import type { LocationSample } from '../types/location';
import type { DiscoveryOutcome, RejectionCode, ValidationResult } from '../types/discovery';
import type { DiscoveryValidator } from './discovery-validator';
import type { SpoofDetector } from './spoof-detector';
import type { DiscoveryRecord, SessionStore } from './session-store';
import { KeyedMutex } from './keyed-mutex';
import { discoveryBonus, nextClueText } from './scoring';
import { logEvent } from '../lambda/shared/log';

export interface DiscoveryCoordinatorDeps {
  validator: DiscoveryValidator;
  spoofDetector: SpoofDetector;
  sessions: SessionStore;
  /** Shared with anything else that writes sessions (e.g. hint recording) */
  locks?: KeyedMutex;
  clock?: () => number;
}

export interface DiscoverRequest {
  gameId: string;
  playerId: string;
  evidenceId: string;
  sample: LocationSample;
}

/** Outcome plus the discovery to persist, if any */
export interface DiscoveryAttempt {
  outcome: DiscoveryOutcome;
  record?: DiscoveryRecord;
}

const SPOOFED_MESSAGE =
  'There was an issue verifying your location. Check that location services are on and try again.';

/**
 * Applies a discovery attempt to a game session.
 *
 * Order of checks: already discovered (idempotent no-op), evidence exists,
 * spoof assessment, location validation. Only a fully accepted attempt
 * produces a record. discover() persists it while holding the game's lock,
 * and the store applies it only if the evidence is still undiscovered, so a
 * duplicate handled by another process is reported as AlreadyDiscovered.
 */
export class DiscoveryCoordinator {
  private validator: DiscoveryValidator;
  private spoofDetector: SpoofDetector;
  private sessions: SessionStore;
  private locks: KeyedMutex;
  private clock: () => number;

  constructor(deps: DiscoveryCoordinatorDeps) {
    this.validator = deps.validator;
    this.spoofDetector = deps.spoofDetector;
    this.sessions = deps.sessions;
    this.locks = deps.locks ?? new KeyedMutex();
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Load the game, require it to be active, attempt the discovery, and
   * persist the result. Store failures propagate.
   */
  async discover(request: DiscoverRequest): Promise<DiscoveryOutcome> {
    const { gameId, playerId, evidenceId, sample } = request;

    return this.locks.runExclusive(gameId, async () => {
      const session = await this.sessions.get(gameId);
      if (!session) {
        return rejection('GameNotFound', `Game "${gameId}" was not found.`);
      }
      if (session.status !== 'active') {
        return rejection('GameNotActive', `This game is no longer active (status: ${session.status}).`);
      }

      const { outcome, record } = this.attemptDiscovery(session, evidenceId, sample, playerId);
      if (!record) return outcome;

      if (await this.sessions.recordDiscovery(gameId, record)) {
        logEvent('evidence_discovered', {
          gameId,
          playerId,
          evidenceId,
          bonusPoints: record.bonusPoints,
          distanceMeters: outcome.distanceMeters,
        });
        return outcome;
      }

      logEvent('discovery_conflict', { gameId, playerId, evidenceId });
      return this.afterConflict(gameId, evidenceId);
    });
  }

  /**
   * The conditional write was refused: someone else changed the session
   * since it was read. Report its current state for this evidence.
   */
  private async afterConflict(gameId: string, evidenceId: string): Promise<DiscoveryOutcome> {
    const session = await this.sessions.get(gameId);
    if (!session) {
      return rejection('GameNotFound', `Game "${gameId}" was not found.`);
    }
    if (session.status !== 'active') {
      return rejection('GameNotActive', `This game is no longer active (status: ${session.status}).`);
    }
    if (session.discoveredEvidence.includes(evidenceId)) {
      return alreadyDiscovered();
    }
    return rejection('InternalError', 'Your discovery could not be recorded. Please try again.');
  }

  /**
   * Synchronous decision for one attempt against an already-loaded session.
   * Records the sample in the player's history (via the spoof detector)
   * unless the attempt ends before the spoof check.
   */
  attemptDiscovery(
    session: GameSession,
    evidenceId: string,
    sample: LocationSample,
    playerId: string,
  ): DiscoveryAttempt {
    try {
      return this.decide(session, evidenceId, sample, playerId);
    } catch (error) {
      console.error('Discovery attempt error:', error);
      return {
        outcome: rejection('InternalError', 'Your discovery could not be verified. Please try again.'),
      };
    }
  }

  private decide(
    session: GameSession,
    evidenceId: string,
    sample: LocationSample,
    playerId: string,
  ): DiscoveryAttempt {
    const { gameId } = session;

    if (session.discoveredEvidence.includes(evidenceId)) {
      return { outcome: alreadyDiscovered() };
    }

    const evidenceIndex = session.evidenceList.findIndex((ev) => ev.evidenceId === evidenceId);
    const evidence = session.evidenceList[evidenceIndex];
    if (!evidence) {
      return { outcome: rejection('NotFound', `Evidence "${evidenceId}" was not found in this game.`) };
    }

    const spoofing = this.spoofDetector.assess(sample, playerId);
    if (spoofing.isLikelySpoofed) {
      logEvent('spoof_signal', {
        gameId,
        playerId,
        evidenceId,
        indicators: spoofing.indicators,
        riskScore: spoofing.riskScore,
      });
      return { outcome: { ...rejection('LikelySpoofed', SPOOFED_MESSAGE), spoofing } };
    }

    const validation = this.validator.validate(sample, toTargetPoint(evidence), playerId);
    if (!validation.isValid) {
      const outcome = invalidLocationOutcome(validation);
      logEvent('discovery_rejected', {
        gameId,
        playerId,
        evidenceId,
        code: outcome.code,
        distanceMeters: validation.distanceToTargetMeters,
        confidenceScore: validation.confidenceScore,
      });
      return { outcome: { ...outcome, spoofing } };
    }

    const distance = validation.distanceToTargetMeters ?? 0;
    const bonusPoints = discoveryBonus(evidence.importance, distance);
    const discoveredAt = new Date(this.clock()).toISOString();
    const discoveredEvidence = [...session.discoveredEvidence, evidenceId];
    const remaining = session.evidenceList.filter(
      (ev) => !discoveredEvidence.includes(ev.evidenceId),
    );
    const discovered: Evidence = { ...evidence, discoveredAt };

    return {
      outcome: {
        success: true,
        code: 'Discovered',
        bonusPoints,
        nextClueText: nextClueText(remaining),
        message: `Discovered evidence "${evidence.name}"!`,
        distanceMeters: distance,
        evidence: discovered,
        validation,
        spoofing,
      },
      record: { evidenceId, evidenceIndex, discoveredAt, bonusPoints },
    };
  }
}

export function toTargetPoint(evidence: Evidence): TargetPoint {
  return {
    coordinate: evidence.location,
    poiType: evidence.poiType,
    importance: evidence.importance,
  };
}

function rejection(code: RejectionCode, message: string): DiscoveryOutcome {
  return { success: false, code, bonusPoints: 0, message };
}

function alreadyDiscovered(): DiscoveryOutcome {
  return {
    success: true,
    code: 'AlreadyDiscovered',
    bonusPoints: 0,
    message: 'This evidence has already been discovered.',
  };
}

/**
 * Player-facing message for a failed validation. Distance and accuracy come
 * from the sample; the radius shown is the advisory one.
 */
function invalidLocationOutcome(validation: ValidationResult): DiscoveryOutcome {
  const { diagnostics, distanceToTargetMeters } = validation;
  const code = diagnostics.rejection?.code ?? 'TooFar';

  if (distanceToTargetMeters === null || diagnostics.advisoryRadiusMeters === undefined) {
    const reason = diagnostics.rejection?.reason ?? 'unknown reason';
    return { ...rejection(code, `This GPS reading could not be used: ${reason}`), validation };
  }

  const where =
    `You are ${distanceToTargetMeters.toFixed(1)}m from the evidence ` +
    `(GPS accuracy ±${diagnostics.gpsAccuracyMeters.toFixed(1)}m).`;
  const radius = Math.round(diagnostics.advisoryRadiusMeters);
  const message =
    code === 'LowAccuracy'
      ? `Your position could not be confirmed with enough confidence. ${where} Stay within ${radius}m and wait for a stronger GPS signal.`
      : `${where} Get within ${radius}m to discover it.`;

  return {
    ...rejection(code, message),
    distanceMeters: distanceToTargetMeters,
    validation,
  };
}
