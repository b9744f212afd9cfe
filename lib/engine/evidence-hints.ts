import type { Coordinate } from '../types/common';
import type { Evidence } from '../types/evidence';
import type { GameSession } from '../types/game';
import type { SessionStore } from './session-store';
import { KeyedMutex } from './keyed-mutex';
import { haversineDistance } from './geo-math';
import { HINT_PENALTY_POINTS } from './constants';

/** Extra flavour line per place category */
const POI_TYPE_HINTS: Record<string, string> = {
  restaurant: 'Follow the smell of good cooking',
  cafe: 'Somewhere the scent of coffee drifts by',
  park: 'A green spot where you can feel nature around you',
  station: 'A busy transport hub where crowds pass through',
  landmark: 'A place this area is famous for',
  shop: 'Somewhere you could go shopping',
};

export interface EvidenceHint {
  evidenceId: string;
  hint: string;
  discovered: boolean;
  poiName?: string;
  poiType?: string;
  /** Points deducted from the final score per hint used */
  hintPenalty?: number;
}

export interface NearbyEvidence {
  evidenceId: string;
  name: string;
  poiName: string;
  poiType: string;
  distanceMeters: number;
}

export type HintResult =
  | { ok: true; hint: EvidenceHint }
  | { ok: false; code: 'GameNotFound' | 'GameNotActive' | 'NotFound' | 'HintsDisabled'; message: string };

export function buildEvidenceHint(evidence: Evidence): EvidenceHint {
  const key = evidence.poiType.toLowerCase();
  const extra = Object.hasOwn(POI_TYPE_HINTS, key) ? POI_TYPE_HINTS[key] : undefined;
  let hint = `Try looking near ${evidence.poiName}.`;
  if (extra) hint += ` ${extra}.`;

  return {
    evidenceId: evidence.evidenceId,
    hint,
    discovered: false,
    poiName: evidence.poiName,
    poiType: evidence.poiType,
    hintPenalty: HINT_PENALTY_POINTS,
  };
}

export function remainingEvidence(session: GameSession): Evidence[] {
  return session.evidenceList.filter((ev) => !session.discoveredEvidence.includes(ev.evidenceId));
}

/**
 * Undiscovered evidence within the game's discovery radius of `coordinate`,
 * closest first. Uses raw distance; no accuracy adjustment.
 */
export function findNearbyEvidence(session: GameSession, coordinate: Coordinate): NearbyEvidence[] {
  return remainingEvidence(session)
    .map((ev) => ({
      evidenceId: ev.evidenceId,
      name: ev.name,
      poiName: ev.poiName,
      poiType: ev.poiType,
      distanceMeters: haversineDistance(coordinate, ev.location),
    }))
    .filter((ev) => ev.distanceMeters <= session.rules.discoveryRadiusMeters)
    .sort((a, b) => a.distanceMeters - b.distanceMeters);
}

/**
 * Hands out hints and counts them on the session. The count is a single
 * atomic increment, so it never touches fields a discovery writes.
 */
export class EvidenceHintService {
  private sessions: SessionStore;
  private locks: KeyedMutex;
  private clock: () => number;

  constructor(sessions: SessionStore, locks: KeyedMutex = new KeyedMutex(), clock: () => number = Date.now) {
    this.sessions = sessions;
    this.locks = locks;
    this.clock = clock;
  }

  async requestHint(gameId: string, evidenceId: string): Promise<HintResult> {
    return this.locks.runExclusive(gameId, async (): Promise<HintResult> => {
      const session = await this.sessions.get(gameId);
      if (!session) {
        return { ok: false, code: 'GameNotFound', message: `Game "${gameId}" was not found.` };
      }

      const evidence = session.evidenceList.find((ev) => ev.evidenceId === evidenceId);
      if (!evidence) {
        return { ok: false, code: 'NotFound', message: `Evidence "${evidenceId}" was not found in this game.` };
      }

      if (session.status !== 'active') {
        return { ok: false, code: 'GameNotActive', message: `This game is no longer active (status: ${session.status}).` };
      }

      if (session.discoveredEvidence.includes(evidenceId)) {
        return {
          ok: true,
          hint: { evidenceId, hint: 'This evidence has already been discovered.', discovered: true },
        };
      }

      if (!session.rules.hintEnabled) {
        return { ok: false, code: 'HintsDisabled', message: 'Hints are disabled for this game.' };
      }

      await this.sessions.recordHint(gameId, new Date(this.clock()).toISOString());
      return { ok: true, hint: buildEvidenceHint(evidence) };
    });
  }
}
