/**
 * GameSession -- one player's run through a generated mystery.
 *
 * Stored in the GameSessions table keyed by gameId. Discovery is a one-way
 * transition: once an evidenceId is in discoveredEvidence it never leaves,
 * and re-discovering it changes nothing.
 */

import type { Evidence } from './evidence';

export type GameStatus = 'active' | 'completed' | 'abandoned' | 'expired';

export interface GameRules {
  /** Accuracy-adjusted distance within which evidence can be found (meters) */
  discoveryRadiusMeters: number;

  hintEnabled: boolean;
}

export interface GameSession {
  /** Partition key in DDB */
  gameId: string;

  /** The player who owns this game */
  playerId: string;

  status: GameStatus;

  /** All evidence placed for this game, in scenario order */
  evidenceList: Evidence[];

  /** evidenceIds in the order they were discovered */
  discoveredEvidence: string[];

  /** Accumulated discovery bonus */
  score: number;

  hintsUsed: number;

  rules: GameRules;

  /** ISO timestamps */
  createdAt: string;
  updatedAt: string;
}

export const DEFAULT_GAME_RULES: GameRules = {
  discoveryRadiusMeters: 50,
  hintEnabled: true,
};
