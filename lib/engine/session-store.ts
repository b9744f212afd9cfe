import type { GameSession } from '../types/game';

/** One accepted discovery, as written to the session */
export interface DiscoveryRecord {
  evidenceId: string;
  /** Position of the evidence in `evidenceList` */
  evidenceIndex: number;
  /** ISO timestamp; also becomes the session's updatedAt */
  discoveredAt: string;
  bonusPoints: number;
}

/**
 * Persistence boundary for game sessions. Implementations may do I/O and
 * may fail; callers own retries.
 *
 * Writes are single conditional operations, never read-merge-write, so two
 * processes handling the same game cannot overwrite each other.
 */
export interface SessionStore {
  get(gameId: string): Promise<GameSession | null>;

  /**
   * Append the evidence to `discoveredEvidence`, stamp its `discoveredAt` and
   * add the bonus to `score`, only if the game is active and the evidence is
   * not already discovered. Resolves false when that condition does not hold.
   */
  recordDiscovery(gameId: string, record: DiscoveryRecord): Promise<boolean>;

  /** Increment `hintsUsed`. Throws if the session does not exist. */
  recordHint(gameId: string, updatedAt: string): Promise<void>;
}

/**
 * Map-backed store for local runs and tests. Returns copies so callers
 * cannot mutate stored state without going through the record methods.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, GameSession>();

  constructor(initial: GameSession[] = []) {
    for (const session of initial) {
      this.sessions.set(session.gameId, structuredClone(session));
    }
  }

  async get(gameId: string): Promise<GameSession | null> {
    const session = this.sessions.get(gameId);
    return session ? structuredClone(session) : null;
  }

  async recordDiscovery(gameId: string, record: DiscoveryRecord): Promise<boolean> {
    const session = this.sessions.get(gameId);
    if (!session || session.status !== 'active' || session.discoveredEvidence.includes(record.evidenceId)) {
      return false;
    }

    const evidence = session.evidenceList[record.evidenceIndex];
    if (evidence?.evidenceId !== record.evidenceId) {
      throw new Error(`Evidence ${record.evidenceId} is not at index ${record.evidenceIndex} in game ${gameId}`);
    }

    evidence.discoveredAt = record.discoveredAt;
    session.discoveredEvidence.push(record.evidenceId);
    session.score += record.bonusPoints;
    session.updatedAt = record.discoveredAt;
    return true;
  }

  async recordHint(gameId: string, updatedAt: string): Promise<void> {
    const session = this.sessions.get(gameId);
    if (!session) throw new Error(`Cannot record hint for game ${gameId}: session not found`);
    session.hintsUsed += 1;
    session.updatedAt = updatedAt;
  }
}
