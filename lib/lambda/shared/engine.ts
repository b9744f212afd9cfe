import { PlayerHistory } from '../../engine/player-history';
import { SpoofDetector } from '../../engine/spoof-detector';
import { DiscoveryValidator } from '../../engine/discovery-validator';
import { DiscoveryCoordinator } from '../../engine/discovery-coordinator';
import { EvidenceHintService } from '../../engine/evidence-hints';
import { KeyedMutex } from '../../engine/keyed-mutex';
import type { SessionStore } from '../../engine/session-store';
import { DynamoSessionStore } from './session-db';
import { loadConfig, type AppConfig } from './config';

/**
 * Everything a request handler needs, wired once per Lambda container.
 * Player history and locks live as long as the container does.
 */
export interface Engine {
  sessions: SessionStore;
  history: PlayerHistory;
  coordinator: DiscoveryCoordinator;
  hints: EvidenceHintService;
}

export function createEngine(
  config: AppConfig,
  sessions: SessionStore,
  clock: () => number = Date.now,
): Engine {
  const history = new PlayerHistory({
    maxPlayers: config.playerHistory.maxPlayers,
    idleTtlMs: config.playerHistory.idleTtlMs,
    clock,
  });
  const locks = new KeyedMutex();

  return {
    sessions,
    history,
    coordinator: new DiscoveryCoordinator({
      validator: new DiscoveryValidator({ history, clock }),
      spoofDetector: new SpoofDetector(history),
      sessions,
      locks,
      clock,
    }),
    hints: new EvidenceHintService(sessions, locks, clock),
  };
}

let engine: Engine | undefined;

/** The container's engine, backed by DynamoDB. Created on first use. */
export function getEngine(): Engine {
  if (!engine) {
    const config = loadConfig();
    engine = createEngine(config, new DynamoSessionStore(config.gameSessionsTable));
  }
  return engine;
}
