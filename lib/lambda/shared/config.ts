import { z } from 'zod';

// ============================================
// Environment
// ============================================

const EnvSchema = z.object({
  GAME_SESSIONS_TABLE_NAME: z.string().min(1).default('MysteryTrail-GameSessions'),
  PLAYER_HISTORY_MAX_PLAYERS: z.coerce.number().int().positive().default(10000),
  PLAYER_HISTORY_IDLE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
});

export interface AppConfig {
  gameSessionsTable: string;
  playerHistory: {
    maxPlayers: number;
    idleTtlMs: number;
  };
}

/**
 * Read configuration from environment variables. Throws (failing the cold
 * start) when a variable is present but malformed.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const vars = parsed.data;
  return {
    gameSessionsTable: vars.GAME_SESSIONS_TABLE_NAME,
    playerHistory: {
      maxPlayers: vars.PLAYER_HISTORY_MAX_PLAYERS,
      idleTtlMs: vars.PLAYER_HISTORY_IDLE_TTL_SECONDS * 1000,
    },
  };
}
