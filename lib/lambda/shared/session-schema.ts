import { z } from 'zod';
import { DEFAULT_GAME_RULES } from '../../types/index';

// ============================================
// Zod Schemas for stored game sessions
//
// Items come back from DynamoDB untyped; parsing them here keeps a
// malformed item from reaching the engine as a GameSession.
// ============================================

export const CoordinateSchema = z.object({
  lat: z.number(),
  lng: z.number(),
});

export const EvidenceSchema = z.object({
  evidenceId: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  discoveryText: z.string(),
  importance: z.enum(['critical', 'important', 'misleading', 'background']),
  location: CoordinateSchema,
  poiName: z.string().min(1),
  poiType: z.string(),
  discoveredAt: z.string().optional(),
  relatedCharacter: z.string().optional(),
  clueText: z.string().optional(),
});

export const GameSessionSchema = z.object({
  gameId: z.string().min(1),
  playerId: z.string().min(1),
  status: z.enum(['active', 'completed', 'abandoned', 'expired']),
  evidenceList: z.array(EvidenceSchema),
  discoveredEvidence: z.array(z.string()).default([]),
  score: z.number().default(0),
  hintsUsed: z.number().int().default(0),
  rules: z
    .object({
      discoveryRadiusMeters: z.number().positive().default(DEFAULT_GAME_RULES.discoveryRadiusMeters),
      hintEnabled: z.boolean().default(DEFAULT_GAME_RULES.hintEnabled),
    })
    .default({}),
  createdAt: z.string(),
  updatedAt: z.string(),
});
