/**
 * Evidence -- a clue placed at a real-world point of interest.
 *
 * Evidence records are produced when a game is created (scenario text from
 * the story generator, coordinates from the places lookup) and stored inside
 * the GameSession. The location-trust engine only reads them.
 */

import type { Coordinate } from './common';

export type EvidenceImportance = 'critical' | 'important' | 'misleading' | 'background';

export interface Evidence {
  /** Unique within the game, e.g. "ev_bloody_glove" */
  evidenceId: string;

  /** Display name, e.g. "A torn train ticket" */
  name: string;

  description: string;

  /** Text revealed to the player on discovery */
  discoveryText: string;

  importance: EvidenceImportance;

  /** Where the evidence is hidden */
  location: Coordinate;

  /** Name of the point of interest, e.g. "Central Library" */
  poiName: string;

  /** Place category, e.g. "park", "cafe", "station" */
  poiType: string;

  /** ISO timestamp; set once when the evidence is discovered */
  discoveredAt?: string;

  relatedCharacter?: string;

  clueText?: string;
}

/**
 * The engine's read-only view of an evidence location.
 */
export interface TargetPoint {
  coordinate: Coordinate;
  poiType: string;
  importance: EvidenceImportance;
}
