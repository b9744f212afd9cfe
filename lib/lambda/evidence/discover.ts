import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import type { DiscoveryOutcome } from '../../types/index';
import type { DiscoveryCoordinator } from '../../engine/discovery-coordinator';
import { getEngine } from '../shared/engine';
import { successResponse, errorResponse, ErrorCodes } from '../shared/response';
import { DiscoverRequestSchema, parseBody, toLocationSample } from '../shared/request-schema';

/**
 * POST /games/{gameId}/evidence/{evidenceId}/discover -- Claim a discovery.
 *
 * Body: { playerId, gps: { location, accuracy, speed?, bearing?, altitude? } }
 *
 * Rejections caused by the player's position (too far, poor fix, suspected
 * spoofing) are 200 responses with success: false in the outcome, so the
 * client can show the message. Missing or finished games are errors.
 */
export function createDiscoverHandler(getCoordinator: () => DiscoveryCoordinator) {
  return async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
    try {
      const gameId = event.pathParameters?.gameId;
      const evidenceId = event.pathParameters?.evidenceId;

      if (!gameId || !evidenceId) {
        return errorResponse(
          ErrorCodes.VALIDATION_ERROR.code,
          'gameId and evidenceId path parameters are required',
          ErrorCodes.VALIDATION_ERROR.status,
        );
      }

      const body = parseBody(event.body, DiscoverRequestSchema);
      if (!body.ok) {
        return errorResponse(ErrorCodes.VALIDATION_ERROR.code, body.message, ErrorCodes.VALIDATION_ERROR.status);
      }

      const outcome = await getCoordinator().discover({
        gameId,
        evidenceId,
        playerId: body.data.playerId,
        sample: toLocationSample(body.data.gps),
      });

      if (outcome.code === 'GameNotFound') {
        return errorResponse(ErrorCodes.NOT_FOUND.code, outcome.message, ErrorCodes.NOT_FOUND.status);
      }
      if (outcome.code === 'GameNotActive') {
        return errorResponse(ErrorCodes.GAME_NOT_ACTIVE.code, outcome.message, ErrorCodes.GAME_NOT_ACTIVE.status);
      }

      return successResponse(toResponseBody(outcome));
    } catch (error) {
      console.error('Discover evidence error:', error);
      return errorResponse(
        ErrorCodes.INTERNAL_ERROR.code,
        'Failed to process evidence discovery',
        ErrorCodes.INTERNAL_ERROR.status,
      );
    }
  };
}

/**
 * Client view of an outcome. Spoof indicators stay server-side.
 */
export function toResponseBody(outcome: DiscoveryOutcome) {
  return {
    success: outcome.success,
    code: outcome.code,
    message: outcome.message,
    evidence: outcome.evidence ?? null,
    distance: outcome.distanceMeters ?? null,
    nextClue: outcome.nextClueText ?? null,
    discoveryBonus: outcome.bonusPoints,
    advisoryRadius: outcome.validation?.diagnostics.advisoryRadiusMeters ?? null,
    confidenceScore: outcome.validation?.confidenceScore ?? null,
  };
}

export const handler = createDiscoverHandler(() => getEngine().coordinator);
