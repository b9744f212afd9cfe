import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import type { EvidenceHintService } from '../../engine/evidence-hints';
import { getEngine } from '../shared/engine';
import { successResponse, errorResponse, ErrorCodes } from '../shared/response';

/**
 * GET /games/{gameId}/evidence/{evidenceId}/hint -- Indirect hint about where
 * a piece of evidence is. Each hint for undiscovered evidence is counted on
 * the session and costs points at the end of the game.
 */
export function createHintHandler(getHints: () => EvidenceHintService) {
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

      const result = await getHints().requestHint(gameId, evidenceId);
      if (result.ok) return successResponse(result.hint);

      if (result.code === 'HintsDisabled') {
        return errorResponse(ErrorCodes.HINTS_DISABLED.code, result.message, ErrorCodes.HINTS_DISABLED.status);
      }
      if (result.code === 'GameNotActive') {
        return errorResponse(ErrorCodes.GAME_NOT_ACTIVE.code, result.message, ErrorCodes.GAME_NOT_ACTIVE.status);
      }
      return errorResponse(ErrorCodes.NOT_FOUND.code, result.message, ErrorCodes.NOT_FOUND.status);
    } catch (error) {
      console.error('Evidence hint error:', error);
      return errorResponse(
        ErrorCodes.INTERNAL_ERROR.code,
        'Failed to get evidence hint',
        ErrorCodes.INTERNAL_ERROR.status,
      );
    }
  };
}

export const handler = createHintHandler(() => getEngine().hints);
