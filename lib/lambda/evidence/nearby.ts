import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import type { SessionStore } from '../../engine/session-store';
import { findNearbyEvidence } from '../../engine/evidence-hints';
import { getEngine } from '../shared/engine';
import { successResponse, errorResponse, ErrorCodes } from '../shared/response';
import { NearbyQuerySchema } from '../shared/request-schema';

/**
 * GET /games/{gameId}/evidence/nearby?lat=..&lng=.. -- Undiscovered evidence
 * within the game's discovery radius of the given point, closest first.
 */
export function createNearbyHandler(getSessions: () => SessionStore) {
  return async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
    try {
      const gameId = event.pathParameters?.gameId;
      if (!gameId) {
        return errorResponse(
          ErrorCodes.VALIDATION_ERROR.code,
          'gameId path parameter is required',
          ErrorCodes.VALIDATION_ERROR.status,
        );
      }

      const query = NearbyQuerySchema.safeParse(event.queryStringParameters ?? {});
      if (!query.success) {
        return errorResponse(
          ErrorCodes.VALIDATION_ERROR.code,
          'lat and lng query parameters must be valid coordinates',
          ErrorCodes.VALIDATION_ERROR.status,
        );
      }

      const session = await getSessions().get(gameId);
      if (!session) {
        return errorResponse(
          ErrorCodes.NOT_FOUND.code,
          `Game "${gameId}" was not found.`,
          ErrorCodes.NOT_FOUND.status,
        );
      }

      return successResponse(findNearbyEvidence(session, query.data));
    } catch (error) {
      console.error('Nearby evidence error:', error);
      return errorResponse(
        ErrorCodes.INTERNAL_ERROR.code,
        'Failed to find nearby evidence',
        ErrorCodes.INTERNAL_ERROR.status,
      );
    }
  };
}

export const handler = createNearbyHandler(() => getEngine().sessions);
