import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { describeLocationQuality } from '../../engine/location-quality';
import { successResponse, errorResponse, ErrorCodes } from '../shared/response';
import { LocationQualityRequestSchema, parseBody, toLocationSample } from '../shared/request-schema';

/**
 * POST /location/quality -- How usable the device's current fix is.
 *
 * Body: { gps: { location, accuracy, ... } }
 */
export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const body = parseBody(event.body, LocationQualityRequestSchema);
    if (!body.ok) {
      return errorResponse(ErrorCodes.VALIDATION_ERROR.code, body.message, ErrorCodes.VALIDATION_ERROR.status);
    }

    return successResponse(describeLocationQuality(toLocationSample(body.data.gps), Date.now()));
  } catch (error) {
    console.error('Location quality error:', error);
    return errorResponse(
      ErrorCodes.INTERNAL_ERROR.code,
      'Failed to assess location quality',
      ErrorCodes.INTERNAL_ERROR.status,
    );
  }
}
