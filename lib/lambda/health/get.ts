import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { successResponse, errorResponse, ErrorCodes } from '../shared/response';

export async function handler(_event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    return successResponse({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'mystery-trail',
    });
  } catch (error) {
    console.error('Health check error:', error);
    return errorResponse(
      ErrorCodes.INTERNAL_ERROR.code,
      'Internal server error',
      ErrorCodes.INTERNAL_ERROR.status
    );
  }
}
