import type { APIGatewayProxyResult } from 'aws-lambda';

export const ErrorCodes = {
  VALIDATION_ERROR: { code: 'VALIDATION_ERROR', status: 400 },
  HINTS_DISABLED: { code: 'HINTS_DISABLED', status: 403 },
  NOT_FOUND: { code: 'NOT_FOUND', status: 404 },
  GAME_NOT_ACTIVE: { code: 'GAME_NOT_ACTIVE', status: 409 },
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', status: 500 },
} as const;

const HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
};

export function successResponse(data: unknown, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: HEADERS,
    body: JSON.stringify({ success: true, data }),
  };
}

export function errorResponse(code: string, message: string, statusCode: number): APIGatewayProxyResult {
  return {
    statusCode,
    headers: HEADERS,
    body: JSON.stringify({ success: false, error: { code, message } }),
  };
}
