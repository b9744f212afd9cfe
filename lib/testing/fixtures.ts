import type { APIGatewayProxyEvent } from 'aws-lambda';
import type { AccuracyReport, Coordinate, Evidence, GameSession, LocationSample } from '../types/index';
import { DEFAULT_GAME_RULES } from '../types/index';
import { EARTH_RADIUS_METERS } from '../engine/constants';

// Shared test data. Every location is placed along one meridian so that the
// haversine distance between two fixtures is the difference of their offsets.

export const NOW = Date.parse('2026-03-01T12:00:00.000Z');

export const ORIGIN: Coordinate = { lat: 51.5, lng: -0.12 };

export function metersNorth(meters: number, from: Coordinate = ORIGIN): Coordinate {
  return { lat: from.lat + ((meters / EARTH_RADIUS_METERS) * 180) / Math.PI, lng: from.lng };
}

export function makeSample(
  coordinate: Coordinate,
  accuracy: Partial<AccuracyReport> = {},
  extra: Partial<Omit<LocationSample, 'coordinate' | 'accuracy'>> = {},
): LocationSample {
  return {
    coordinate,
    accuracy: {
      horizontalAccuracyMeters: 5,
      capturedAt: NOW,
      provider: 'gps',
      ...accuracy,
    },
    ...extra,
  };
}

export function makeEvidence(overrides: Partial<Evidence> = {}): Evidence {
  return {
    evidenceId: 'ev-ticket',
    name: 'Torn ticket',
    description: 'Half of a return ticket, dated last Tuesday.',
    discoveryText: 'Tucked between two books on the returns trolley.',
    importance: 'critical',
    location: ORIGIN,
    poiName: 'Central Library',
    poiType: 'library',
    ...overrides,
  };
}

/**
 * Three pieces of evidence: the ticket at ORIGIN, a glove 30 m north and a
 * letter 1 km north.
 */
export function makeSession(overrides: Partial<GameSession> = {}): GameSession {
  return {
    gameId: 'game-1',
    playerId: 'player-1',
    status: 'active',
    evidenceList: [
      makeEvidence(),
      makeEvidence({
        evidenceId: 'ev-glove',
        name: 'Muddy glove',
        importance: 'important',
        location: metersNorth(30),
        poiName: 'Old Station',
        poiType: 'station',
      }),
      makeEvidence({
        evidenceId: 'ev-letter',
        name: 'Unsent letter',
        importance: 'background',
        location: metersNorth(1000),
        poiName: 'Riverside Park',
        poiType: 'park',
      }),
    ],
    discoveredEvidence: [],
    score: 0,
    hintsUsed: 0,
    rules: { ...DEFAULT_GAME_RULES },
    createdAt: '2026-03-01T11:00:00.000Z',
    updatedAt: '2026-03-01T11:00:00.000Z',
    ...overrides,
  };
}

export function apiEvent(overrides: Partial<APIGatewayProxyEvent> = {}): APIGatewayProxyEvent {
  return {
    body: null,
    headers: {},
    multiValueHeaders: {},
    httpMethod: 'GET',
    isBase64Encoded: false,
    path: '/',
    pathParameters: null,
    queryStringParameters: null,
    multiValueQueryStringParameters: null,
    stageVariables: null,
    resource: '/',
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      authorizer: null,
      protocol: 'HTTP/1.1',
      httpMethod: 'GET',
      identity: {
        accessKey: null,
        accountId: null,
        apiKey: null,
        apiKeyId: null,
        caller: null,
        clientCert: null,
        cognitoAuthenticationProvider: null,
        cognitoAuthenticationType: null,
        cognitoIdentityId: null,
        cognitoIdentityPoolId: null,
        principalOrgId: null,
        sourceIp: '127.0.0.1',
        user: null,
        userAgent: null,
        userArn: null,
      },
      path: '/',
      stage: 'test',
      requestId: 'test-request',
      requestTimeEpoch: NOW,
      resourceId: 'test-resource',
      resourcePath: '/',
    },
    ...overrides,
  };
}

/** Wire-format GPS payload as the client sends it */
export function gpsPayload(coordinate: Coordinate, horizontalAccuracy = 5, capturedAt = NOW) {
  return {
    location: { lat: coordinate.lat, lng: coordinate.lng },
    accuracy: {
      horizontalAccuracy,
      timestamp: new Date(capturedAt).toISOString(),
      provider: 'gps',
    },
  };
}
