import { z } from 'zod';
import { LOCATION_PROVIDERS } from '../../types/index';
import type { LocationProvider, LocationSample } from '../../types/index';

// ============================================
// Request bodies
//
// Shapes only. Range, freshness and plausibility of the fix are judged by
// the reading guard, so that a bad fix becomes an InvalidReading outcome
// rather than a 400.
// ============================================

export const GpsInfoSchema = z.object({
  location: z.object({
    lat: z.number(),
    lng: z.number(),
  }),
  accuracy: z.object({
    horizontalAccuracy: z.number(),
    verticalAccuracy: z.number().optional(),
    timestamp: z.string().datetime({ offset: true }),
    provider: z.string().optional(),
  }),
  speed: z.number().optional(),
  bearing: z.number().optional(),
  altitude: z.number().optional(),
});

export type GpsInfo = z.infer<typeof GpsInfoSchema>;

export const DiscoverRequestSchema = z.object({
  playerId: z.string().min(1),
  gps: GpsInfoSchema,
});

export const LocationQualityRequestSchema = z.object({
  gps: GpsInfoSchema,
});

export const NearbyQuerySchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lng: z.coerce.number().min(-180).max(180),
});

/** Lower-cases the reported provider; anything unrecognised is 'unknown'. */
export function normalizeProvider(raw: string | undefined): LocationProvider {
  const lower = raw?.trim().toLowerCase();
  return LOCATION_PROVIDERS.find((p) => p === lower) ?? 'unknown';
}

export function toLocationSample(gps: GpsInfo): LocationSample {
  return {
    coordinate: { lat: gps.location.lat, lng: gps.location.lng },
    accuracy: {
      horizontalAccuracyMeters: gps.accuracy.horizontalAccuracy,
      verticalAccuracyMeters: gps.accuracy.verticalAccuracy,
      capturedAt: Date.parse(gps.accuracy.timestamp),
      provider: normalizeProvider(gps.accuracy.provider),
    },
    speedMetersPerSecond: gps.speed,
    bearingDegrees: gps.bearing,
    altitudeMeters: gps.altitude,
  };
}

/**
 * Parse a JSON request body against a schema. Returns the first problem as a
 * message suitable for a VALIDATION_ERROR response.
 */
export function parseBody<T>(
  body: string | null,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): { ok: true; data: T } | { ok: false; message: string } {
  if (!body) return { ok: false, message: 'Request body is required' };

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return { ok: false, message: 'Request body is not valid JSON' };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, message: `${issue.path.join('.') || 'body'}: ${issue.message}` };
  }
  return { ok: true, data: parsed.data };
}
