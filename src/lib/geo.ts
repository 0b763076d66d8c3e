import distanceTurf from '@turf/distance';
import { point } from '@turf/helpers';
import { z } from 'zod';
import { ValidationError } from './errors';
import type { Coordinate } from './types';

export const EARTH_RADIUS_MILES = 3958.8;
export const MILES_PER_KM = 0.621371;

export const CoordinateSchema = z.object({
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
});

// Validate an untrusted coordinate and return a frozen copy
export function assertCoordinate(value: unknown): Coordinate {
  const parsed = CoordinateSchema.safeParse(value);
  if (!parsed.success) {
    throw ValidationError.fromZod('Invalid coordinate', parsed.error);
  }
  return Object.freeze({ ...parsed.data });
}

/**
 * Great-circle distance in miles (haversine, R = 3958.8 mi).
 *
 * Arguments are put in a fixed order before the haversine is evaluated so
 * that `distance(a, b)` and `distance(b, a)` are bit-for-bit equal.
 */
export function distance(a: Coordinate, b: Coordinate): number {
  const from = assertCoordinate(a);
  const to = assertCoordinate(b);
  const [first, second] = compareCoordinates(from, to) <= 0 ? [from, to] : [to, from];

  // turf returns the central angle when asked for radians
  const centralAngle = distanceTurf(
    point([first.longitude, first.latitude]),
    point([second.longitude, second.latitude]),
    { units: 'radians' }
  );
  return centralAngle * EARTH_RADIUS_MILES;
}

function compareCoordinates(a: Coordinate, b: Coordinate): number {
  return a.latitude - b.latitude || a.longitude - b.longitude;
}
