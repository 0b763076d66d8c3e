import { describe, it, expect } from 'vitest';
import { assertCoordinate, distance, EARTH_RADIUS_MILES } from './geo';
import { ValidationError } from './errors';

const BOULDER = { latitude: 40.0, longitude: -105.0 };
const DENVER = { latitude: 39.7392, longitude: -104.9903 };

describe('distance', () => {
  it('is zero for identical points', () => {
    expect(distance(BOULDER, BOULDER)).toBe(0);
    expect(distance(BOULDER, { ...BOULDER })).toBeLessThan(1e-6);
  });

  it('is exactly symmetric', () => {
    const pairs = [
      [BOULDER, DENVER],
      [{ latitude: -33.9, longitude: 151.2 }, { latitude: 51.5, longitude: -0.12 }],
      [{ latitude: 64.8, longitude: -147.7 }, { latitude: 19.7, longitude: -155.1 }],
      [{ latitude: 10, longitude: 179.9 }, { latitude: 10, longitude: -179.9 }],
    ];
    for (const [a, b] of pairs) {
      expect(distance(a, b)).toBe(distance(b, a));
    }
  });

  it('uses a 3958.8 mile Earth radius', () => {
    expect(EARTH_RADIUS_MILES).toBe(3958.8);
    // One degree of latitude along a meridian
    expect(distance({ latitude: 40, longitude: -105 }, { latitude: 41, longitude: -105 })).toBeCloseTo(
      (EARTH_RADIUS_MILES * Math.PI) / 180,
      9
    );
  });

  it('matches hand-computed haversine distances', () => {
    expect(distance(BOULDER, DENVER)).toBeCloseTo(18.027, 2);
    expect(distance(BOULDER, { latitude: 40, longitude: -104 })).toBeCloseTo(52.929, 2);
    expect(distance(BOULDER, { latitude: 42, longitude: -106 })).toBeCloseTo(147.696, 2);
  });

  it('grows monotonically along a fixed bearing', () => {
    let previous = 0;
    for (let step = 1; step <= 20; step++) {
      const next = distance(BOULDER, { latitude: 40 + step * 0.25, longitude: -105 + step * 0.25 });
      expect(next).toBeGreaterThan(previous);
      previous = next;
    }
  });

  it('handles the antimeridian as a short hop', () => {
    const d = distance({ latitude: 0, longitude: 179.5 }, { latitude: 0, longitude: -179.5 });
    expect(d).toBeCloseTo((EARTH_RADIUS_MILES * Math.PI) / 180, 6);
  });

  it('rejects out-of-range coordinates', () => {
    expect(() => distance({ latitude: 91, longitude: 0 }, BOULDER)).toThrow(ValidationError);
    expect(() => distance(BOULDER, { latitude: 0, longitude: -180.5 })).toThrow(ValidationError);
    expect(() => distance({ latitude: NaN, longitude: 0 }, BOULDER)).toThrow(ValidationError);
  });
});

describe('assertCoordinate', () => {
  it('returns a frozen copy of a valid coordinate', () => {
    const input = { latitude: 45.679, longitude: -111.0426 };
    const result = assertCoordinate(input);
    expect(result).toEqual(input);
    expect(result).not.toBe(input);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('accepts the range boundaries', () => {
    expect(assertCoordinate({ latitude: -90, longitude: 180 })).toEqual({ latitude: -90, longitude: 180 });
  });

  it('reports which field is invalid', () => {
    expect(() => assertCoordinate({ latitude: 12, longitude: 'east' })).toThrow(
      /^Invalid coordinate: longitude: /
    );
  });

  it('rejects non-objects', () => {
    expect(() => assertCoordinate(null)).toThrow(ValidationError);
    expect(() => assertCoordinate([40, -105])).toThrow(ValidationError);
  });
});
