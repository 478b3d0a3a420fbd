import {
  assertCoordinates,
  assertLocode,
  assertMmsi,
  normalizeHeading,
  normalizeSpeedKnots,
  parseTimestamp,
  pickSourced,
  UnrepresentableError
} from './normalization.util';

const fetchedAt = new Date('2026-03-01T12:00:00Z');

describe('parseTimestamp', () => {
  it.each([
    ['2026-03-01T11:58:00Z', '2026-03-01T11:58:00.000Z'],
    ['2026-03-01T13:58:00+02:00', '2026-03-01T11:58:00.000Z'],
    ['2026-03-01T11:58:00', '2026-03-01T11:58:00.000Z'],
    ['2026-03-01 11:54', '2026-03-01T11:54:00.000Z']
  ])('should read %s as %s', (input, expected) => {
    expect(parseTimestamp(input, fetchedAt).toISOString()).toBe(expected);
  });

  it('should read small numbers as epoch seconds and large ones as milliseconds', () => {
    expect(parseTimestamp(1772366280, fetchedAt).toISOString()).toBe('2026-03-01T11:58:00.000Z');
    expect(parseTimestamp(1772366280000, fetchedAt).toISOString()).toBe('2026-03-01T11:58:00.000Z');
  });

  it('should tolerate small clock skew but reject timestamps far in the future', () => {
    expect(parseTimestamp('2026-03-01T12:04:00Z', fetchedAt).toISOString()).toBe('2026-03-01T12:04:00.000Z');
    expect(() => parseTimestamp('2026-03-01T12:30:00Z', fetchedAt)).toThrow(UnrepresentableError);
  });

  it('should reject unparseable values', () => {
    expect(() => parseTimestamp('yesterday', fetchedAt)).toThrow('Unparseable timestamp yesterday');
  });
});

describe('assertCoordinates', () => {
  it('should accept the boundaries', () => {
    expect(() => assertCoordinates(90, -180)).not.toThrow();
    expect(() => assertCoordinates(-90, 180)).not.toThrow();
  });

  it('should reject out-of-range values', () => {
    expect(() => assertCoordinates(999, 4)).toThrow('Latitude 999 outside [-90, 90]');
    expect(() => assertCoordinates(51, 181)).toThrow('Longitude 181 outside [-180, 180]');
    expect(() => assertCoordinates(Number.NaN, 4)).toThrow(UnrepresentableError);
  });
});

describe('identifiers', () => {
  it('should accept nine-digit MMSIs only', () => {
    expect(assertMmsi('244660000')).toBe('244660000');
    expect(() => assertMmsi('24466')).toThrow('Vessel id 24466 is not a 9-digit MMSI');
  });

  it('should canonicalise UN/LOCODEs', () => {
    expect(assertLocode(' nl rtm ')).toBe('NLRTM');
    expect(() => assertLocode('Rotterdam')).toThrow(UnrepresentableError);
  });
});

describe('normalizeSpeedKnots', () => {
  it('should round to a tenth of a knot', () => {
    expect(normalizeSpeedKnots(12.345)).toBe(12.3);
    expect(normalizeSpeedKnots(0)).toBe(0);
  });

  it('should treat the AIS sentinel as unavailable', () => {
    expect(normalizeSpeedKnots(102.3)).toBeUndefined();
    expect(normalizeSpeedKnots(undefined)).toBeUndefined();
  });

  it('should reject negative speeds', () => {
    expect(() => normalizeSpeedKnots(-1)).toThrow('Speed -1 must be a non-negative number');
  });
});

describe('normalizeHeading', () => {
  it('should pass valid headings through and drop the AIS sentinel', () => {
    expect(normalizeHeading(0)).toBe(0);
    expect(normalizeHeading(359)).toBe(359);
    expect(normalizeHeading(511)).toBeUndefined();
  });

  it('should reject headings outside a full turn', () => {
    expect(() => normalizeHeading(360)).toThrow('Heading 360 outside [0, 360)');
  });
});

describe('pickSourced', () => {
  it('should prefer the requested source and fall back to the first value', () => {
    expect(pickSourced({ noaa: 6.1, sg: 7.2 }, 'sg')).toBe(7.2);
    expect(pickSourced({ noaa: 6.1, icon: 5.9 }, 'sg')).toBe(6.1);
    expect(pickSourced({}, 'sg')).toBeUndefined();
    expect(pickSourced(undefined, 'sg')).toBeUndefined();
  });
});
