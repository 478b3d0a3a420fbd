// Unit conversion and validation shared by the provider mappers.
// Canonical units: knots for vessel speed, m/s for wind, metres for waves, hours for waits.

export const KMH_PER_KNOT = 1.852;
export const MS_PER_KNOT = 1852 / 3600;

// AIS "not available" sentinels
export const AIS_HEADING_UNAVAILABLE = 511;
export const AIS_SPEED_UNAVAILABLE_KNOTS = 102.3;

// Reports stamped further ahead of the fetch than this are rejected
export const MAX_CLOCK_SKEW_MS = 5 * 60 * 1000;

export class UnrepresentableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnrepresentableError';
  }
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function knotsFromKmh(kmh: number): number {
  return kmh / KMH_PER_KNOT;
}

export function msFromKnots(knots: number): number {
  return knots * MS_PER_KNOT;
}

export function assertCoordinates(latitude: number, longitude: number): void {
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new UnrepresentableError(`Latitude ${latitude} outside [-90, 90]`);
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new UnrepresentableError(`Longitude ${longitude} outside [-180, 180]`);
  }
}

export function assertMmsi(value: string): string {
  if (!/^\d{9}$/.test(value)) {
    throw new UnrepresentableError(`Vessel id ${value} is not a 9-digit MMSI`);
  }
  return value;
}

export function assertLocode(value: string): string {
  const locode = value.trim().toUpperCase().replace(/\s+/g, '');
  if (!/^[A-Z]{2}[A-Z2-9]{3}$/.test(locode)) {
    throw new UnrepresentableError(`Port id ${value} is not a UN/LOCODE`);
  }
  return locode;
}

export function assertNonNegative(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new UnrepresentableError(`${field} must be a non-negative number, got ${value}`);
  }
  return value;
}

/**
 * Parses provider timestamps. Numbers are epoch seconds (or milliseconds when
 * large enough); strings without an offset are read as UTC.
 */
export function parseTimestamp(value: string | number, fetchedAt: Date): Date {
  let millis: number;
  if (typeof value === 'number') {
    millis = value < 1e12 ? value * 1000 : value;
  } else {
    const trimmed = value.trim();
    const isoLike = trimmed.replace(' ', 'T');
    const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(isoLike);
    const dateOnly = /^\d{4}-\d{2}-\d{2}$/.test(isoLike);
    millis = Date.parse(hasZone || dateOnly ? isoLike : `${isoLike}Z`);
  }

  if (!Number.isFinite(millis)) {
    throw new UnrepresentableError(`Unparseable timestamp ${String(value)}`);
  }
  if (millis > fetchedAt.getTime() + MAX_CLOCK_SKEW_MS) {
    throw new UnrepresentableError(`Timestamp ${new Date(millis).toISOString()} is in the future`);
  }
  return new Date(millis);
}

export function normalizeSpeedKnots(knots: number | undefined): number | undefined {
  if (knots === undefined) {
    return undefined;
  }
  if (!Number.isFinite(knots) || knots < 0) {
    throw new UnrepresentableError(`Speed ${knots} must be a non-negative number`);
  }
  if (knots >= AIS_SPEED_UNAVAILABLE_KNOTS) {
    return undefined;
  }
  return roundTo(knots, 1);
}

export function normalizeHeading(heading: number | undefined): number | undefined {
  if (heading === undefined || heading === AIS_HEADING_UNAVAILABLE) {
    return undefined;
  }
  if (!Number.isFinite(heading) || heading < 0 || heading >= 360) {
    throw new UnrepresentableError(`Heading ${heading} outside [0, 360)`);
  }
  return heading;
}

/** Picks a sourced value, preferring the provider's own blend. */
export function pickSourced(values: Record<string, number> | undefined, preferred: string): number | undefined {
  if (!values) {
    return undefined;
  }
  if (values[preferred] !== undefined) {
    return values[preferred];
  }
  const [first] = Object.values(values);
  return first;
}
