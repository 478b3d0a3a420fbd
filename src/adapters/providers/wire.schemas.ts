import { z } from 'zod';

// Providers are inconsistent about quoting numbers; accept both and reject
// empty strings and NaN. Range checks happen during normalization.
const numeric = z.union([
  z.number(),
  z.string().trim().min(1).pipe(z.coerce.number())
]);

const identifier = z.union([z.string().trim().min(1), z.number()]).transform(String);

// MarineTraffic simple-format (protocol:jsono) payloads
export const MarineTrafficPositionSchema = z.object({
  MMSI: identifier,
  LAT: numeric,
  LON: numeric,
  SPEED: numeric,             // tenths of a knot
  HEADING: numeric.optional(),
  TIMESTAMP: z.string().min(1),
  DSRC: z.string().optional() // TER | SAT
});

export const MarineTrafficCongestionSchema = z.object({
  PORT_UNLOCODE: z.string().trim().min(1),
  VESSELS_WAITING: numeric,
  AVG_WAIT_MINUTES: numeric,
  TIMESTAMP: z.string().min(1)
});

export const MarineTrafficErrorSchema = z.object({
  errors: z.array(z.object({
    code: z.string(),
    detail: z.string().optional()
  })).min(1)
});

// Marinesia latest-location payloads
export const MarinesiaPositionSchema = z.object({
  mmsi: identifier,
  lat: numeric,
  lng: numeric,
  speed_kmh: numeric.optional(),
  hdt: numeric.optional(),
  ts: numeric,                 // epoch seconds
  pos_acc: z.union([z.literal(0), z.literal(1)]).optional()
});

export const MarinesiaEnvelopeSchema = z.object({
  error: z.boolean(),
  message: z.string().optional(),
  data: z.array(z.unknown()).optional()
});

// UNCTAD port congestion payloads
export const UnctadPortSchema = z.object({
  locode: z.string().trim().min(1),
  vesselsAtAnchor: numeric,
  meanWaitingDays: numeric,
  observedAt: z.string().min(1)
});

export const UnctadEnvelopeSchema = z.object({
  data: z.array(z.unknown())
});

// Stormglass point forecast payloads; values are keyed by upstream source (sg, noaa, ...)
const sourcedValue = z.record(z.string(), z.number());

export const StormGlassHourSchema = z.object({
  time: z.string().min(1),
  windSpeed: sourcedValue.optional(),
  waveHeight: sourcedValue.optional()
});

export const StormGlassEnvelopeSchema = z.object({
  hours: z.array(z.unknown())
});

// NOAA CO-OPS wind product payloads
export const NoaaWindReadingSchema = z.object({
  t: z.string().min(1),        // "yyyy-MM-dd HH:mm" in GMT
  s: numeric,                  // knots with units=english
  d: numeric.optional()
});

export const NoaaEnvelopeSchema = z.object({
  data: z.array(z.unknown()).optional(),
  error: z.object({ message: z.string() }).optional()
});

export type MarineTrafficPositionWire = z.infer<typeof MarineTrafficPositionSchema>;
export type MarineTrafficCongestionWire = z.infer<typeof MarineTrafficCongestionSchema>;
export type MarinesiaPositionWire = z.infer<typeof MarinesiaPositionSchema>;
export type UnctadPortWire = z.infer<typeof UnctadPortSchema>;
export type StormGlassHourWire = z.infer<typeof StormGlassHourSchema>;
export type NoaaWindReadingWire = z.infer<typeof NoaaWindReadingSchema>;

/** A per-location reading plus the location it was requested for. */
export interface LocatedWire<T> {
  locationId: string;
  latitude: number;
  longitude: number;
  reading: T;
}
