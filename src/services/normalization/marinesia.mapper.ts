import { VesselPosition } from '../../types/domain.types';
import { MarinesiaPositionRecord } from '../../types/raw-record.types';
import {
  assertCoordinates,
  assertMmsi,
  knotsFromKmh,
  normalizeHeading,
  normalizeSpeedKnots,
  parseTimestamp
} from './normalization.util';

export function mapMarinesiaPosition(raw: MarinesiaPositionRecord): VesselPosition {
  const { payload } = raw;
  assertCoordinates(payload.lat, payload.lng);

  return {
    vesselId: assertMmsi(payload.mmsi),
    latitude: payload.lat,
    longitude: payload.lng,
    speedKnots: normalizeSpeedKnots(payload.speed_kmh === undefined ? undefined : knotsFromKmh(payload.speed_kmh)),
    headingDegrees: normalizeHeading(payload.hdt),
    timestamp: parseTimestamp(payload.ts, raw.fetchedAt),
    source: raw.providerId,
    // AIS position-accuracy flag: 1 means better than 10 m
    confidence: payload.pos_acc === 1 ? 0.9 : 0.6
  };
}
