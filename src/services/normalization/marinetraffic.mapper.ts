import { PortCongestionSnapshot, VesselPosition } from '../../types/domain.types';
import { MarineTrafficCongestionRecord, MarineTrafficPositionRecord } from '../../types/raw-record.types';
import {
  assertCoordinates,
  assertLocode,
  assertMmsi,
  assertNonNegative,
  normalizeHeading,
  normalizeSpeedKnots,
  parseTimestamp,
  roundTo
} from './normalization.util';

// Terrestrial receivers report more reliably than satellite passes
const CONFIDENCE_BY_SOURCE: Record<string, number> = {
  TER: 0.9,
  SAT: 0.7
};
const DEFAULT_CONFIDENCE = 0.8;

export function mapMarineTrafficPosition(raw: MarineTrafficPositionRecord): VesselPosition {
  const { payload } = raw;
  assertCoordinates(payload.LAT, payload.LON);

  return {
    vesselId: assertMmsi(payload.MMSI),
    latitude: payload.LAT,
    longitude: payload.LON,
    // SPEED is reported in tenths of a knot
    speedKnots: normalizeSpeedKnots(payload.SPEED / 10),
    headingDegrees: normalizeHeading(payload.HEADING),
    timestamp: parseTimestamp(payload.TIMESTAMP, raw.fetchedAt),
    source: raw.providerId,
    confidence: CONFIDENCE_BY_SOURCE[payload.DSRC?.toUpperCase() ?? ''] ?? DEFAULT_CONFIDENCE
  };
}

export function mapMarineTrafficCongestion(raw: MarineTrafficCongestionRecord): PortCongestionSnapshot {
  const { payload } = raw;
  const waitMinutes = assertNonNegative(payload.AVG_WAIT_MINUTES, 'AVG_WAIT_MINUTES');

  return {
    portId: assertLocode(payload.PORT_UNLOCODE),
    vesselsWaiting: Math.round(assertNonNegative(payload.VESSELS_WAITING, 'VESSELS_WAITING')),
    averageWaitHours: roundTo(waitMinutes / 60, 2),
    timestamp: parseTimestamp(payload.TIMESTAMP, raw.fetchedAt),
    source: raw.providerId,
    contributingSources: [raw.providerId]
  };
}
