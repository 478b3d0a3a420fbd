import { PortCongestionSnapshot } from '../../types/domain.types';
import { UnctadPortRecord } from '../../types/raw-record.types';
import { assertLocode, assertNonNegative, parseTimestamp, roundTo } from './normalization.util';

export function mapUnctadPort(raw: UnctadPortRecord): PortCongestionSnapshot {
  const { payload } = raw;
  const waitDays = assertNonNegative(payload.meanWaitingDays, 'meanWaitingDays');

  return {
    portId: assertLocode(payload.locode),
    vesselsWaiting: Math.round(assertNonNegative(payload.vesselsAtAnchor, 'vesselsAtAnchor')),
    averageWaitHours: roundTo(waitDays * 24, 2),
    timestamp: parseTimestamp(payload.observedAt, raw.fetchedAt),
    source: raw.providerId,
    contributingSources: [raw.providerId]
  };
}
