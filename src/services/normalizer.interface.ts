import { PortCongestionSnapshot, VesselPosition, WeatherObservation } from '../types/domain.types';
import { RawRecord } from '../types/raw-record.types';
import { NormalizeResult } from '../types/result.types';

export interface NormalizedBatch {
  positions: VesselPosition[];
  snapshots: PortCongestionSnapshot[];
  observations: WeatherObservation[];
  unrepresentable: number;
}

export interface INormalizer {
  normalize(raw: RawRecord): NormalizeResult;
  normalizeAll(records: readonly RawRecord[]): NormalizedBatch;
}
