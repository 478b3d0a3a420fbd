import { inject, injectable } from 'tsyringe';
import { DataKind } from '../types/domain.types';
import { RawRecord } from '../types/raw-record.types';
import { NormalizedRecord, NormalizeResult, NormalizeStatus } from '../types/result.types';
import { createLogger } from '../utils/logger.util';
import { IngestionMetrics } from './ingestion-metrics.service';
import { INormalizer, NormalizedBatch } from './normalizer.interface';
import { mapMarinesiaPosition } from './normalization/marinesia.mapper';
import { mapMarineTrafficCongestion, mapMarineTrafficPosition } from './normalization/marinetraffic.mapper';
import { UnrepresentableError } from './normalization/normalization.util';
import { mapUnctadPort } from './normalization/unctad.mapper';
import { mapNoaaWeather, mapStormGlassWeather } from './normalization/weather.mapper';

const logger = createLogger('Normalizer');

/**
 * Maps provider records into canonical records. Records that cannot be
 * represented are dropped and counted per provider; normalization never throws.
 */
@injectable()
export class NormalizerService implements INormalizer {
  constructor(@inject(IngestionMetrics) private readonly metrics: IngestionMetrics) {}

  normalize(raw: RawRecord): NormalizeResult {
    try {
      return { status: NormalizeStatus.NORMALIZED, record: this.map(raw) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      if (!(error instanceof UnrepresentableError)) {
        logger.error(`Unexpected mapping failure for ${raw.providerId} ${raw.kind}`, error);
      }
      this.metrics.increment(raw.providerId, 'unrepresentable');
      logger.warn(`Dropping ${raw.providerId} ${raw.kind} record: ${reason}`);
      return { status: NormalizeStatus.UNREPRESENTABLE, reason };
    }
  }

  normalizeAll(records: readonly RawRecord[]): NormalizedBatch {
    const batch: NormalizedBatch = { positions: [], snapshots: [], observations: [], unrepresentable: 0 };

    for (const raw of records) {
      const result = this.normalize(raw);
      if (result.status === NormalizeStatus.UNREPRESENTABLE) {
        batch.unrepresentable += 1;
        continue;
      }

      const { record } = result;
      switch (record.kind) {
        case DataKind.VESSEL_POSITION:
          batch.positions.push(record.position);
          break;
        case DataKind.PORT_CONGESTION:
          batch.snapshots.push(record.snapshot);
          break;
        case DataKind.WEATHER:
          batch.observations.push(record.observation);
          break;
      }
    }

    return batch;
  }

  private map(raw: RawRecord): NormalizedRecord {
    switch (raw.providerId) {
      case 'marinetraffic':
        return raw.kind === DataKind.VESSEL_POSITION
          ? { kind: DataKind.VESSEL_POSITION, position: mapMarineTrafficPosition(raw) }
          : { kind: DataKind.PORT_CONGESTION, snapshot: mapMarineTrafficCongestion(raw) };
      case 'marinesia':
        return { kind: DataKind.VESSEL_POSITION, position: mapMarinesiaPosition(raw) };
      case 'unctad':
        return { kind: DataKind.PORT_CONGESTION, snapshot: mapUnctadPort(raw) };
      case 'stormglass':
        return { kind: DataKind.WEATHER, observation: mapStormGlassWeather(raw) };
      case 'noaa':
        return { kind: DataKind.WEATHER, observation: mapNoaaWeather(raw) };
    }
  }
}
