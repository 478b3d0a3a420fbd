import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../../config/app.config';
import { ProviderCredential } from '../../services/credential-vault.interface';
import { IngestionMetrics } from '../../services/ingestion-metrics.service';
import { DataKind } from '../../types/domain.types';
import { AuthRejectedError, MalformedResponseError } from '../../types/provider-errors.types';
import { RawRecord } from '../../types/raw-record.types';
import { HttpProviderClient } from './http-provider.client';
import { IProviderClient, ProviderQuery } from './provider-client.interface';
import { MarinesiaEnvelopeSchema, MarinesiaPositionSchema } from './wire.schemas';

@injectable()
export class MarinesiaProvider extends HttpProviderClient implements IProviderClient {
  readonly providerId = 'marinesia' as const;
  readonly capabilities = [DataKind.VESSEL_POSITION] as const;

  private readonly baseUrl = 'https://api.marinesia.com/api/v1';

  constructor(
    @inject('AppConfig') config: AppConfig,
    @inject(IngestionMetrics) metrics: IngestionMetrics
  ) {
    super(config, metrics);
  }

  requestCost(kind: DataKind, query: ProviderQuery): number {
    return kind === DataKind.VESSEL_POSITION && query.vesselIds.length > 0 ? 1 : 0;
  }

  async fetch(
    credential: ProviderCredential,
    kind: DataKind,
    query: ProviderQuery,
    signal?: AbortSignal
  ): Promise<RawRecord[]> {
    if (kind !== DataKind.VESSEL_POSITION || query.vesselIds.length === 0) {
      return [];
    }

    const url = new URL(`${this.baseUrl}/vessel/location/latest`);
    url.searchParams.set('key', credential.apiKey);
    url.searchParams.set('mmsi', query.vesselIds.join(','));

    const envelope = this.parseEnvelope(MarinesiaEnvelopeSchema, await this.getJson({ url, signal }));
    if (envelope.error) {
      const message = envelope.message || 'Unknown error';
      if (/key/i.test(message)) {
        throw new AuthRejectedError(this.providerId, undefined, message);
      }
      throw new MalformedResponseError(this.providerId, `API error: ${message}`);
    }

    const fetchedAt = new Date();
    return this.keepWellFormed(MarinesiaPositionSchema, envelope.data ?? []).map((payload): RawRecord => ({
      providerId: 'marinesia',
      kind: DataKind.VESSEL_POSITION,
      fetchedAt,
      payload
    }));
  }
}
