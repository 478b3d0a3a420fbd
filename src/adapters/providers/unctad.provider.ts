import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../../config/app.config';
import { ProviderCredential } from '../../services/credential-vault.interface';
import { IngestionMetrics } from '../../services/ingestion-metrics.service';
import { DataKind } from '../../types/domain.types';
import { RawRecord } from '../../types/raw-record.types';
import { HttpProviderClient } from './http-provider.client';
import { IProviderClient, ProviderQuery } from './provider-client.interface';
import { UnctadEnvelopeSchema, UnctadPortSchema } from './wire.schemas';

@injectable()
export class UnctadProvider extends HttpProviderClient implements IProviderClient {
  readonly providerId = 'unctad' as const;
  readonly capabilities = [DataKind.PORT_CONGESTION] as const;

  private readonly baseUrl = 'https://unctadstat-api.unctad.org/api/port-congestion';

  constructor(
    @inject('AppConfig') config: AppConfig,
    @inject(IngestionMetrics) metrics: IngestionMetrics
  ) {
    super(config, metrics);
  }

  requestCost(kind: DataKind, query: ProviderQuery): number {
    return kind === DataKind.PORT_CONGESTION && query.ports.length > 0 ? 1 : 0;
  }

  async fetch(
    credential: ProviderCredential,
    kind: DataKind,
    query: ProviderQuery,
    signal?: AbortSignal
  ): Promise<RawRecord[]> {
    if (kind !== DataKind.PORT_CONGESTION || query.ports.length === 0) {
      return [];
    }

    const url = new URL(this.baseUrl);
    url.searchParams.set('locode', query.ports.map(p => p.portId).join(','));

    const body = await this.getJson({ url, headers: { 'x-api-key': credential.apiKey }, signal });
    const envelope = this.parseEnvelope(UnctadEnvelopeSchema, body);
    const fetchedAt = new Date();

    return this.keepWellFormed(UnctadPortSchema, envelope.data).map((payload): RawRecord => ({
      providerId: 'unctad',
      kind: DataKind.PORT_CONGESTION,
      fetchedAt,
      payload
    }));
  }
}
