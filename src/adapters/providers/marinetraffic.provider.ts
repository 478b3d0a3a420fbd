import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../../config/app.config';
import { ProviderCredential } from '../../services/credential-vault.interface';
import { IngestionMetrics } from '../../services/ingestion-metrics.service';
import { DataKind } from '../../types/domain.types';
import { AuthRejectedError, MalformedResponseError } from '../../types/provider-errors.types';
import { RawRecord } from '../../types/raw-record.types';
import { HttpProviderClient } from './http-provider.client';
import { IProviderClient, ProviderQuery } from './provider-client.interface';
import {
  MarineTrafficCongestionSchema,
  MarineTrafficErrorSchema,
  MarineTrafficPositionSchema
} from './wire.schemas';

const AUTH_ERROR_CODES = ['INVALID API KEY', 'ABSENT KEY', 'EXPIRED SERVICE'];

@injectable()
export class MarineTrafficProvider extends HttpProviderClient implements IProviderClient {
  readonly providerId = 'marinetraffic' as const;
  readonly capabilities = [DataKind.VESSEL_POSITION, DataKind.PORT_CONGESTION] as const;

  private readonly baseUrl = 'https://services.marinetraffic.com/api';

  constructor(
    @inject('AppConfig') config: AppConfig,
    @inject(IngestionMetrics) metrics: IngestionMetrics
  ) {
    super(config, metrics);
  }

  requestCost(kind: DataKind, query: ProviderQuery): number {
    if (kind === DataKind.VESSEL_POSITION) return query.vesselIds.length > 0 ? 1 : 0;
    if (kind === DataKind.PORT_CONGESTION) return query.ports.length > 0 ? 1 : 0;
    return 0;
  }

  async fetch(
    credential: ProviderCredential,
    kind: DataKind,
    query: ProviderQuery,
    signal?: AbortSignal
  ): Promise<RawRecord[]> {
    if (kind === DataKind.VESSEL_POSITION && query.vesselIds.length > 0) {
      return this.fetchPositions(credential, query.vesselIds, signal);
    }
    if (kind === DataKind.PORT_CONGESTION && query.ports.length > 0) {
      return this.fetchCongestion(credential, query.ports.map(p => p.portId), signal);
    }
    return [];
  }

  private async fetchPositions(
    credential: ProviderCredential,
    vesselIds: readonly string[],
    signal?: AbortSignal
  ): Promise<RawRecord[]> {
    // MarineTraffic carries the key in the path
    const url = new URL(
      `${this.baseUrl}/exportvessels/v:8/${encodeURIComponent(credential.apiKey)}/protocol:jsono/mmsi:${vesselIds.join(',')}`
    );
    const items = this.toItems(await this.getJson({ url, signal }));
    const fetchedAt = new Date();

    return this.keepWellFormed(MarineTrafficPositionSchema, items).map((payload): RawRecord => ({
      providerId: 'marinetraffic',
      kind: DataKind.VESSEL_POSITION,
      fetchedAt,
      payload
    }));
  }

  private async fetchCongestion(
    credential: ProviderCredential,
    portIds: readonly string[],
    signal?: AbortSignal
  ): Promise<RawRecord[]> {
    const url = new URL(
      `${this.baseUrl}/portcongestion/v:1/${encodeURIComponent(credential.apiKey)}/protocol:jsono/unlocode:${portIds.join(',')}`
    );
    const items = this.toItems(await this.getJson({ url, signal }));
    const fetchedAt = new Date();

    return this.keepWellFormed(MarineTrafficCongestionSchema, items).map((payload): RawRecord => ({
      providerId: 'marinetraffic',
      kind: DataKind.PORT_CONGESTION,
      fetchedAt,
      payload
    }));
  }

  // Errors arrive with HTTP 200 as {"errors":[{"code": ...}]}
  private toItems(body: unknown): unknown[] {
    if (Array.isArray(body)) {
      return body;
    }

    const apiError = MarineTrafficErrorSchema.safeParse(body);
    if (apiError.success) {
      const { code, detail } = apiError.data.errors[0];
      if (AUTH_ERROR_CODES.includes(code.toUpperCase())) {
        throw new AuthRejectedError(this.providerId, undefined, code);
      }
      throw new MalformedResponseError(this.providerId, `API error ${code}${detail ? `: ${detail}` : ''}`);
    }

    throw new MalformedResponseError(this.providerId, 'Expected a JSON array of records');
  }
}
