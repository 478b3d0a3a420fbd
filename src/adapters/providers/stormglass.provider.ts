import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../../config/app.config';
import { ProviderCredential } from '../../services/credential-vault.interface';
import { IngestionMetrics } from '../../services/ingestion-metrics.service';
import { DataKind, TrackedPort } from '../../types/domain.types';
import { RawRecord, StormGlassWeatherRecord } from '../../types/raw-record.types';
import { HttpProviderClient } from './http-provider.client';
import { IProviderClient, ProviderQuery } from './provider-client.interface';
import { StormGlassEnvelopeSchema, StormGlassHourSchema, StormGlassHourWire } from './wire.schemas';

@injectable()
export class StormGlassProvider extends HttpProviderClient implements IProviderClient {
  readonly providerId = 'stormglass' as const;
  readonly capabilities = [DataKind.WEATHER] as const;

  private readonly baseUrl = 'https://api.stormglass.io/v2/weather/point';

  constructor(
    @inject('AppConfig') config: AppConfig,
    @inject(IngestionMetrics) metrics: IngestionMetrics
  ) {
    super(config, metrics);
  }

  requestCost(kind: DataKind, query: ProviderQuery): number {
    return kind === DataKind.WEATHER ? query.ports.length : 0;
  }

  async fetch(
    credential: ProviderCredential,
    kind: DataKind,
    query: ProviderQuery,
    signal?: AbortSignal
  ): Promise<RawRecord[]> {
    if (kind !== DataKind.WEATHER) {
      return [];
    }

    const hours = await this.perPort(query.ports, port => this.fetchCurrentHour(credential, port, signal));
    return hours.map(({ port, value }): StormGlassWeatherRecord => ({
      providerId: 'stormglass',
      kind: DataKind.WEATHER,
      fetchedAt: new Date(),
      payload: {
        locationId: port.portId,
        latitude: port.latitude,
        longitude: port.longitude,
        reading: value
      }
    }));
  }

  private async fetchCurrentHour(
    credential: ProviderCredential,
    port: TrackedPort,
    signal?: AbortSignal
  ): Promise<StormGlassHourWire | undefined> {
    const now = new Date();
    const url = new URL(this.baseUrl);
    url.searchParams.set('lat', port.latitude.toString());
    url.searchParams.set('lng', port.longitude.toString());
    url.searchParams.set('params', 'windSpeed,waveHeight');
    url.searchParams.set('start', Math.floor(now.getTime() / 1000 - 3600).toString());
    url.searchParams.set('end', Math.floor(now.getTime() / 1000 + 3600).toString());

    const body = await this.getJson({ url, headers: { Authorization: credential.apiKey }, signal });
    const envelope = this.parseEnvelope(StormGlassEnvelopeSchema, body);
    const hours = this.keepWellFormed(StormGlassHourSchema, envelope.hours);

    return closestHour(hours, now);
  }
}

/** Picks the hour nearest to `target`; hours with unparseable times never win. */
export function closestHour(hours: StormGlassHourWire[], target: Date): StormGlassHourWire | undefined {
  let best: StormGlassHourWire | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const hour of hours) {
    const distance = Math.abs(Date.parse(hour.time) - target.getTime());
    if (distance < bestDistance) {
      best = hour;
      bestDistance = distance;
    }
  }
  return best;
}
