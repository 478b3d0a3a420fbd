import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../../config/app.config';
import { ProviderCredential } from '../../services/credential-vault.interface';
import { IngestionMetrics } from '../../services/ingestion-metrics.service';
import { DataKind, TrackedPort } from '../../types/domain.types';
import { MalformedResponseError } from '../../types/provider-errors.types';
import { NoaaWeatherRecord, RawRecord } from '../../types/raw-record.types';
import { HttpProviderClient } from './http-provider.client';
import { IProviderClient, ProviderQuery } from './provider-client.interface';
import { NoaaEnvelopeSchema, NoaaWindReadingSchema, NoaaWindReadingWire } from './wire.schemas';

@injectable()
export class NoaaProvider extends HttpProviderClient implements IProviderClient {
  readonly providerId = 'noaa' as const;
  readonly capabilities = [DataKind.WEATHER] as const;

  private readonly baseUrl = 'https://api.tidesandcurrents.noaa.gov/api/prod/datagetter';

  constructor(
    @inject('AppConfig') config: AppConfig,
    @inject(IngestionMetrics) metrics: IngestionMetrics
  ) {
    super(config, metrics);
  }

  requestCost(kind: DataKind, query: ProviderQuery): number {
    return kind === DataKind.WEATHER ? stationPorts(query).length : 0;
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

    const readings = await this.perPort(stationPorts(query), port => this.fetchLatestReading(credential, port, signal));
    return readings.map(({ port, value }): NoaaWeatherRecord => ({
      providerId: 'noaa',
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

  private async fetchLatestReading(
    credential: ProviderCredential,
    port: TrackedPort & { noaaStation: string },
    signal?: AbortSignal
  ): Promise<NoaaWindReadingWire | undefined> {
    const url = new URL(this.baseUrl);
    url.searchParams.set('station', port.noaaStation);
    url.searchParams.set('product', 'wind');
    url.searchParams.set('date', 'latest');
    url.searchParams.set('units', 'english');
    url.searchParams.set('time_zone', 'gmt');
    url.searchParams.set('format', 'json');
    url.searchParams.set('application', 'harbor-watch');

    const body = await this.getJson({ url, headers: { token: credential.apiKey }, signal });
    const envelope = this.parseEnvelope(NoaaEnvelopeSchema, body);

    if (envelope.error) {
      // CO-OPS reports an idle station as an error body
      if (/no data/i.test(envelope.error.message)) {
        this.logger.debug(`No wind data for station ${port.noaaStation} (${port.portId})`);
        return undefined;
      }
      throw new MalformedResponseError(this.providerId, envelope.error.message);
    }

    const readings = this.keepWellFormed(NoaaWindReadingSchema, envelope.data ?? []);
    return readings[readings.length - 1];
  }
}

function stationPorts(query: ProviderQuery): Array<TrackedPort & { noaaStation: string }> {
  const ports: Array<TrackedPort & { noaaStation: string }> = [];
  for (const port of query.ports) {
    if (port.noaaStation) {
      ports.push({ ...port, noaaStation: port.noaaStation });
    }
  }
  return ports;
}
