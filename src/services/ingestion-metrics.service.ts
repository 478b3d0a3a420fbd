import { injectable } from 'tsyringe';
import { PROVIDER_IDS, ProviderId } from '../types/domain.types';
import { IngestionCounter, ProviderCounters } from '../types/result.types';

/**
 * Per-provider counters for records fetched and dropped. Process-lifetime,
 * read by cycle reports and operators.
 */
@injectable()
export class IngestionMetrics {
  private readonly counters = new Map<ProviderId, ProviderCounters>();

  increment(providerId: ProviderId, counter: IngestionCounter, by = 1): void {
    const current = this.counters.get(providerId) ?? emptyCounters();
    current[counter] += by;
    this.counters.set(providerId, current);
  }

  get(providerId: ProviderId): ProviderCounters {
    return { ...(this.counters.get(providerId) ?? emptyCounters()) };
  }

  snapshot(): Record<ProviderId, ProviderCounters> {
    return {
      marinetraffic: this.get('marinetraffic'),
      marinesia: this.get('marinesia'),
      unctad: this.get('unctad'),
      stormglass: this.get('stormglass'),
      noaa: this.get('noaa')
    };
  }

  total(counter: IngestionCounter): number {
    return PROVIDER_IDS.reduce((sum, id) => sum + this.get(id)[counter], 0);
  }
}

function emptyCounters(): ProviderCounters {
  return { fetched: 0, malformed: 0, unrepresentable: 0, fetchFailures: 0 };
}
