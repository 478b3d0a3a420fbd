import { DataKind, ProviderId, TrackedPort } from '../../types/domain.types';
import { RawRecord } from '../../types/raw-record.types';
import { ProviderCredential } from '../../services/credential-vault.interface';

export interface ProviderQuery {
  readonly vesselIds: readonly string[];
  readonly ports: readonly TrackedPort[];
}

/**
 * Client for one external data provider. Each client declares the data kinds
 * it can serve; the scheduler only asks for those.
 */
export interface IProviderClient {
  readonly providerId: ProviderId;
  readonly capabilities: readonly DataKind[];

  /** Quota tokens one `fetch` of this kind will spend (one per HTTP request). */
  requestCost(kind: DataKind, query: ProviderQuery): number;

  /**
   * Fetches raw records. Individually malformed records are dropped and
   * counted; provider-level failures reject with a ProviderFetchError.
   */
  fetch(
    credential: ProviderCredential,
    kind: DataKind,
    query: ProviderQuery,
    signal?: AbortSignal
  ): Promise<RawRecord[]>;
}
