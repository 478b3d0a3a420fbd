import { IProviderClient, ProviderQuery } from '../adapters/providers/provider-client.interface';
import { DataKind } from '../types/domain.types';
import { RawRecord } from '../types/raw-record.types';
import { FetchOutcomeStatus } from '../types/result.types';

export type ProviderFetchOutcome =
  | { readonly status: FetchOutcomeStatus.SUCCESS; readonly records: RawRecord[]; readonly attempts: number }
  | { readonly status: FetchOutcomeStatus.SKIPPED; readonly reason: string; readonly attempts: number }
  | { readonly status: FetchOutcomeStatus.FAILED; readonly error: Error; readonly attempts: number };

export interface IProviderFetchService {
  fetch(client: IProviderClient, kind: DataKind, query: ProviderQuery, signal?: AbortSignal): Promise<ProviderFetchOutcome>;
}
