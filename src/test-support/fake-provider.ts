import { IProviderClient, ProviderQuery } from '../adapters/providers/provider-client.interface';
import { DataKind, ProviderId } from '../types/domain.types';

export type FakeProviderClient = jest.Mocked<IProviderClient>;

export function fakeProviderClient(providerId: ProviderId, capabilities: DataKind[]): FakeProviderClient {
  return {
    providerId,
    capabilities,
    requestCost: jest.fn((kind: DataKind, _query: ProviderQuery) => (capabilities.includes(kind) ? 1 : 0)),
    fetch: jest.fn().mockResolvedValue([])
  };
}
