import { ProviderCredential } from '../services/credential-vault.interface';
import { ProviderId } from '../types/domain.types';

export interface FakeResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: Headers;
  json: () => Promise<unknown>;
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): FakeResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: new Headers(headers),
    json: async () => body
  };
}

export function textResponse(text: string): FakeResponse {
  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    headers: new Headers(),
    json: async () => JSON.parse(text)
  };
}

export function testCredential(providerId: ProviderId, apiKey = 'test-key'): ProviderCredential {
  return {
    providerId,
    apiKey,
    quotaLimit: 100,
    quotaRemaining: 100,
    quotaResetAt: new Date('2026-03-01T13:00:00Z'),
    consecutiveFailures: 0,
    invalid: false
  };
}

/** Stand-in for fetch that only settles once its signal aborts. */
export function hangingFetch(_url: string, init?: { signal?: AbortSignal }): Promise<never> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) {
      return;
    }
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason));
  });
}
