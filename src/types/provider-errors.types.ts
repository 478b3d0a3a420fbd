// Error taxonomy for provider calls. Every fetch failure carries a kind so the
// orchestration can decide between retry, skip and escalation without string matching.

import { DataKind, ProviderId } from './domain.types';

export enum ProviderErrorKind {
  TIMEOUT = 'TIMEOUT',
  AUTH_REJECTED = 'AUTH_REJECTED',
  RATE_LIMITED = 'RATE_LIMITED',
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
  CANCELLED = 'CANCELLED'
}

export class ProviderFetchError extends Error {
  constructor(
    public readonly kind: ProviderErrorKind,
    public readonly providerId: ProviderId,
    message: string,
    public readonly statusCode?: number
  ) {
    super(`[${providerId}] ${message}`);
    this.name = 'ProviderFetchError';
  }
}

export class TimeoutError extends ProviderFetchError {
  constructor(providerId: ProviderId, timeoutMs: number) {
    super(ProviderErrorKind.TIMEOUT, providerId, `Request timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class AuthRejectedError extends ProviderFetchError {
  constructor(providerId: ProviderId, statusCode?: number, detail?: string) {
    super(ProviderErrorKind.AUTH_REJECTED, providerId, `Credential rejected${detail ? `: ${detail}` : ''}`, statusCode);
    this.name = 'AuthRejectedError';
  }
}

export class RateLimitedError extends ProviderFetchError {
  constructor(providerId: ProviderId, public readonly retryAfterSeconds?: number) {
    super(ProviderErrorKind.RATE_LIMITED, providerId, 'Rate limited by provider', 429);
    this.name = 'RateLimitedError';
  }
}

export class MalformedResponseError extends ProviderFetchError {
  constructor(providerId: ProviderId, detail: string) {
    super(ProviderErrorKind.MALFORMED_RESPONSE, providerId, `Malformed response: ${detail}`);
    this.name = 'MalformedResponseError';
  }
}

export class ProviderUnavailableError extends ProviderFetchError {
  constructor(providerId: ProviderId, detail: string, statusCode?: number) {
    super(ProviderErrorKind.PROVIDER_UNAVAILABLE, providerId, detail, statusCode);
    this.name = 'ProviderUnavailableError';
  }
}

export class CancelledError extends ProviderFetchError {
  constructor(providerId: ProviderId) {
    super(ProviderErrorKind.CANCELLED, providerId, 'Request cancelled by shutdown');
    this.name = 'CancelledError';
  }
}

/** Raised by the fetch orchestration when the vault refuses a credential. */
export class CredentialUnavailableError extends Error {
  constructor(public readonly providerId: ProviderId, public readonly reason: string) {
    super(`[${providerId}] Credential unavailable: ${reason}`);
    this.name = 'CredentialUnavailableError';
  }
}

export class AllProvidersFailedError extends Error {
  constructor(public readonly kind: DataKind, public readonly providerIds: ProviderId[]) {
    super(`All providers failed for ${kind}: ${providerIds.join(', ')}`);
    this.name = 'AllProvidersFailedError';
  }
}

export function isRetryableProviderError(error: Error): boolean {
  return error instanceof ProviderFetchError
    && (error.kind === ProviderErrorKind.TIMEOUT || error.kind === ProviderErrorKind.RATE_LIMITED);
}
