import { inject, injectable } from 'tsyringe';
import { IOperationalAlerter } from '../adapters/alerting/operational-alerter.interface';
import { IProviderClient, ProviderQuery } from '../adapters/providers/provider-client.interface';
import { AppConfig } from '../config/app.config';
import { DataKind, ProviderId } from '../types/domain.types';
import {
  AuthRejectedError,
  CancelledError,
  CredentialUnavailableError,
  isRetryableProviderError,
  ProviderFetchError,
  RateLimitedError
} from '../types/provider-errors.types';
import { FetchOutcomeStatus } from '../types/result.types';
import { Clock } from '../utils/clock.util';
import { createLogger } from '../utils/logger.util';
import { RetryAbortedError, retryWithBackoff, RetryExhaustedError } from '../utils/retry.util';
import { AcquireResult, AcquireStatus, ICredentialVault } from './credential-vault.interface';
import { IngestionMetrics } from './ingestion-metrics.service';
import { IProviderFetchService, ProviderFetchOutcome } from './provider-fetch.interface';

const logger = createLogger('ProviderFetch');

/**
 * Runs one provider fetch for one data kind: acquires quota before every
 * attempt, books the outcome, retries timeouts and rate limits once and
 * contains every failure in the returned outcome.
 */
@injectable()
export class ProviderFetchService implements IProviderFetchService {
  constructor(
    @inject('ICredentialVault') private readonly vault: ICredentialVault,
    @inject('IOperationalAlerter') private readonly alerter: IOperationalAlerter,
    @inject(IngestionMetrics) private readonly metrics: IngestionMetrics,
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('Clock') private readonly clock: Clock
  ) {}

  async fetch(
    client: IProviderClient,
    kind: DataKind,
    query: ProviderQuery,
    signal?: AbortSignal
  ): Promise<ProviderFetchOutcome> {
    const { providerId } = client;
    const cost = Math.max(1, client.requestCost(kind, query));
    let attempts = 0;

    try {
      const records = await retryWithBackoff(
        async () => {
          const grant = await this.vault.acquire(providerId, cost);
          if (grant.status !== AcquireStatus.GRANTED) {
            throw new CredentialUnavailableError(providerId, describeRefusal(grant));
          }

          attempts += 1;
          try {
            const fetched = await client.fetch(grant.credential, kind, query, signal);
            await this.vault.record(providerId, 'success', cost);
            return fetched;
          } catch (error) {
            await this.vault.record(providerId, 'failure', cost);
            throw error;
          }
        },
        this.config.fetch.retry,
        isRetryableProviderError,
        {
          signal,
          delayHint: retryAfterMs,
          onRetry: (error, attempt, delayMs) => logger.warn(
            `${providerId} ${kind} attempt failed (${error.message}); retry ${attempt} in ${Math.round(delayMs)}ms`
          )
        }
      );

      return { status: FetchOutcomeStatus.SUCCESS, records, attempts };
    } catch (error) {
      return this.handleFailure(client, kind, error, attempts);
    }
  }

  private async handleFailure(
    client: IProviderClient,
    kind: DataKind,
    error: unknown,
    attempts: number
  ): Promise<ProviderFetchOutcome> {
    const { providerId } = client;

    if (error instanceof CredentialUnavailableError && attempts === 0) {
      logger.info(`Skipping ${providerId} for ${kind}: ${error.reason}`);
      return { status: FetchOutcomeStatus.SKIPPED, reason: error.reason, attempts };
    }

    const failure = unwrap(providerId, error);
    this.metrics.increment(providerId, 'fetchFailures');

    if (failure instanceof AuthRejectedError) {
      await this.vault.markInvalid(providerId, failure.message);
      this.alerter.raise({
        type: 'auth-rejected',
        providerId,
        message: failure.message,
        at: this.clock.now()
      });
    }

    const detail = failure instanceof ProviderFetchError ? `${failure.kind}: ${failure.message}` : failure.message;
    logger.warn(`${providerId} skipped for ${kind} this cycle after ${attempts} attempt(s): ${detail}`);
    return { status: FetchOutcomeStatus.FAILED, error: failure, attempts };
  }
}

function unwrap(providerId: ProviderId, error: unknown): Error {
  if (error instanceof RetryAbortedError) {
    return new CancelledError(providerId);
  }
  const cause = error instanceof RetryExhaustedError ? error.lastError : error;
  return cause instanceof Error ? cause : new Error(String(cause));
}

function retryAfterMs(error: Error): number | undefined {
  if (error instanceof RateLimitedError && error.retryAfterSeconds !== undefined) {
    return error.retryAfterSeconds * 1000;
  }
  return undefined;
}

function describeRefusal(grant: Exclude<AcquireResult, { status: AcquireStatus.GRANTED }>): string {
  switch (grant.status) {
    case AcquireStatus.QUOTA_EXCEEDED:
      return `quota exceeded until ${grant.resetAt.toISOString()}`;
    case AcquireStatus.BACKING_OFF:
      return `degraded, backing off until ${grant.retryAt.toISOString()}`;
    case AcquireStatus.INVALID:
      return grant.message;
    case AcquireStatus.NOT_CONFIGURED:
      return 'no credential configured';
  }
}
