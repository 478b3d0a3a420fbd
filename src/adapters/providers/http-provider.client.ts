import { z } from 'zod';
import { AppConfig } from '../../config/app.config';
import { IngestionMetrics } from '../../services/ingestion-metrics.service';
import { ProviderId, TrackedPort } from '../../types/domain.types';
import {
  AuthRejectedError,
  CancelledError,
  MalformedResponseError,
  ProviderUnavailableError,
  RateLimitedError,
  TimeoutError
} from '../../types/provider-errors.types';
import { createLogger, Logger } from '../../utils/logger.util';

export interface JsonRequest {
  url: URL;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Shared HTTP plumbing for provider clients: bounded timeouts, status code
 * mapping onto the provider error taxonomy and per-record validation.
 */
export abstract class HttpProviderClient {
  abstract readonly providerId: ProviderId;
  private cachedLogger?: Logger;

  protected constructor(
    protected readonly config: AppConfig,
    protected readonly metrics: IngestionMetrics
  ) {}

  protected get logger(): Logger {
    this.cachedLogger ??= createLogger(`${this.providerId} client`);
    return this.cachedLogger;
  }

  protected async getJson(request: JsonRequest): Promise<unknown> {
    const timeoutMs = this.config.fetch.timeoutMs;
    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const signal = request.signal ? AbortSignal.any([timeoutSignal, request.signal]) : timeoutSignal;

    let response: Response;
    try {
      response = await fetch(request.url.toString(), {
        headers: { Accept: 'application/json', ...request.headers },
        signal
      });
    } catch (error) {
      if (request.signal?.aborted) {
        throw new CancelledError(this.providerId);
      }
      if (timeoutSignal.aborted) {
        throw new TimeoutError(this.providerId, timeoutMs);
      }
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new ProviderUnavailableError(this.providerId, `Network error: ${errorMessage}`);
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthRejectedError(this.providerId, response.status);
    }

    if (response.status === 429) {
      const retryAfter = Number(response.headers.get('retry-after'));
      throw new RateLimitedError(this.providerId, Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : undefined);
    }

    if (!response.ok) {
      throw new ProviderUnavailableError(
        this.providerId,
        `HTTP ${response.status}: ${response.statusText}`,
        response.status
      );
    }

    try {
      return await response.json();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new MalformedResponseError(this.providerId, `Body is not JSON (${errorMessage})`);
    }
  }

  /** Validates an envelope; a broken envelope fails the whole fetch. */
  protected parseEnvelope<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
    const validation = schema.safeParse(body);
    if (!validation.success) {
      throw new MalformedResponseError(this.providerId, describeIssues(validation.error));
    }
    return validation.data;
  }

  /** Validates records one by one, dropping and counting the malformed ones. */
  protected keepWellFormed<S extends z.ZodTypeAny>(schema: S, items: readonly unknown[]): z.infer<S>[] {
    const valid: z.infer<S>[] = [];
    for (const item of items) {
      const validation = schema.safeParse(item);
      if (validation.success) {
        valid.push(validation.data);
      } else {
        this.metrics.increment(this.providerId, 'malformed');
        this.logger.warn(`Skipping malformed record: ${describeIssues(validation.error)}`);
      }
    }
    this.metrics.increment(this.providerId, 'fetched', valid.length);
    return valid;
  }

  /**
   * Issues one request per port. A port whose response is malformed is skipped
   * and counted; the fetch fails only when every port's response was malformed.
   */
  protected async perPort<P extends TrackedPort, T>(
    ports: readonly P[],
    request: (port: P) => Promise<T | undefined>
  ): Promise<Array<{ port: P; value: T }>> {
    const results: Array<{ port: P; value: T }> = [];
    let lastMalformed: MalformedResponseError | undefined;
    let malformedPorts = 0;

    for (const port of ports) {
      try {
        const value = await request(port);
        if (value !== undefined) {
          results.push({ port, value });
        }
      } catch (error) {
        if (!(error instanceof MalformedResponseError)) {
          throw error;
        }
        lastMalformed = error;
        malformedPorts += 1;
        this.metrics.increment(this.providerId, 'malformed');
        this.logger.warn(`Skipping ${port.portId}: ${error.message}`);
      }
    }

    if (lastMalformed && malformedPorts === ports.length) {
      throw lastMalformed;
    }
    return results;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join(', ');
}
