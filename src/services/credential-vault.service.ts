import { inject, injectable } from 'tsyringe';
import { AppConfig, ProviderSettings } from '../config/app.config';
import { PROVIDER_IDS, ProviderId } from '../types/domain.types';
import { Clock } from '../utils/clock.util';
import { KeyedMutex } from '../utils/keyed-mutex.util';
import { createLogger } from '../utils/logger.util';
import {
  AcquireResult,
  AcquireStatus,
  CallOutcome,
  ICredentialVault,
  ProviderCredential
} from './credential-vault.interface';

interface CredentialEntry {
  providerId: ProviderId;
  apiKey: string;
  quotaLimit: number;
  quotaWindowMs: number;
  quotaRemaining: number;
  // Tokens held by granted calls that have not been recorded yet.
  quotaReserved: number;
  quotaResetAt: Date;
  lastErrorAt?: Date;
  consecutiveFailures: number;
  degradedUntil?: Date;
  invalid: boolean;
}

const logger = createLogger('CredentialVault');

@injectable()
export class CredentialVault implements ICredentialVault {
  private readonly entries = new Map<ProviderId, CredentialEntry>();
  private readonly mutex = new KeyedMutex<ProviderId>();

  constructor(
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('Clock') private readonly clock: Clock
  ) {
    for (const providerId of PROVIDER_IDS) {
      const settings = config.providers[providerId];
      if (settings.apiKey) {
        this.entries.set(providerId, this.createEntry(providerId, settings.apiKey, settings));
      }
    }
  }

  async acquire(providerId: ProviderId, cost = 1): Promise<AcquireResult> {
    return this.mutex.runExclusive(providerId, (): AcquireResult => {
      const entry = this.entries.get(providerId);
      if (!entry) {
        return { status: AcquireStatus.NOT_CONFIGURED };
      }

      const now = this.clock.now();
      this.refill(entry, now);

      if (entry.invalid) {
        return {
          status: AcquireStatus.INVALID,
          message: `Credential for ${providerId} was rejected and awaits a configuration reload`
        };
      }

      if (entry.degradedUntil && now < entry.degradedUntil) {
        return { status: AcquireStatus.BACKING_OFF, retryAt: entry.degradedUntil };
      }

      if (available(entry) < cost) {
        return { status: AcquireStatus.QUOTA_EXCEEDED, resetAt: entry.quotaResetAt };
      }

      entry.quotaReserved += cost;
      return { status: AcquireStatus.GRANTED, credential: toCredential(entry) };
    });
  }

  async record(providerId: ProviderId, outcome: CallOutcome, quotaCost: number): Promise<void> {
    await this.mutex.runExclusive(providerId, () => {
      const entry = this.entries.get(providerId);
      if (!entry) {
        logger.warn(`Ignoring ${outcome} for unconfigured provider ${providerId}`);
        return;
      }

      const now = this.clock.now();
      this.refill(entry, now);
      const spent = Math.max(0, quotaCost);
      entry.quotaReserved = Math.max(0, entry.quotaReserved - spent);
      entry.quotaRemaining = Math.max(0, entry.quotaRemaining - spent);

      if (outcome === 'success') {
        if (entry.degradedUntil) {
          logger.info(`${providerId} recovered after ${entry.consecutiveFailures} consecutive failure(s)`);
        }
        entry.consecutiveFailures = 0;
        entry.degradedUntil = undefined;
        return;
      }

      entry.lastErrorAt = now;
      entry.consecutiveFailures += 1;

      const { afterFailures, backoffBaseMs, backoffMaxMs } = this.config.degradation;
      if (entry.consecutiveFailures >= afterFailures) {
        const exponent = entry.consecutiveFailures - afterFailures;
        const delay = Math.min(backoffBaseMs * Math.pow(2, exponent), backoffMaxMs);
        entry.degradedUntil = new Date(now.getTime() + delay);
        logger.warn(
          `${providerId} degraded after ${entry.consecutiveFailures} consecutive failures; backing off ${delay}ms`
        );
      }
    });
  }

  async markInvalid(providerId: ProviderId, reason: string): Promise<void> {
    await this.mutex.runExclusive(providerId, () => {
      const entry = this.entries.get(providerId);
      if (!entry) {
        return;
      }
      entry.invalid = true;
      entry.lastErrorAt = this.clock.now();
      logger.error(`Credential for ${providerId} marked invalid: ${reason}`);
    });
  }

  async reload(providers: Record<ProviderId, ProviderSettings>): Promise<void> {
    await Promise.all(PROVIDER_IDS.map(providerId =>
      this.mutex.runExclusive(providerId, () => {
        const settings = providers[providerId];
        const existing = this.entries.get(providerId);

        if (!settings.apiKey) {
          if (existing) {
            this.entries.delete(providerId);
            logger.info(`${providerId} disabled by configuration reload`);
          }
          return;
        }

        if (!existing) {
          this.entries.set(providerId, this.createEntry(providerId, settings.apiKey, settings));
          logger.info(`${providerId} enabled by configuration reload`);
          return;
        }

        // Quota bookkeeping survives a reload; a new key clears the rejection.
        if (existing.apiKey !== settings.apiKey) {
          existing.apiKey = settings.apiKey;
          existing.invalid = false;
          existing.consecutiveFailures = 0;
          existing.degradedUntil = undefined;
        }
        existing.quotaLimit = settings.quotaLimit;
        existing.quotaWindowMs = settings.quotaWindowMs;
        existing.quotaRemaining = Math.min(existing.quotaRemaining, settings.quotaLimit);
      })
    ));
  }

  snapshot(): ProviderCredential[] {
    return [...this.entries.values()].map(toCredential);
  }

  private createEntry(providerId: ProviderId, apiKey: string, settings: ProviderSettings): CredentialEntry {
    return {
      providerId,
      apiKey,
      quotaLimit: settings.quotaLimit,
      quotaWindowMs: settings.quotaWindowMs,
      quotaRemaining: settings.quotaLimit,
      quotaReserved: 0,
      quotaResetAt: new Date(this.clock.now().getTime() + settings.quotaWindowMs),
      consecutiveFailures: 0,
      invalid: false
    };
  }

  private refill(entry: CredentialEntry, now: Date): void {
    if (now < entry.quotaResetAt) {
      return;
    }
    entry.quotaRemaining = entry.quotaLimit;
    entry.quotaResetAt = new Date(now.getTime() + entry.quotaWindowMs);
  }
}

function toCredential(entry: CredentialEntry): ProviderCredential {
  return Object.freeze({
    providerId: entry.providerId,
    apiKey: entry.apiKey,
    quotaLimit: entry.quotaLimit,
    quotaRemaining: available(entry),
    quotaResetAt: entry.quotaResetAt,
    lastErrorAt: entry.lastErrorAt,
    consecutiveFailures: entry.consecutiveFailures,
    degradedUntil: entry.degradedUntil,
    invalid: entry.invalid
  });
}

function available(entry: CredentialEntry): number {
  return Math.max(0, entry.quotaRemaining - entry.quotaReserved);
}
