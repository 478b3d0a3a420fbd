import { ProviderSettings } from '../config/app.config';
import { ProviderId } from '../types/domain.types';

export interface ProviderCredential {
  readonly providerId: ProviderId;
  readonly apiKey: string;
  readonly quotaLimit: number;
  readonly quotaRemaining: number;
  readonly quotaResetAt: Date;
  readonly lastErrorAt?: Date;
  readonly consecutiveFailures: number;
  readonly degradedUntil?: Date;
  readonly invalid: boolean;
}

export enum AcquireStatus {
  GRANTED = 'GRANTED',
  QUOTA_EXCEEDED = 'QUOTA_EXCEEDED',
  BACKING_OFF = 'BACKING_OFF',
  INVALID = 'INVALID',
  NOT_CONFIGURED = 'NOT_CONFIGURED'
}

export type AcquireResult =
  | { readonly status: AcquireStatus.GRANTED; readonly credential: ProviderCredential }
  | { readonly status: AcquireStatus.QUOTA_EXCEEDED; readonly resetAt: Date }
  | { readonly status: AcquireStatus.BACKING_OFF; readonly retryAt: Date }
  | { readonly status: AcquireStatus.INVALID; readonly message: string }
  | { readonly status: AcquireStatus.NOT_CONFIGURED };

export type CallOutcome = 'success' | 'failure';

/**
 * Sole owner of provider credentials and their quota bookkeeping.
 * Mutations for one provider id are applied one at a time.
 */
export interface ICredentialVault {
  /**
   * Grants the credential when the provider is usable and has at least `cost`
   * quota tokens left, holding those tokens until the call is recorded.
   * Never waits for quota to refill.
   */
  acquire(providerId: ProviderId, cost?: number): Promise<AcquireResult>;

  /**
   * Books the outcome of one call, spending `quotaCost` tokens either way and
   * releasing the tokens `acquire` held for it.
   */
  record(providerId: ProviderId, outcome: CallOutcome, quotaCost: number): Promise<void>;

  markInvalid(providerId: ProviderId, reason: string): Promise<void>;

  reload(providers: Record<ProviderId, ProviderSettings>): Promise<void>;

  snapshot(): ProviderCredential[];
}
