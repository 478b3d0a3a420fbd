import { DataKind, ProviderId } from '../../types/domain.types';

export type OperationalAlert =
  | { readonly type: 'auth-rejected'; readonly providerId: ProviderId; readonly message: string; readonly at: Date }
  | {
      readonly type: 'all-providers-failed';
      readonly kind: DataKind;
      readonly providerIds: ProviderId[];
      readonly consecutiveCycles: number;
      readonly at: Date;
    };

/**
 * Channel for failures that need a human (bad credentials, provider outages).
 * Separate from the domain notification path.
 */
export interface IOperationalAlerter {
  raise(alert: OperationalAlert): void;
}
