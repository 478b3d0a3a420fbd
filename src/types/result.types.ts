// Result types for component responses

import {
  NotificationEvent,
  PortCongestionSnapshot,
  ProviderId,
  VesselPosition,
  WeatherObservation,
  DataKind
} from './domain.types';

/**
 * Represents the outcome of an operation that may succeed or fail.
 * Discriminated union prevents invalid states.
 */
export type Result<T> =
  | { readonly success: true; readonly data: T; readonly message: string }        // Success with data
  | { readonly success: true; readonly message: string }                          // Success without data (not found)
  | { readonly success: false; readonly message: string };                        // Failure

export enum NormalizeStatus {
  NORMALIZED = 'NORMALIZED',
  UNREPRESENTABLE = 'UNREPRESENTABLE'
}

export type NormalizedRecord =
  | { readonly kind: DataKind.VESSEL_POSITION; readonly position: VesselPosition }
  | { readonly kind: DataKind.PORT_CONGESTION; readonly snapshot: PortCongestionSnapshot }
  | { readonly kind: DataKind.WEATHER; readonly observation: WeatherObservation };

export type NormalizeResult =
  | { readonly status: NormalizeStatus.NORMALIZED; readonly record: NormalizedRecord }
  | { readonly status: NormalizeStatus.UNREPRESENTABLE; readonly reason: string };

export enum FetchOutcomeStatus {
  SUCCESS = 'SUCCESS',
  SKIPPED = 'SKIPPED',
  FAILED = 'FAILED'
}

export interface ProviderFetchSummary {
  providerId: ProviderId;
  kind: DataKind;
  status: FetchOutcomeStatus;
  attempts: number;
  records: number;
  reason?: string;
}

export enum DispatchStatus {
  DELIVERED = 'DELIVERED',
  UNDELIVERED = 'UNDELIVERED',
  DUPLICATE = 'DUPLICATE'
}

export interface DispatchRecord {
  readonly event: NotificationEvent;
  readonly status: DispatchStatus;
  readonly attempts: number;
  readonly error?: string;
  readonly recordedAt: Date;
}

export enum CycleStatus {
  COMPLETED = 'COMPLETED',
  DEGRADED = 'DEGRADED',
  FAILED = 'FAILED'
}

export type IngestionCounter = 'fetched' | 'malformed' | 'unrepresentable' | 'fetchFailures';

export type ProviderCounters = Record<IngestionCounter, number>;

export interface CycleReport {
  cycleId: number;
  status: CycleStatus;
  startedAt: Date;
  finishedAt: Date;
  providers: ProviderFetchSummary[];
  failedKinds: DataKind[];
  counts: {
    rawRecords: number;
    unrepresentable: number;
    vesselsUpdated: number;
    portsUpdated: number;
    weatherUpdated: number;
    staleDiscarded: number;
    notifications: number;
  };
  dispatched: DispatchRecord[];
  metrics?: Record<ProviderId, ProviderCounters>;
  error?: string;
}

// ============================================================================
// Type Guards - Shared utility functions for type narrowing
// ============================================================================

/**
 * Type guard to check if Result has data (success with data case).
 */
export function isSuccess<T>(result: Result<T>): result is { readonly success: true; readonly data: T; readonly message: string } {
  return result.success && 'data' in result;
}

/**
 * Type guard to check if Result is not found (success without data case).
 */
export function isNotFound<T>(result: Result<T>): result is { readonly success: true; readonly message: string } {
  return result.success && !('data' in result);
}
