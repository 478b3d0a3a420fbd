// Domain types - canonical models isolated from provider wire formats

export enum DataKind {
  VESSEL_POSITION = 'vessel-position',
  PORT_CONGESTION = 'port-congestion',
  WEATHER = 'weather'
}

export const PROVIDER_IDS = ['marinetraffic', 'marinesia', 'unctad', 'stormglass', 'noaa'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export function isProviderId(value: string): value is ProviderId {
  return (PROVIDER_IDS as readonly string[]).includes(value);
}

export interface GeoLocation {
  latitude: number;
  longitude: number;
  name?: string;
}

export interface TrackedPort extends GeoLocation {
  portId: string;          // UN/LOCODE
  name: string;
  noaaStation?: string;    // CO-OPS station id, US ports only
}

export interface VesselPosition {
  vesselId: string;        // MMSI
  latitude: number;
  longitude: number;
  speedKnots?: number;
  headingDegrees?: number;
  timestamp: Date;
  source: ProviderId;
  confidence: number;      // 0-1
}

export interface CanonicalVesselState extends VesselPosition {
  updatedAt: Date;
}

export type SnapshotSource = ProviderId | 'reconciled';

export interface PortCongestionSnapshot {
  portId: string;
  vesselsWaiting: number;
  averageWaitHours: number;
  timestamp: Date;
  source: SnapshotSource;
  contributingSources: ProviderId[];
}

export interface WeatherObservation {
  locationId: string;      // port id the observation was requested for
  latitude: number;
  longitude: number;
  windSpeedMs?: number;
  waveHeightM?: number;
  timestamp: Date;
  source: ProviderId;
}

export type CongestionMetric = 'vessels-waiting' | 'average-wait-hours';

export const CONGESTION_METRICS: readonly CongestionMetric[] = ['vessels-waiting', 'average-wait-hours'];

export interface CongestionThreshold {
  metric: CongestionMetric;
  value: number;
}

/**
 * Prior-cycle memory for edge-triggered congestion alerts, kept per port
 * beside the port's canonical snapshot.
 */
export interface CongestionAlertState {
  portId: string;
  metric: CongestionMetric;
  breached: boolean;
  lastValue: number;
  changedAt: Date;
}

export enum NotificationKind {
  CONGESTION_THRESHOLD_EXCEEDED = 'congestion-threshold-exceeded',
  CONGESTION_RECOVERED = 'congestion-recovered'
}

export interface NotificationEvent {
  readonly id: string;
  readonly kind: NotificationKind;
  readonly subjectId: string;
  readonly metric: CongestionMetric;
  readonly observedValue: number;
  readonly threshold: number;
  readonly timestamp: Date;
}
