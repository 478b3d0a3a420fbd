import {
  CanonicalVesselState,
  CongestionAlertState,
  PortCongestionSnapshot,
  WeatherObservation
} from '../types/domain.types';
import { Result } from '../types/result.types';

/** Read access for the query layer. Readers only ever see committed cycles. */
export interface IStateReader {
  getVessel(vesselId: string): Result<CanonicalVesselState>;
  getPort(portId: string): Result<PortCongestionSnapshot>;
  getWeather(locationId: string): Result<WeatherObservation>;
  getAlertState(portId: string): Result<CongestionAlertState>;
  listVessels(): CanonicalVesselState[];
  listPorts(): PortCongestionSnapshot[];
  listWeather(): WeatherObservation[];
  readonly generation: number;
}

export interface StateCommitSummary {
  generation: number;
  vessels: number;
  ports: number;
  weather: number;
  alertStates: number;
}

/**
 * Staged writes for one cycle. Upserts apply the monotonic-timestamp rule
 * against committed and already-staged state and report whether they were kept.
 */
export interface IStateTransaction {
  upsertVessel(state: CanonicalVesselState): boolean;
  upsertPort(snapshot: PortCongestionSnapshot): boolean;
  upsertWeather(observation: WeatherObservation): boolean;
  getAlertState(portId: string): CongestionAlertState | undefined;
  putAlertState(state: CongestionAlertState): void;
  commit(): StateCommitSummary;
}

export interface IStateStore extends IStateReader {
  begin(): IStateTransaction;
  upsert(state: CanonicalVesselState): boolean;
}
