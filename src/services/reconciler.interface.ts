import { PortCongestionSnapshot, VesselPosition, WeatherObservation } from '../types/domain.types';

export interface IReconciler {
  reconcileVessels(positions: readonly VesselPosition[]): VesselPosition[];
  reconcilePorts(snapshots: readonly PortCongestionSnapshot[]): PortCongestionSnapshot[];
  reconcileWeather(observations: readonly WeatherObservation[]): WeatherObservation[];
}
