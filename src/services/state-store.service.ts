import { injectable } from 'tsyringe';
import {
  CanonicalVesselState,
  CongestionAlertState,
  PortCongestionSnapshot,
  WeatherObservation
} from '../types/domain.types';
import { Result } from '../types/result.types';
import { IStateStore, IStateTransaction, StateCommitSummary } from './state-store.interface';

interface StateMaps {
  vessels: ReadonlyMap<string, CanonicalVesselState>;
  ports: ReadonlyMap<string, PortCongestionSnapshot>;
  weather: ReadonlyMap<string, WeatherObservation>;
  alerts: ReadonlyMap<string, CongestionAlertState>;
}

export class StaleTransactionError extends Error {
  constructor(baseGeneration: number, currentGeneration: number) {
    super(`Transaction opened at generation ${baseGeneration} cannot commit over generation ${currentGeneration}`);
    this.name = 'StaleTransactionError';
  }
}

/**
 * In-memory canonical state. Committed maps are never mutated: a commit builds
 * new maps and swaps them in with one assignment.
 */
@injectable()
export class InMemoryStateStore implements IStateStore {
  private state: StateMaps = {
    vessels: new Map(),
    ports: new Map(),
    weather: new Map(),
    alerts: new Map()
  };
  private currentGeneration = 0;

  get generation(): number {
    return this.currentGeneration;
  }

  begin(): IStateTransaction {
    return new StateTransaction(this, this.state, this.currentGeneration);
  }

  upsert(state: CanonicalVesselState): boolean {
    const tx = this.begin();
    const accepted = tx.upsertVessel(state);
    tx.commit();
    return accepted;
  }

  getVessel(vesselId: string): Result<CanonicalVesselState> {
    return lookup(this.state.vessels, vesselId, 'Vessel');
  }

  getPort(portId: string): Result<PortCongestionSnapshot> {
    return lookup(this.state.ports, portId, 'Port');
  }

  getWeather(locationId: string): Result<WeatherObservation> {
    return lookup(this.state.weather, locationId, 'Weather for location');
  }

  getAlertState(portId: string): Result<CongestionAlertState> {
    return lookup(this.state.alerts, portId, 'Alert state for port');
  }

  listVessels(): CanonicalVesselState[] {
    return [...this.state.vessels.values()];
  }

  listPorts(): PortCongestionSnapshot[] {
    return [...this.state.ports.values()];
  }

  listWeather(): WeatherObservation[] {
    return [...this.state.weather.values()];
  }

  /** @internal called by StateTransaction.commit */
  swap(base: number, next: StateMaps): number {
    if (base !== this.currentGeneration) {
      throw new StaleTransactionError(base, this.currentGeneration);
    }
    this.state = next;
    this.currentGeneration += 1;
    return this.currentGeneration;
  }
}

class StateTransaction implements IStateTransaction {
  private readonly vessels = new Map<string, CanonicalVesselState>();
  private readonly ports = new Map<string, PortCongestionSnapshot>();
  private readonly weather = new Map<string, WeatherObservation>();
  private readonly alerts = new Map<string, CongestionAlertState>();
  private committed = false;

  constructor(
    private readonly store: InMemoryStateStore,
    private readonly base: StateMaps,
    private readonly baseGeneration: number
  ) {}

  upsertVessel(state: CanonicalVesselState): boolean {
    this.assertOpen();
    return stage(this.vessels, this.base.vessels, state.vesselId, state);
  }

  upsertPort(snapshot: PortCongestionSnapshot): boolean {
    this.assertOpen();
    return stage(this.ports, this.base.ports, snapshot.portId, snapshot);
  }

  upsertWeather(observation: WeatherObservation): boolean {
    this.assertOpen();
    return stage(this.weather, this.base.weather, observation.locationId, observation);
  }

  getAlertState(portId: string): CongestionAlertState | undefined {
    return this.alerts.get(portId) ?? this.base.alerts.get(portId);
  }

  putAlertState(state: CongestionAlertState): void {
    this.assertOpen();
    this.alerts.set(state.portId, Object.freeze({ ...state }));
  }

  commit(): StateCommitSummary {
    this.assertOpen();
    this.committed = true;

    const generation = this.store.swap(this.baseGeneration, {
      vessels: merge(this.base.vessels, this.vessels),
      ports: merge(this.base.ports, this.ports),
      weather: merge(this.base.weather, this.weather),
      alerts: merge(this.base.alerts, this.alerts)
    });

    return {
      generation,
      vessels: this.vessels.size,
      ports: this.ports.size,
      weather: this.weather.size,
      alertStates: this.alerts.size
    };
  }

  private assertOpen(): void {
    if (this.committed) {
      throw new Error('Transaction already committed');
    }
  }
}

// Older reports are discarded; an equal timestamp replaces the stored record.
function stage<T extends { timestamp: Date }>(
  staged: Map<string, T>,
  committed: ReadonlyMap<string, T>,
  key: string,
  value: T
): boolean {
  const current = staged.get(key) ?? committed.get(key);
  if (current && value.timestamp < current.timestamp) {
    return false;
  }
  staged.set(key, Object.freeze({ ...value }));
  return true;
}

function merge<T>(base: ReadonlyMap<string, T>, staged: ReadonlyMap<string, T>): ReadonlyMap<string, T> {
  if (staged.size === 0) {
    return base;
  }
  const next = new Map(base);
  for (const [key, value] of staged) {
    next.set(key, value);
  }
  return next;
}

function lookup<T>(map: ReadonlyMap<string, T>, key: string, label: string): Result<T> {
  const value = map.get(key);
  if (value) {
    return { success: true, data: value, message: `${label} ${key} retrieved successfully` };
  }
  return { success: true, message: `${label} ${key} not found` };
}
