import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../config/app.config';
import {
  PortCongestionSnapshot,
  ProviderId,
  VesselPosition,
  WeatherObservation
} from '../types/domain.types';
import { roundTo } from './normalization/normalization.util';
import { IReconciler } from './reconciler.interface';

/**
 * Merges one cycle's normalized records into one authoritative record per
 * subject. Choices depend only on record contents and the configured provider
 * priority, so a retried cycle reconciles to the same result.
 */
@injectable()
export class ReconcilerService implements IReconciler {
  private readonly rank: Map<ProviderId, number>;

  constructor(@inject('AppConfig') config: AppConfig) {
    this.rank = new Map(config.providerPriority.map((id, index) => [id, index]));
  }

  /** Latest timestamp wins, then higher confidence, then provider priority. */
  reconcileVessels(positions: readonly VesselPosition[]): VesselPosition[] {
    const winners = new Map<string, VesselPosition>();
    for (const position of positions) {
      const current = winners.get(position.vesselId);
      if (!current || this.comparePositions(position, current) > 0) {
        winners.set(position.vesselId, position);
      }
    }
    return [...winners.values()];
  }

  /**
   * One provider: its snapshot stands. Several providers: their metrics are
   * averaged. A provider reporting the same port twice contributes its latest.
   */
  reconcilePorts(snapshots: readonly PortCongestionSnapshot[]): PortCongestionSnapshot[] {
    const byPort = new Map<string, Map<ProviderId, PortCongestionSnapshot>>();

    for (const snapshot of snapshots) {
      const provider = snapshot.contributingSources[0];
      if (!provider) continue;

      const perProvider = byPort.get(snapshot.portId) ?? new Map<ProviderId, PortCongestionSnapshot>();
      const existing = perProvider.get(provider);
      if (!existing || snapshot.timestamp > existing.timestamp) {
        perProvider.set(provider, snapshot);
      }
      byPort.set(snapshot.portId, perProvider);
    }

    const reconciled: PortCongestionSnapshot[] = [];
    for (const [portId, perProvider] of byPort) {
      const reports = this.sortByPriority([...perProvider.values()], s => s.contributingSources[0]);
      if (reports.length === 1) {
        reconciled.push(reports[0]);
        continue;
      }

      const count = reports.length;
      reconciled.push({
        portId,
        vesselsWaiting: roundTo(reports.reduce((sum, r) => sum + r.vesselsWaiting, 0) / count, 2),
        averageWaitHours: roundTo(reports.reduce((sum, r) => sum + r.averageWaitHours, 0) / count, 2),
        timestamp: new Date(Math.max(...reports.map(r => r.timestamp.getTime()))),
        source: 'reconciled',
        contributingSources: reports.flatMap(r => r.contributingSources)
      });
    }
    return reconciled;
  }

  /** Latest timestamp wins, then provider priority. */
  reconcileWeather(observations: readonly WeatherObservation[]): WeatherObservation[] {
    const winners = new Map<string, WeatherObservation>();
    for (const observation of observations) {
      const current = winners.get(observation.locationId);
      if (
        !current
        || observation.timestamp > current.timestamp
        || (observation.timestamp.getTime() === current.timestamp.getTime()
          && this.compareProviders(observation.source, current.source) > 0)
      ) {
        winners.set(observation.locationId, observation);
      }
    }
    return [...winners.values()];
  }

  /** Positive when `a` should replace `b`. */
  private comparePositions(a: VesselPosition, b: VesselPosition): number {
    const byTime = a.timestamp.getTime() - b.timestamp.getTime();
    if (byTime !== 0) return byTime;

    const byConfidence = a.confidence - b.confidence;
    if (byConfidence !== 0) return byConfidence;

    return this.compareProviders(a.source, b.source);
  }

  /** Positive when `a` outranks `b`. Unlisted providers rank last, by id. */
  private compareProviders(a: ProviderId, b: ProviderId): number {
    const rankA = this.rank.get(a) ?? Number.MAX_SAFE_INTEGER;
    const rankB = this.rank.get(b) ?? Number.MAX_SAFE_INTEGER;
    if (rankA !== rankB) return rankB - rankA;
    return b.localeCompare(a);
  }

  private sortByPriority<T>(items: T[], providerOf: (item: T) => ProviderId | undefined): T[] {
    return [...items].sort((x, y) => {
      const px = providerOf(x);
      const py = providerOf(y);
      if (!px || !py) return 0;
      return this.compareProviders(py, px);
    });
  }
}
