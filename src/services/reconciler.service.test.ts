import 'reflect-metadata';
import { PortCongestionSnapshot, ProviderId, VesselPosition, WeatherObservation } from '../types/domain.types';
import { buildTestConfig } from '../test-support/test-config';
import { ReconcilerService } from './reconciler.service';

function position(source: ProviderId, at: string, confidence: number, latitude = 51.9): VesselPosition {
  return {
    vesselId: '244660000',
    latitude,
    longitude: 4.1,
    timestamp: new Date(at),
    source,
    confidence
  };
}

function snapshot(source: ProviderId, vesselsWaiting: number, averageWaitHours: number, at: string): PortCongestionSnapshot {
  return {
    portId: 'NLRTM',
    vesselsWaiting,
    averageWaitHours,
    timestamp: new Date(at),
    source,
    contributingSources: [source]
  };
}

function observation(source: ProviderId, at: string, windSpeedMs: number): WeatherObservation {
  return { locationId: 'USLAX', latitude: 33.73, longitude: -118.26, windSpeedMs, timestamp: new Date(at), source };
}

describe('ReconcilerService', () => {
  let reconciler: ReconcilerService;

  beforeEach(() => {
    reconciler = new ReconcilerService(buildTestConfig({ providerPriority: ['marinesia', 'marinetraffic', 'unctad', 'stormglass', 'noaa'] }));
  });

  describe('reconcileVessels', () => {
    it('should prefer the most recent report', () => {
      const older = position('marinetraffic', '2026-03-01T11:50:00Z', 0.9);
      const newer = position('marinesia', '2026-03-01T11:55:00Z', 0.6);

      expect(reconciler.reconcileVessels([older, newer])).toEqual([newer]);
    });

    it('should break timestamp ties by confidence', () => {
      const a = position('marinesia', '2026-03-01T11:55:00Z', 0.6, 51.1);
      const b = position('marinetraffic', '2026-03-01T11:55:00Z', 0.9, 51.2);

      expect(reconciler.reconcileVessels([a, b])).toEqual([b]);
      expect(reconciler.reconcileVessels([b, a])).toEqual([b]);
    });

    it('should break full ties by provider priority regardless of arrival order', () => {
      const a = position('marinetraffic', '2026-03-01T11:55:00Z', 0.9, 51.1);
      const b = position('marinesia', '2026-03-01T11:55:00Z', 0.9, 51.2);

      expect(reconciler.reconcileVessels([a, b])).toEqual([b]);
      expect(reconciler.reconcileVessels([b, a])).toEqual([b]);
    });
  });

  describe('reconcilePorts', () => {
    it('should pass a single provider snapshot through unchanged', () => {
      const only = snapshot('unctad', 80, 12, '2026-03-01T11:00:00Z');

      expect(reconciler.reconcilePorts([only])).toEqual([only]);
    });

    it('should average reports from several providers', () => {
      const reconciled = reconciler.reconcilePorts([
        snapshot('unctad', 80, 12, '2026-03-01T11:00:00Z'),
        snapshot('marinetraffic', 71, 10.5, '2026-03-01T11:30:00Z')
      ]);

      expect(reconciled).toEqual([{
        portId: 'NLRTM',
        vesselsWaiting: 75.5,
        averageWaitHours: 11.25,
        timestamp: new Date('2026-03-01T11:30:00Z'),
        source: 'reconciled',
        contributingSources: ['marinetraffic', 'unctad']
      }]);
    });

    it('should use only the latest report from a provider that reports twice', () => {
      const reconciled = reconciler.reconcilePorts([
        snapshot('unctad', 60, 8, '2026-03-01T10:00:00Z'),
        snapshot('unctad', 80, 12, '2026-03-01T11:00:00Z')
      ]);

      expect(reconciled).toHaveLength(1);
      expect(reconciled[0].vesselsWaiting).toBe(80);
    });
  });

  describe('reconcileWeather', () => {
    it('should prefer the most recent observation, then provider priority', () => {
      const stormglass = observation('stormglass', '2026-03-01T12:00:00Z', 7.3);
      const noaa = observation('noaa', '2026-03-01T12:00:00Z', 5.1);
      const older = observation('stormglass', '2026-03-01T11:00:00Z', 9.9);

      expect(reconciler.reconcileWeather([older, noaa, stormglass])).toEqual([stormglass]);
    });
  });
});
