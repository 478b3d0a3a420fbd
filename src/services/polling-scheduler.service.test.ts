import 'reflect-metadata';
import { IOperationalAlerter } from '../adapters/alerting/operational-alerter.interface';
import { INotificationDelivery } from '../adapters/delivery/notification-delivery.interface';
import { IProviderClient } from '../adapters/providers/provider-client.interface';
import { AppConfig } from '../config/app.config';
import { DataKind, NotificationKind } from '../types/domain.types';
import { CancelledError, ProviderUnavailableError } from '../types/provider-errors.types';
import { RawRecord } from '../types/raw-record.types';
import { CycleStatus, DispatchStatus, FetchOutcomeStatus, isSuccess } from '../types/result.types';
import { FakeClock } from '../test-support/fake-clock';
import { fakeProviderClient } from '../test-support/fake-provider';
import { buildTestConfig } from '../test-support/test-config';
import { CongestionEvaluator } from './congestion-evaluator.service';
import { CredentialVault } from './credential-vault.service';
import { IngestionMetrics } from './ingestion-metrics.service';
import { NormalizerService } from './normalizer.service';
import { NotificationDispatcher } from './notification-dispatcher.service';
import { NotificationOutbox } from './notification-outbox.service';
import { CyclePhase } from './polling-scheduler.interface';
import { PollingScheduler } from './polling-scheduler.service';
import { ProviderFetchService } from './provider-fetch.service';
import { ReconcilerService } from './reconciler.service';
import { InMemoryStateStore } from './state-store.service';

const fetchedAt = new Date('2026-03-01T12:00:00Z');

function vesselRecord(timestamp: string, latitude = 51.9): RawRecord {
  return {
    providerId: 'marinetraffic',
    kind: DataKind.VESSEL_POSITION,
    fetchedAt,
    payload: { MMSI: '244660000', LAT: latitude, LON: 4.1, SPEED: 50, TIMESTAMP: timestamp, DSRC: 'TER' }
  };
}

function portRecord(vesselsAtAnchor: number, observedAt: string): RawRecord {
  return {
    providerId: 'unctad',
    kind: DataKind.PORT_CONGESTION,
    fetchedAt,
    payload: { locode: 'NLRTM', vesselsAtAnchor, meanWaitingDays: 0.5, observedAt }
  };
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('PollingScheduler', () => {
  let config: AppConfig;
  let clock: FakeClock;
  let store: InMemoryStateStore;
  let alerter: jest.Mocked<IOperationalAlerter>;
  let delivery: jest.Mocked<INotificationDelivery>;

  beforeEach(() => {
    config = buildTestConfig({ scheduler: { shutdownTimeoutMs: 50 } });
    clock = new FakeClock('2026-03-01T12:00:30Z');
    store = new InMemoryStateStore();
    alerter = { raise: jest.fn() };
    delivery = { deliver: jest.fn().mockResolvedValue(undefined) };
  });

  function createScheduler(clients: IProviderClient[]): PollingScheduler {
    const metrics = new IngestionMetrics();
    const vault = new CredentialVault(config, clock);
    return new PollingScheduler(
      clients,
      new ProviderFetchService(vault, alerter, metrics, config, clock),
      new NormalizerService(metrics),
      new ReconcilerService(config),
      store,
      new CongestionEvaluator(),
      new NotificationDispatcher(delivery, new NotificationOutbox(), config, clock),
      alerter,
      metrics,
      config,
      clock
    );
  }

  describe('trigger', () => {
    it('should complete a degraded cycle when one of three providers fails', async () => {
      // Arrange: marinetraffic and unctad answer, marinesia is down
      const marinetraffic = fakeProviderClient('marinetraffic', [DataKind.VESSEL_POSITION]);
      marinetraffic.fetch.mockResolvedValue([vesselRecord('2026-03-01T11:58:00Z')]);
      const marinesia = fakeProviderClient('marinesia', [DataKind.VESSEL_POSITION]);
      marinesia.fetch.mockRejectedValue(new ProviderUnavailableError('marinesia', 'HTTP 503: Service Unavailable', 503));
      const unctad = fakeProviderClient('unctad', [DataKind.PORT_CONGESTION]);
      unctad.fetch.mockResolvedValue([portRecord(80, '2026-03-01T11:00:00Z')]);

      // Act
      const result = await createScheduler([marinetraffic, marinesia, unctad]).trigger();

      // Assert
      expect(result.status).toBe('COMPLETED');
      if (result.status !== 'COMPLETED') return;
      const { report } = result;
      expect(report.status).toBe(CycleStatus.DEGRADED);
      expect(report.failedKinds).toEqual([]);
      expect(report.providers.map(p => [p.providerId, p.status])).toEqual([
        ['marinetraffic', FetchOutcomeStatus.SUCCESS],
        ['marinesia', FetchOutcomeStatus.FAILED],
        ['unctad', FetchOutcomeStatus.SUCCESS]
      ]);
      expect(report.counts).toEqual({
        rawRecords: 2,
        unrepresentable: 0,
        vesselsUpdated: 1,
        portsUpdated: 1,
        weatherUpdated: 0,
        staleDiscarded: 0,
        notifications: 1
      });
      expect(report.dispatched.map(d => [d.event.kind, d.status])).toEqual([
        [NotificationKind.CONGESTION_THRESHOLD_EXCEEDED, DispatchStatus.DELIVERED]
      ]);
      expect(report.metrics?.marinesia.fetchFailures).toBe(1);

      const vessel = store.getVessel('244660000');
      expect(isSuccess(vessel) && vessel.data.updatedAt).toEqual(new Date('2026-03-01T12:00:30Z'));
      const alertState = store.getAlertState('NLRTM');
      expect(isSuccess(alertState) && alertState.data.breached).toBe(true);
    });

    it('should report COMPLETED when every provider answers', async () => {
      const marinetraffic = fakeProviderClient('marinetraffic', [DataKind.VESSEL_POSITION]);
      marinetraffic.fetch.mockResolvedValue([vesselRecord('2026-03-01T11:58:00Z')]);

      const result = await createScheduler([marinetraffic]).trigger();

      expect(result.status === 'COMPLETED' && result.report.status).toBe(CycleStatus.COMPLETED);
    });

    it('should fail the cycle and alert operators when every provider keeps failing', async () => {
      const marinetraffic = fakeProviderClient('marinetraffic', [DataKind.VESSEL_POSITION]);
      marinetraffic.fetch.mockRejectedValue(new ProviderUnavailableError('marinetraffic', 'HTTP 500: Error', 500));
      const scheduler = createScheduler([marinetraffic]);

      const first = await scheduler.trigger();
      expect(first.status === 'COMPLETED' && first.report.status).toBe(CycleStatus.FAILED);
      expect(first.status === 'COMPLETED' && first.report.failedKinds).toEqual([DataKind.VESSEL_POSITION]);
      expect(alerter.raise).not.toHaveBeenCalled();

      await scheduler.trigger();
      expect(alerter.raise).toHaveBeenCalledWith({
        type: 'all-providers-failed',
        kind: DataKind.VESSEL_POSITION,
        providerIds: ['marinetraffic'],
        consecutiveCycles: 2,
        at: new Date('2026-03-01T12:00:30Z')
      });
      expect(store.generation).toBe(0);
    });

    it('should discard stale reports on a later cycle', async () => {
      const marinetraffic = fakeProviderClient('marinetraffic', [DataKind.VESSEL_POSITION]);
      marinetraffic.fetch
        .mockResolvedValueOnce([vesselRecord('2026-03-01T11:58:00Z', 51.9)])
        .mockResolvedValueOnce([vesselRecord('2026-03-01T11:50:00Z', 50.0)]);
      const scheduler = createScheduler([marinetraffic]);

      await scheduler.trigger();
      const second = await scheduler.trigger();

      expect(second.status === 'COMPLETED' && second.report.counts.staleDiscarded).toBe(1);
      const vessel = store.getVessel('244660000');
      expect(isSuccess(vessel) && vessel.data.latitude).toBe(51.9);
    });

    it('should fire a congestion event only on the crossing cycle', async () => {
      const unctad = fakeProviderClient('unctad', [DataKind.PORT_CONGESTION]);
      unctad.fetch
        .mockResolvedValueOnce([portRecord(70, '2026-03-01T08:00:00Z')])
        .mockResolvedValueOnce([portRecord(80, '2026-03-01T09:00:00Z')])
        .mockResolvedValueOnce([portRecord(80, '2026-03-01T10:00:00Z')])
        .mockResolvedValueOnce([portRecord(70, '2026-03-01T11:00:00Z')]);
      const scheduler = createScheduler([unctad]);

      const notifications: number[] = [];
      for (let cycle = 0; cycle < 4; cycle++) {
        const result = await scheduler.trigger();
        notifications.push(result.status === 'COMPLETED' ? result.report.counts.notifications : -1);
      }

      expect(notifications).toEqual([0, 1, 0, 1]);
      expect(delivery.deliver).toHaveBeenCalledTimes(2);
    });

    it('should drop a trigger that arrives while a cycle is running', async () => {
      const gate = deferred<RawRecord[]>();
      const marinetraffic = fakeProviderClient('marinetraffic', [DataKind.VESSEL_POSITION]);
      marinetraffic.fetch.mockReturnValue(gate.promise);
      const scheduler = createScheduler([marinetraffic]);

      const running = scheduler.trigger();
      const overlapping = await scheduler.trigger();

      expect(overlapping).toEqual({ status: 'DROPPED', reason: 'cycle-in-progress' });
      expect(scheduler.status().phase).toBe(CyclePhase.FETCHING);

      gate.resolve([vesselRecord('2026-03-01T11:58:00Z')]);
      const completed = await running;

      expect(completed.status).toBe('COMPLETED');
      expect(marinetraffic.fetch).toHaveBeenCalledTimes(1);
      expect(scheduler.status()).toMatchObject({ phase: CyclePhase.IDLE, running: false, cyclesRun: 1, droppedTriggers: 1 });
    });

    it('should complete a no-op cycle when nothing is enabled', async () => {
      const result = await createScheduler([]).trigger();

      expect(result.status === 'COMPLETED' && result.report.status).toBe(CycleStatus.COMPLETED);
      expect(result.status === 'COMPLETED' && result.report.providers).toEqual([]);
    });
  });

  describe('start and stop', () => {
    it('should run a cycle on start and stop cleanly', async () => {
      const marinetraffic = fakeProviderClient('marinetraffic', [DataKind.VESSEL_POSITION]);
      const scheduler = createScheduler([marinetraffic]);

      scheduler.start();
      await scheduler.stop();

      expect(marinetraffic.fetch).toHaveBeenCalledTimes(1);
      expect(scheduler.status()).toMatchObject({ shuttingDown: true, cyclesRun: 1 });
    });

    it('should cancel in-flight fetches and refuse new triggers after stop', async () => {
      const marinetraffic = fakeProviderClient('marinetraffic', [DataKind.VESSEL_POSITION]);
      marinetraffic.fetch.mockImplementation((_credential, _kind, _query, signal) => new Promise<RawRecord[]>((_resolve, reject) => {
        if (signal?.aborted) {
          reject(new CancelledError('marinetraffic'));
          return;
        }
        signal?.addEventListener('abort', () => reject(new CancelledError('marinetraffic')));
      }));
      const scheduler = createScheduler([marinetraffic]);

      const running = scheduler.trigger();
      await scheduler.stop();
      const result = await running;

      expect(result.status === 'COMPLETED' && result.report.status).toBe(CycleStatus.FAILED);
      expect(await scheduler.trigger()).toEqual({ status: 'DROPPED', reason: 'shutting-down' });
    });

    it('should stop waiting for a stuck cycle after the shutdown timeout', async () => {
      const marinetraffic = fakeProviderClient('marinetraffic', [DataKind.VESSEL_POSITION]);
      marinetraffic.fetch.mockReturnValue(new Promise<RawRecord[]>(() => undefined));
      const scheduler = createScheduler([marinetraffic]);

      void scheduler.trigger();
      await scheduler.stop();

      expect(scheduler.status()).toMatchObject({ shuttingDown: true, running: true });
    });

    it('should neither commit nor dispatch once the shutdown timeout has elapsed', async () => {
      // Arrange: a provider that ignores cancellation and answers only after stop() returned
      const gate = deferred<RawRecord[]>();
      const unctad = fakeProviderClient('unctad', [DataKind.PORT_CONGESTION]);
      unctad.fetch.mockReturnValue(gate.promise);
      const scheduler = createScheduler([unctad]);

      // Act
      const running = scheduler.trigger();
      await scheduler.stop();
      gate.resolve([portRecord(80, '2026-03-01T11:00:00Z')]);
      const result = await running;

      // Assert
      expect(result.status === 'COMPLETED' && result.report.status).toBe(CycleStatus.FAILED);
      expect(result.status === 'COMPLETED' && result.report.error).toBe('Cycle abandoned: shutdown timeout elapsed');
      expect(store.generation).toBe(0);
      expect(delivery.deliver).not.toHaveBeenCalled();
    });
  });
});
