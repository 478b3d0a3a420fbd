import { inject, injectable } from 'tsyringe';
import { IOperationalAlerter } from '../adapters/alerting/operational-alerter.interface';
import { IProviderClient, ProviderQuery } from '../adapters/providers/provider-client.interface';
import { AppConfig } from '../config/app.config';
import { DataKind, NotificationEvent, PortCongestionSnapshot, ProviderId } from '../types/domain.types';
import { AllProvidersFailedError } from '../types/provider-errors.types';
import { RawRecord } from '../types/raw-record.types';
import {
  CycleReport,
  CycleStatus,
  DispatchRecord,
  FetchOutcomeStatus,
  ProviderFetchSummary
} from '../types/result.types';
import { Clock } from '../utils/clock.util';
import { createLogger } from '../utils/logger.util';
import { ICongestionEvaluator } from './congestion-evaluator.interface';
import { IngestionMetrics } from './ingestion-metrics.service';
import { INormalizer } from './normalizer.interface';
import { INotificationDispatcher } from './notification-dispatcher.interface';
import {
  CyclePhase,
  IPollingScheduler,
  SchedulerStatus,
  TriggerResult
} from './polling-scheduler.interface';
import { IProviderFetchService, ProviderFetchOutcome } from './provider-fetch.interface';
import { IReconciler } from './reconciler.interface';
import { IStateStore } from './state-store.interface';

interface FetchJob {
  client: IProviderClient;
  kind: DataKind;
}

interface FetchResult extends FetchJob {
  outcome: ProviderFetchOutcome;
}

const ALL_KINDS = [DataKind.VESSEL_POSITION, DataKind.PORT_CONGESTION, DataKind.WEATHER];

const logger = createLogger('Scheduler');

/**
 * Drives polling cycles: fetch → normalize → reconcile → evaluate → dispatch.
 * At most one cycle runs at a time; a trigger that arrives while one is
 * running is dropped, never queued.
 */
@injectable()
export class PollingScheduler implements IPollingScheduler {
  private phase = CyclePhase.IDLE;
  private running: Promise<CycleReport> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private shuttingDown = false;
  // Aborted when stop() begins: cancels in-flight fetches.
  private readonly shutdownController = new AbortController();
  // Aborted when the shutdown timeout elapses: the running cycle ends without committing.
  private readonly abandonController = new AbortController();
  private cyclesRun = 0;
  private droppedTriggers = 0;
  private lastReport?: CycleReport;
  private readonly failedStreaks = new Map<DataKind, number>();

  constructor(
    @inject('ProviderClients') private readonly clients: IProviderClient[],
    @inject('IProviderFetchService') private readonly fetcher: IProviderFetchService,
    @inject('INormalizer') private readonly normalizer: INormalizer,
    @inject('IReconciler') private readonly reconciler: IReconciler,
    @inject('IStateStore') private readonly store: IStateStore,
    @inject('ICongestionEvaluator') private readonly evaluator: ICongestionEvaluator,
    @inject('INotificationDispatcher') private readonly dispatcher: INotificationDispatcher,
    @inject('IOperationalAlerter') private readonly alerter: IOperationalAlerter,
    @inject(IngestionMetrics) private readonly metrics: IngestionMetrics,
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('Clock') private readonly clock: Clock
  ) {}

  start(): void {
    if (this.timer || this.shuttingDown) {
      return;
    }
    const intervalMs = this.config.scheduler.pollIntervalMs;
    logger.info(
      `Starting with ${this.clients.length} provider(s) [${this.clients.map(c => c.providerId).join(', ')}], interval ${intervalMs}ms`
    );

    this.fire();
    this.timer = setInterval(() => this.fire(), intervalMs);
  }

  async trigger(): Promise<TriggerResult> {
    if (this.shuttingDown) {
      this.droppedTriggers += 1;
      logger.warn('Trigger dropped: scheduler is shutting down');
      return { status: 'DROPPED', reason: 'shutting-down' };
    }

    if (this.running) {
      this.droppedTriggers += 1;
      logger.warn(`Trigger dropped: cycle still in ${this.phase} phase`);
      return { status: 'DROPPED', reason: 'cycle-in-progress' };
    }

    this.running = this.runCycle();
    try {
      const report = await this.running;
      return { status: 'COMPLETED', report };
    } finally {
      this.running = null;
    }
  }

  async stop(): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.shutdownController.abort();

    const inFlight = this.running;
    if (!inFlight) {
      logger.info('Stopped');
      return;
    }

    const timeoutMs = this.config.scheduler.shutdownTimeoutMs;
    let timeoutHandle: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>(resolve => {
      timeoutHandle = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    const result = await Promise.race([inFlight.then(() => 'finished' as const), timedOut]);
    clearTimeout(timeoutHandle);

    if (result === 'timeout') {
      this.abandonController.abort();
      logger.warn(`Shutdown timeout of ${timeoutMs}ms elapsed; abandoning cycle in ${this.phase} phase`);
    } else {
      logger.info('Stopped after in-flight cycle finished');
    }
  }

  status(): SchedulerStatus {
    return {
      phase: this.phase,
      running: this.running !== null,
      shuttingDown: this.shuttingDown,
      cyclesRun: this.cyclesRun,
      droppedTriggers: this.droppedTriggers,
      lastReport: this.lastReport
    };
  }

  private fire(): void {
    this.trigger().catch(error => logger.error('Cycle trigger failed unexpectedly', error));
  }

  private async runCycle(): Promise<CycleReport> {
    const cycleId = ++this.cyclesRun;
    const startedAt = this.clock.now();
    const report: CycleReport = {
      cycleId,
      status: CycleStatus.COMPLETED,
      startedAt,
      finishedAt: startedAt,
      providers: [],
      failedKinds: [],
      counts: {
        rawRecords: 0,
        unrepresentable: 0,
        vesselsUpdated: 0,
        portsUpdated: 0,
        weatherUpdated: 0,
        staleDiscarded: 0,
        notifications: 0
      },
      dispatched: []
    };

    try {
      await this.executeCycle(report);
    } catch (error) {
      // Nothing may escape a cycle; the next trigger starts clean.
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error(`Cycle ${cycleId} aborted in ${this.phase} phase`, error);
      report.status = CycleStatus.FAILED;
      report.error = errorMessage;
    } finally {
      this.phase = CyclePhase.IDLE;
      report.metrics = this.metrics.snapshot();
      report.finishedAt = this.clock.now();
      this.lastReport = report;
    }

    logger.info(
      `Cycle ${cycleId} ${report.status}: ${report.counts.rawRecords} raw, ${report.counts.vesselsUpdated} vessels, ` +
      `${report.counts.portsUpdated} ports, ${report.counts.weatherUpdated} weather, ${report.counts.notifications} notification(s)`
    );
    return report;
  }

  private async executeCycle(report: CycleReport): Promise<void> {
    this.phase = CyclePhase.FETCHING;
    const query: ProviderQuery = {
      vesselIds: this.config.tracking.vesselIds,
      ports: this.config.tracking.ports
    };
    const results = await this.fetchAll(this.planJobs(query), query);
    report.providers = results.map(toSummary);

    const { failedKinds, attemptedKinds } = this.assessKinds(results);
    report.failedKinds = failedKinds;
    const anyProviderFailed = results.some(r => r.outcome.status !== FetchOutcomeStatus.SUCCESS);

    if (attemptedKinds.length === 0) {
      logger.warn('No enabled provider has anything to fetch; cycle is a no-op');
      return;
    }
    if (failedKinds.length === attemptedKinds.length) {
      report.status = CycleStatus.FAILED;
      return;
    }

    this.phase = CyclePhase.NORMALIZING;
    const raw: RawRecord[] = [];
    for (const result of results) {
      if (result.outcome.status === FetchOutcomeStatus.SUCCESS) {
        raw.push(...result.outcome.records);
      }
    }
    report.counts.rawRecords = raw.length;
    const batch = this.normalizer.normalizeAll(raw);
    report.counts.unrepresentable = batch.unrepresentable;

    this.phase = CyclePhase.RECONCILING;
    const updatedAt = this.clock.now();
    const tx = this.store.begin();

    for (const position of this.reconciler.reconcileVessels(batch.positions)) {
      if (tx.upsertVessel({ ...position, updatedAt })) {
        report.counts.vesselsUpdated += 1;
      } else {
        report.counts.staleDiscarded += 1;
      }
    }

    const acceptedPorts: PortCongestionSnapshot[] = [];
    for (const snapshot of this.reconciler.reconcilePorts(batch.snapshots)) {
      if (tx.upsertPort(snapshot)) {
        acceptedPorts.push(snapshot);
        report.counts.portsUpdated += 1;
      } else {
        report.counts.staleDiscarded += 1;
      }
    }

    for (const observation of this.reconciler.reconcileWeather(batch.observations)) {
      if (tx.upsertWeather(observation)) {
        report.counts.weatherUpdated += 1;
      } else {
        report.counts.staleDiscarded += 1;
      }
    }

    this.phase = CyclePhase.EVALUATING;
    const threshold = { metric: this.config.congestion.metric, value: this.config.congestion.threshold };
    const events: NotificationEvent[] = [];
    for (const snapshot of acceptedPorts) {
      const { event, state } = this.evaluator.evaluate(snapshot, tx.getAlertState(snapshot.portId), threshold);
      tx.putAlertState(state);
      if (event) {
        events.push(event);
      }
    }
    this.ensureNotAbandoned();
    tx.commit();
    report.counts.notifications = events.length;

    this.phase = CyclePhase.DISPATCHING;
    const dispatched: DispatchRecord[] = [];
    report.dispatched = dispatched;
    for (const event of events) {
      this.ensureNotAbandoned();
      dispatched.push(await this.dispatcher.dispatch(event, this.abandonController.signal));
    }

    report.status = anyProviderFailed || failedKinds.length > 0 ? CycleStatus.DEGRADED : CycleStatus.COMPLETED;
  }

  private ensureNotAbandoned(): void {
    if (this.abandonController.signal.aborted) {
      throw new Error('Cycle abandoned: shutdown timeout elapsed');
    }
  }

  private planJobs(query: ProviderQuery): FetchJob[] {
    const jobs: FetchJob[] = [];
    for (const client of this.clients) {
      for (const kind of client.capabilities) {
        if (client.requestCost(kind, query) > 0) {
          jobs.push({ client, kind });
        }
      }
    }
    return jobs;
  }

  // Bounded fan-out: jobs run in batches of fetchConcurrency, in parallel within a batch
  private async fetchAll(jobs: FetchJob[], query: ProviderQuery): Promise<FetchResult[]> {
    const results: FetchResult[] = [];
    const signal = this.shutdownController.signal;

    for (const chunk of chunkArray(jobs, this.config.scheduler.fetchConcurrency)) {
      const settled = await Promise.allSettled(
        chunk.map(job => this.fetcher.fetch(job.client, job.kind, query, signal))
      );

      settled.forEach((result, index) => {
        const job = chunk[index];
        const outcome: ProviderFetchOutcome = result.status === 'fulfilled'
          ? result.value
          : {
              status: FetchOutcomeStatus.FAILED,
              error: result.reason instanceof Error ? result.reason : new Error(String(result.reason)),
              attempts: 0
            };
        results.push({ ...job, outcome });
      });
    }
    return results;
  }

  private assessKinds(results: FetchResult[]): { failedKinds: DataKind[]; attemptedKinds: DataKind[] } {
    const failedKinds: DataKind[] = [];
    const attemptedKinds: DataKind[] = [];

    for (const kind of ALL_KINDS) {
      const forKind = results.filter(r => r.kind === kind);
      if (forKind.length === 0) {
        continue;
      }
      attemptedKinds.push(kind);

      if (forKind.some(r => r.outcome.status === FetchOutcomeStatus.SUCCESS)) {
        this.failedStreaks.set(kind, 0);
        continue;
      }

      failedKinds.push(kind);
      const providerIds: ProviderId[] = forKind.map(r => r.client.providerId);
      const error = new AllProvidersFailedError(kind, providerIds);
      const streak = (this.failedStreaks.get(kind) ?? 0) + 1;
      this.failedStreaks.set(kind, streak);
      logger.error(`${error.message} (${streak} consecutive cycle(s))`);

      if (streak >= this.config.scheduler.allProvidersFailedAlertAfter) {
        this.alerter.raise({
          type: 'all-providers-failed',
          kind,
          providerIds,
          consecutiveCycles: streak,
          at: this.clock.now()
        });
      }
    }
    return { failedKinds, attemptedKinds };
  }
}

function toSummary(result: FetchResult): ProviderFetchSummary {
  const { client, kind, outcome } = result;
  const base = { providerId: client.providerId, kind, status: outcome.status, attempts: outcome.attempts };
  switch (outcome.status) {
    case FetchOutcomeStatus.SUCCESS:
      return { ...base, records: outcome.records.length };
    case FetchOutcomeStatus.SKIPPED:
      return { ...base, records: 0, reason: outcome.reason };
    case FetchOutcomeStatus.FAILED:
      return { ...base, records: 0, reason: outcome.error.message };
  }
}

function chunkArray<T>(array: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}
