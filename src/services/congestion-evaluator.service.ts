import { injectable } from 'tsyringe';
import {
  CongestionAlertState,
  CongestionMetric,
  CongestionThreshold,
  NotificationEvent,
  NotificationKind,
  PortCongestionSnapshot
} from '../types/domain.types';
import { CongestionEvaluation, ICongestionEvaluator } from './congestion-evaluator.interface';

/**
 * Edge-triggered congestion alerting. An event fires only when the metric
 * crosses the threshold (upwards or back down); the caller keeps the returned
 * state and hands it back on the next cycle.
 */
@injectable()
export class CongestionEvaluator implements ICongestionEvaluator {
  evaluate(
    snapshot: PortCongestionSnapshot,
    prior: CongestionAlertState | undefined,
    threshold: CongestionThreshold
  ): CongestionEvaluation {
    const value = metricValue(snapshot, threshold.metric);
    const breached = value >= threshold.value;

    // Prior state recorded against another metric says nothing about this one
    const comparable = prior && prior.metric === threshold.metric ? prior : undefined;
    const wasBreached = comparable?.breached ?? false;
    const changed = breached !== wasBreached;

    const state: CongestionAlertState = {
      portId: snapshot.portId,
      metric: threshold.metric,
      breached,
      lastValue: value,
      changedAt: changed || !comparable ? snapshot.timestamp : comparable.changedAt
    };

    if (!changed) {
      return { state };
    }

    const kind = breached
      ? NotificationKind.CONGESTION_THRESHOLD_EXCEEDED
      : NotificationKind.CONGESTION_RECOVERED;

    const event: NotificationEvent = Object.freeze({
      id: `${kind}:${snapshot.portId}:${snapshot.timestamp.toISOString()}`,
      kind,
      subjectId: snapshot.portId,
      metric: threshold.metric,
      observedValue: value,
      threshold: threshold.value,
      timestamp: snapshot.timestamp
    });

    return { event, state };
  }
}

export function metricValue(snapshot: PortCongestionSnapshot, metric: CongestionMetric): number {
  return metric === 'vessels-waiting' ? snapshot.vesselsWaiting : snapshot.averageWaitHours;
}
