import {
  CongestionAlertState,
  CongestionThreshold,
  NotificationEvent,
  PortCongestionSnapshot
} from '../types/domain.types';

export interface CongestionEvaluation {
  event?: NotificationEvent;
  state: CongestionAlertState;
}

export interface ICongestionEvaluator {
  evaluate(
    snapshot: PortCongestionSnapshot,
    prior: CongestionAlertState | undefined,
    threshold: CongestionThreshold
  ): CongestionEvaluation;
}
