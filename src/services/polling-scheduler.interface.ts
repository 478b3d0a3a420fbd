import { CycleReport } from '../types/result.types';

export enum CyclePhase {
  IDLE = 'Idle',
  FETCHING = 'Fetching',
  NORMALIZING = 'Normalizing',
  RECONCILING = 'Reconciling',
  EVALUATING = 'Evaluating',
  DISPATCHING = 'Dispatching'
}

export type TriggerResult =
  | { readonly status: 'COMPLETED'; readonly report: CycleReport }
  | { readonly status: 'DROPPED'; readonly reason: 'cycle-in-progress' | 'shutting-down' };

export interface SchedulerStatus {
  phase: CyclePhase;
  running: boolean;
  shuttingDown: boolean;
  cyclesRun: number;
  droppedTriggers: number;
  lastReport?: CycleReport;
}

export interface IPollingScheduler {
  start(): void;
  trigger(): Promise<TriggerResult>;
  stop(): Promise<void>;
  status(): SchedulerStatus;
}
