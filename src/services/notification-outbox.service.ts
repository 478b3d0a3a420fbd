import { DispatchRecord, DispatchStatus } from '../types/result.types';
import { createLogger } from '../utils/logger.util';

export type OutboxListener = (record: DispatchRecord) => void;

const DEFAULT_CAPACITY = 500;
const logger = createLogger('NotificationOutbox');

/**
 * Bounded history of dispatch outcomes, the stream the delivery layer and
 * operators consume. Undelivered events stay visible with their status.
 */
export class NotificationOutbox {
  private readonly records: DispatchRecord[] = [];
  private readonly listeners = new Set<OutboxListener>();

  constructor(private readonly capacity: number = DEFAULT_CAPACITY) {}

  append(record: DispatchRecord): void {
    this.records.push(record);
    if (this.records.length > this.capacity) {
      this.records.splice(0, this.records.length - this.capacity);
    }

    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (error) {
        logger.error(`Outbox listener failed for event ${record.event.id}`, error);
      }
    }
  }

  subscribe(listener: OutboxListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  list(): DispatchRecord[] {
    return [...this.records];
  }

  undelivered(): DispatchRecord[] {
    return this.records.filter(r => r.status === DispatchStatus.UNDELIVERED);
  }
}
