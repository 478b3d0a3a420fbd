import { inject, injectable } from 'tsyringe';
import { INotificationDelivery } from '../adapters/delivery/notification-delivery.interface';
import { AppConfig } from '../config/app.config';
import { NotificationEvent } from '../types/domain.types';
import { DispatchRecord, DispatchStatus } from '../types/result.types';
import { Clock } from '../utils/clock.util';
import { createLogger } from '../utils/logger.util';
import { RetryAbortedError, retryWithBackoff, RetryExhaustedError } from '../utils/retry.util';
import { INotificationDispatcher } from './notification-dispatcher.interface';
import { NotificationOutbox } from './notification-outbox.service';

// Ids remembered for duplicate suppression
const MAX_REMEMBERED_EVENTS = 10_000;

const logger = createLogger('NotificationDispatcher');

@injectable()
export class NotificationDispatcher implements INotificationDispatcher {
  private readonly seen = new Set<string>();

  constructor(
    @inject('INotificationDelivery') private readonly delivery: INotificationDelivery,
    @inject(NotificationOutbox) private readonly outbox: NotificationOutbox,
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('Clock') private readonly clock: Clock
  ) {}

  /**
   * Hands the event to the delivery collaborator once. Failures are retried up
   * to the configured attempt ceiling; after that the event is recorded as
   * undelivered and dropped, as it is when `signal` aborts. Never throws.
   */
  async dispatch(event: NotificationEvent, signal?: AbortSignal): Promise<DispatchRecord> {
    if (this.seen.has(event.id)) {
      logger.debug(`Event ${event.id} already dispatched; ignoring duplicate`);
      return { event, status: DispatchStatus.DUPLICATE, attempts: 0, recordedAt: this.clock.now() };
    }
    this.remember(event.id);

    let attempts = 0;
    let record: DispatchRecord;
    try {
      await retryWithBackoff(
        () => {
          attempts += 1;
          return this.delivery.deliver(event);
        },
        this.config.notifications.retry,
        () => true,
        {
          signal,
          onRetry: (error, attempt, delayMs) => logger.warn(
            `Delivery of ${event.id} failed (${error.message}); retry ${attempt} in ${Math.round(delayMs)}ms`
          )
        }
      );
      record = { event, status: DispatchStatus.DELIVERED, attempts, recordedAt: this.clock.now() };
    } catch (error) {
      const message = describeFailure(error);
      logger.error(`Event ${event.id} undelivered after ${attempts} attempt(s): ${message}`);
      record = { event, status: DispatchStatus.UNDELIVERED, attempts, error: message, recordedAt: this.clock.now() };
    }

    this.outbox.append(record);
    return record;
  }

  private remember(id: string): void {
    this.seen.add(id);
    if (this.seen.size > MAX_REMEMBERED_EVENTS) {
      const [oldest] = this.seen;
      this.seen.delete(oldest);
    }
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof RetryAbortedError) {
    return error.lastError ? `aborted (${error.lastError.message})` : 'aborted';
  }
  const cause = error instanceof RetryExhaustedError ? error.lastError : error;
  return cause instanceof Error ? cause.message : String(cause);
}
