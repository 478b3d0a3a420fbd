import { NotificationEvent } from '../types/domain.types';
import { DispatchRecord } from '../types/result.types';

export interface INotificationDispatcher {
  /** Stops retrying once `signal` aborts; the event is then recorded as undelivered. */
  dispatch(event: NotificationEvent, signal?: AbortSignal): Promise<DispatchRecord>;
}
