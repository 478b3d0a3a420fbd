import { NotificationEvent } from '../../types/domain.types';

/**
 * External collaborator that gets a notification to people (email, SMS,
 * webhook). Rejects when the delivery did not happen.
 */
export interface INotificationDelivery {
  deliver(event: NotificationEvent): Promise<void>;
}
