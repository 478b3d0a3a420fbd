import { injectable } from 'tsyringe';
import { NotificationEvent } from '../../types/domain.types';
import { createLogger } from '../../utils/logger.util';
import { INotificationDelivery } from './notification-delivery.interface';

const logger = createLogger('Notifications');

@injectable()
export class LogNotificationDelivery implements INotificationDelivery {
  async deliver(event: NotificationEvent): Promise<void> {
    logger.info(
      `${event.kind} ${event.subjectId}: ${event.metric}=${event.observedValue} (threshold ${event.threshold})`
    );
  }
}
