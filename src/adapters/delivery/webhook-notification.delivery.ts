import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../../config/app.config';
import { NotificationEvent } from '../../types/domain.types';
import { INotificationDelivery } from './notification-delivery.interface';

export class DeliveryFailedError extends Error {
  constructor(message: string, public readonly statusCode?: number) {
    super(message);
    this.name = 'DeliveryFailedError';
  }
}

/** Posts each event as JSON to the configured webhook. */
@injectable()
export class WebhookNotificationDelivery implements INotificationDelivery {
  constructor(@inject('AppConfig') private readonly config: AppConfig) {}

  async deliver(event: NotificationEvent): Promise<void> {
    const url = this.config.notifications.webhookUrl;
    if (!url) {
      throw new DeliveryFailedError('NOTIFICATION_WEBHOOK_URL is not configured');
    }

    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        id: event.id,
        kind: event.kind,
        subjectId: event.subjectId,
        metric: event.metric,
        observedValue: event.observedValue,
        threshold: event.threshold,
        timestamp: event.timestamp.toISOString()
      }),
      signal: AbortSignal.timeout(this.config.fetch.timeoutMs)
    });

    if (!response.ok) {
      throw new DeliveryFailedError(`Webhook responded HTTP ${response.status}: ${response.statusText}`, response.status);
    }
  }
}
