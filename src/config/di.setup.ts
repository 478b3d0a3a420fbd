import 'reflect-metadata';
import { container, DependencyContainer, Lifecycle } from 'tsyringe';
import { LogOperationalAlerter } from '../adapters/alerting/log-operational.alerter';
import { IOperationalAlerter } from '../adapters/alerting/operational-alerter.interface';
import { LogNotificationDelivery } from '../adapters/delivery/log-notification.delivery';
import { INotificationDelivery } from '../adapters/delivery/notification-delivery.interface';
import { WebhookNotificationDelivery } from '../adapters/delivery/webhook-notification.delivery';
import { IProviderClient } from '../adapters/providers/provider-client.interface';
import { buildProviderRegistry } from '../adapters/providers/provider.registry';
import { ICongestionEvaluator } from '../services/congestion-evaluator.interface';
import { CongestionEvaluator } from '../services/congestion-evaluator.service';
import { CredentialVault } from '../services/credential-vault.service';
import { ICredentialVault } from '../services/credential-vault.interface';
import { IngestionMetrics } from '../services/ingestion-metrics.service';
import { INormalizer } from '../services/normalizer.interface';
import { NormalizerService } from '../services/normalizer.service';
import { INotificationDispatcher } from '../services/notification-dispatcher.interface';
import { NotificationDispatcher } from '../services/notification-dispatcher.service';
import { NotificationOutbox } from '../services/notification-outbox.service';
import { IPollingScheduler } from '../services/polling-scheduler.interface';
import { PollingScheduler } from '../services/polling-scheduler.service';
import { IProviderFetchService } from '../services/provider-fetch.interface';
import { ProviderFetchService } from '../services/provider-fetch.service';
import { IReconciler } from '../services/reconciler.interface';
import { ReconcilerService } from '../services/reconciler.service';
import { IStateStore } from '../services/state-store.interface';
import { InMemoryStateStore } from '../services/state-store.service';
import { Clock, systemClock } from '../utils/clock.util';
import { setLogLevel } from '../utils/logger.util';
import { AppConfig } from './app.config';

export function setupDI(config: AppConfig, target: DependencyContainer = container): DependencyContainer {
  setLogLevel(config.logLevel);

  // Register configuration values
  target.register('AppConfig', { useValue: config });
  target.register<Clock>('Clock', { useValue: systemClock });

  // Shared state: one instance per process
  target.registerSingleton(IngestionMetrics);
  target.register(NotificationOutbox, { useValue: new NotificationOutbox() });

  target.register<ICredentialVault>('ICredentialVault', { useClass: CredentialVault }, { lifecycle: Lifecycle.Singleton });
  target.register<IStateStore>('IStateStore', { useClass: InMemoryStateStore }, { lifecycle: Lifecycle.Singleton });

  // Register adapters
  if (config.notifications.webhookUrl) {
    target.register<INotificationDelivery>('INotificationDelivery', { useClass: WebhookNotificationDelivery });
  } else {
    target.register<INotificationDelivery>('INotificationDelivery', { useClass: LogNotificationDelivery });
  }

  target.register<IOperationalAlerter>('IOperationalAlerter', { useClass: LogOperationalAlerter });
  target.register<IProviderClient[]>('ProviderClients', { useValue: buildProviderRegistry(config, target) });

  // Register services
  target.register<IProviderFetchService>('IProviderFetchService', { useClass: ProviderFetchService });
  target.register<INormalizer>('INormalizer', { useClass: NormalizerService });
  target.register<IReconciler>('IReconciler', { useClass: ReconcilerService });
  target.register<ICongestionEvaluator>('ICongestionEvaluator', { useClass: CongestionEvaluator });
  // Remembers dispatched event ids across cycles
  target.register<INotificationDispatcher>('INotificationDispatcher', { useClass: NotificationDispatcher }, { lifecycle: Lifecycle.Singleton });
  target.register<IPollingScheduler>('IPollingScheduler', { useClass: PollingScheduler }, { lifecycle: Lifecycle.Singleton });

  return target;
}
