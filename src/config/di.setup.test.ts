import 'reflect-metadata';
import { container } from 'tsyringe';
import { INotificationDelivery } from '../adapters/delivery/notification-delivery.interface';
import { LogNotificationDelivery } from '../adapters/delivery/log-notification.delivery';
import { WebhookNotificationDelivery } from '../adapters/delivery/webhook-notification.delivery';
import { IProviderClient } from '../adapters/providers/provider-client.interface';
import { ICongestionEvaluator } from '../services/congestion-evaluator.interface';
import { ICredentialVault } from '../services/credential-vault.interface';
import { INormalizer } from '../services/normalizer.interface';
import { INotificationDispatcher } from '../services/notification-dispatcher.interface';
import { NotificationDispatcher } from '../services/notification-dispatcher.service';
import { IPollingScheduler } from '../services/polling-scheduler.interface';
import { PollingScheduler } from '../services/polling-scheduler.service';
import { buildTestConfig } from '../test-support/test-config';
import { setupDI } from './di.setup';

describe('setupDI', () => {
  it('should enable only providers that have a key', () => {
    const config = buildTestConfig({
      providers: {
        marinesia: { apiKey: undefined, quotaLimit: 600, quotaWindowMs: 3600000 },
        noaa: { apiKey: undefined, quotaLimit: 1000, quotaWindowMs: 3600000 }
      }
    });

    const scope = setupDI(config, container.createChildContainer());
    const clients = scope.resolve<IProviderClient[]>('ProviderClients');

    expect(clients.map(c => c.providerId)).toEqual(['marinetraffic', 'unctad', 'stormglass']);
  });

  it('should share one vault and one scheduler per container', () => {
    const scope = setupDI(buildTestConfig(), container.createChildContainer());

    expect(scope.resolve<ICredentialVault>('ICredentialVault')).toBe(scope.resolve<ICredentialVault>('ICredentialVault'));
    const scheduler = scope.resolve<IPollingScheduler>('IPollingScheduler');
    expect(scheduler).toBeInstanceOf(PollingScheduler);
    expect(scope.resolve<IPollingScheduler>('IPollingScheduler')).toBe(scheduler);
  });

  it('should deliver notifications by webhook only when one is configured', () => {
    const logScope = setupDI(buildTestConfig(), container.createChildContainer());
    const webhookScope = setupDI(
      buildTestConfig({ notifications: { webhookUrl: 'https://hooks.example.test/congestion' } }),
      container.createChildContainer()
    );

    expect(logScope.resolve<INotificationDelivery>('INotificationDelivery')).toBeInstanceOf(LogNotificationDelivery);
    expect(webhookScope.resolve<INotificationDelivery>('INotificationDelivery')).toBeInstanceOf(WebhookNotificationDelivery);
  });

  it('should resolve every pipeline service through its interface token', () => {
    const scope = setupDI(buildTestConfig(), container.createChildContainer());

    expect(scope.resolve<INormalizer>('INormalizer').normalizeAll([])).toEqual({
      positions: [],
      snapshots: [],
      observations: [],
      unrepresentable: 0
    });
    expect(scope.isRegistered('IReconciler')).toBe(true);
    expect(scope.isRegistered('IProviderFetchService')).toBe(true);
    expect(scope.resolve<ICongestionEvaluator>('ICongestionEvaluator')).toBeDefined();
    const dispatcher = scope.resolve<INotificationDispatcher>('INotificationDispatcher');
    expect(dispatcher).toBeInstanceOf(NotificationDispatcher);
    expect(scope.resolve<INotificationDispatcher>('INotificationDispatcher')).toBe(dispatcher);
  });
});
