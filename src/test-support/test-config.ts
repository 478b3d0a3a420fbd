import { AppConfig } from '../config/app.config';

type SectionKey = Exclude<keyof AppConfig, 'providerPriority' | 'logLevel'>;

// Sections merge field by field; the list and the scalar replace outright.
type ConfigOverrides = {
  [K in SectionKey]?: Partial<AppConfig[K]>;
} & {
  providerPriority?: AppConfig['providerPriority'];
  logLevel?: AppConfig['logLevel'];
};

const fastRetry = { maxRetries: 1, baseDelay: 1, maxDelay: 2, jitterFactor: 0 };

export function buildTestConfig(overrides: ConfigOverrides = {}): AppConfig {
  const base: AppConfig = {
    scheduler: {
      pollIntervalMs: 60000,
      fetchConcurrency: 4,
      shutdownTimeoutMs: 1000,
      allProvidersFailedAlertAfter: 2
    },
    congestion: { threshold: 75, metric: 'vessels-waiting' },
    providers: {
      marinetraffic: { apiKey: 'test-key-mt', quotaLimit: 100, quotaWindowMs: 3600000 },
      marinesia: { apiKey: 'test-key-ms', quotaLimit: 600, quotaWindowMs: 3600000 },
      unctad: { apiKey: 'test-key-un', quotaLimit: 1000, quotaWindowMs: 86400000 },
      stormglass: { apiKey: 'test-key-sg', quotaLimit: 500, quotaWindowMs: 86400000 },
      noaa: { apiKey: 'test-key-noaa', quotaLimit: 1000, quotaWindowMs: 3600000 }
    },
    providerPriority: ['marinetraffic', 'marinesia', 'unctad', 'stormglass', 'noaa'],
    fetch: { timeoutMs: 1000, retry: fastRetry },
    degradation: { afterFailures: 3, backoffBaseMs: 60000, backoffMaxMs: 900000 },
    notifications: { retry: { maxRetries: 2, baseDelay: 1, maxDelay: 2, jitterFactor: 0 } },
    tracking: {
      vesselIds: ['244660000', '477123400'],
      ports: [
        { portId: 'NLRTM', name: 'Rotterdam', latitude: 51.95, longitude: 4.14 },
        { portId: 'USLAX', name: 'Los Angeles', latitude: 33.73, longitude: -118.26, noaaStation: '9410660' }
      ]
    },
    logLevel: 'silent'
  };

  return {
    scheduler: { ...base.scheduler, ...overrides.scheduler },
    congestion: { ...base.congestion, ...overrides.congestion },
    providers: { ...base.providers, ...overrides.providers },
    providerPriority: overrides.providerPriority ?? base.providerPriority,
    fetch: { ...base.fetch, ...overrides.fetch },
    degradation: { ...base.degradation, ...overrides.degradation },
    notifications: { ...base.notifications, ...overrides.notifications },
    tracking: { ...base.tracking, ...overrides.tracking },
    logLevel: overrides.logLevel ?? base.logLevel
  };
}
