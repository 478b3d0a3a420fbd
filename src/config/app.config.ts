import 'dotenv/config';
import { readFileSync } from 'fs';
import { z } from 'zod';
import {
  CONGESTION_METRICS,
  CongestionMetric,
  PROVIDER_IDS,
  ProviderId,
  TrackedPort,
  isProviderId
} from '../types/domain.types';
import { LOG_LEVELS, LogLevel } from '../utils/logger.util';
import { RetryOptions } from '../utils/retry.util';

export interface ProviderSettings {
  apiKey?: string;
  quotaLimit: number;
  quotaWindowMs: number;
}

export interface AppConfig {
  scheduler: {
    pollIntervalMs: number;
    fetchConcurrency: number;
    shutdownTimeoutMs: number;
    allProvidersFailedAlertAfter: number;
  };
  congestion: {
    threshold: number;
    metric: CongestionMetric;
  };
  providers: Record<ProviderId, ProviderSettings>;
  providerPriority: ProviderId[];
  fetch: {
    timeoutMs: number;
    retry: RetryOptions;
  };
  degradation: {
    afterFailures: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
  };
  notifications: {
    retry: RetryOptions;
    webhookUrl?: string;
  };
  tracking: {
    vesselIds: string[];
    ports: TrackedPort[];
  };
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

// Free-tier defaults per provider: [limit, window seconds]
const DEFAULT_QUOTAS: Record<ProviderId, [number, number]> = {
  marinetraffic: [100, 3600],
  marinesia: [600, 3600],
  unctad: [1000, 86400],
  stormglass: [500, 86400],
  noaa: [1000, 3600]
};

const TrackedPortSchema = z.object({
  portId: z.string().regex(/^[A-Z]{2}[A-Z2-9]{3}$/, 'portId must be a UN/LOCODE'),
  name: z.string().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  noaaStation: z.string().min(1).optional()
});

function readInt(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name];
  const value = raw === undefined || raw.trim() === '' ? fallback : Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}`);
  }
  return value;
}

function readFloat(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  const value = raw === undefined || raw.trim() === '' ? fallback : Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new Error(`${name} must be a number between ${min} and ${max}`);
  }
  return value;
}

function readList(env: Env, name: string): string[] {
  const raw = env[name] || '';
  return raw.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

function readProviderPriority(env: Env): ProviderId[] {
  const listed = readList(env, 'PROVIDER_PRIORITY');
  if (listed.length === 0) {
    return [...PROVIDER_IDS];
  }
  const unknown = listed.filter(id => !isProviderId(id));
  if (unknown.length > 0) {
    throw new Error(`PROVIDER_PRIORITY contains unknown providers: ${unknown.join(', ')}`);
  }
  // De-duplicate while preserving order
  return [...new Set(listed.filter(isProviderId))];
}

function readMetric(env: Env): CongestionMetric {
  const raw = env.CONGESTION_METRIC || 'vessels-waiting';
  const metric = CONGESTION_METRICS.find(m => m === raw);
  if (!metric) {
    throw new Error(`CONGESTION_METRIC must be one of: ${CONGESTION_METRICS.join(', ')}`);
  }
  return metric;
}

function readLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL || 'info';
  const level = LOG_LEVELS.find(l => l === raw);
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

function readProvider(env: Env, id: ProviderId): ProviderSettings {
  const prefix = id.toUpperCase();
  const [limit, windowSeconds] = DEFAULT_QUOTAS[id];
  const apiKey = env[`${prefix}_API_KEY`]?.trim();
  return {
    apiKey: apiKey ? apiKey : undefined,
    quotaLimit: readInt(env, `${prefix}_QUOTA_LIMIT`, limit, 1),
    quotaWindowMs: readInt(env, `${prefix}_QUOTA_WINDOW_SECONDS`, windowSeconds, 1) * 1000
  };
}

function readProviders(env: Env): Record<ProviderId, ProviderSettings> {
  return {
    marinetraffic: readProvider(env, 'marinetraffic'),
    marinesia: readProvider(env, 'marinesia'),
    unctad: readProvider(env, 'unctad'),
    stormglass: readProvider(env, 'stormglass'),
    noaa: readProvider(env, 'noaa')
  };
}

export function loadTrackedPorts(filePath: string): TrackedPort[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read ports file ${filePath}: ${errorMessage}`);
  }

  const validation = z.array(TrackedPortSchema).safeParse(parsed);
  if (!validation.success) {
    const errors = validation.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Ports file ${filePath} is invalid: ${errors}`);
  }
  return validation.data;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const vesselIds = readList(env, 'TRACKED_VESSELS');
  const invalidVessels = vesselIds.filter(id => !/^\d{9}$/.test(id));
  if (invalidVessels.length > 0) {
    throw new Error(`TRACKED_VESSELS must contain 9-digit MMSIs, got: ${invalidVessels.join(', ')}`);
  }

  const threshold = readFloat(env, 'CONGESTION_THRESHOLD', 75, 0, Number.MAX_SAFE_INTEGER);
  if (threshold === 0) {
    throw new Error('CONGESTION_THRESHOLD must be greater than 0');
  }
  const jitterFactor = readFloat(env, 'RETRY_JITTER_FACTOR', 0.3, 0, 1);
  const webhookUrl = env.NOTIFICATION_WEBHOOK_URL?.trim();

  return deepFreeze<AppConfig>({
    scheduler: {
      pollIntervalMs: readInt(env, 'POLL_INTERVAL_SECONDS', 60, 1, 3600) * 1000,
      fetchConcurrency: readInt(env, 'FETCH_CONCURRENCY', 4, 1, 32),
      shutdownTimeoutMs: readInt(env, 'SHUTDOWN_TIMEOUT_MS', 15000, 0),
      allProvidersFailedAlertAfter: readInt(env, 'ALL_PROVIDERS_FAILED_ALERT_AFTER', 2, 1)
    },
    congestion: {
      threshold,
      metric: readMetric(env)
    },
    providers: readProviders(env),
    providerPriority: readProviderPriority(env),
    fetch: {
      timeoutMs: readInt(env, 'PROVIDER_TIMEOUT_MS', 10000, 100),
      retry: {
        // Timeouts and rate limits get exactly one retry per cycle
        maxRetries: 1,
        baseDelay: readInt(env, 'FETCH_RETRY_BASE_DELAY_MS', 500, 0),
        maxDelay: readInt(env, 'FETCH_RETRY_MAX_DELAY_MS', 5000, 0),
        jitterFactor
      }
    },
    degradation: {
      afterFailures: readInt(env, 'DEGRADE_AFTER_FAILURES', 3, 1),
      backoffBaseMs: readInt(env, 'DEGRADED_BACKOFF_BASE_MS', 60000, 0),
      backoffMaxMs: readInt(env, 'DEGRADED_BACKOFF_MAX_MS', 900000, 0)
    },
    notifications: {
      retry: {
        maxRetries: readInt(env, 'NOTIFICATION_MAX_ATTEMPTS', 3, 1, 20) - 1,
        baseDelay: readInt(env, 'NOTIFICATION_BACKOFF_BASE_MS', 1000, 0),
        maxDelay: readInt(env, 'NOTIFICATION_BACKOFF_MAX_MS', 10000, 0),
        jitterFactor
      },
      webhookUrl: webhookUrl ? webhookUrl : undefined
    },
    tracking: {
      vesselIds,
      ports: loadTrackedPorts(env.PORTS_FILE || './config/ports.json')
    },
    logLevel: readLogLevel(env)
  });
}
