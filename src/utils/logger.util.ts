// Scoped console logger. Lines read `[time] LEVEL [Scope] message`.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

let activeLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

function format(level: LogLevel, scope: string, msg: string): string {
  return `[${new Date().toISOString()}] ${level.toUpperCase()} [${scope}] ${msg}`;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (msg) => {
      if (enabled('debug')) console.debug(format('debug', scope, msg));
    },
    info: (msg) => {
      if (enabled('info')) console.log(format('info', scope, msg));
    },
    warn: (msg) => {
      if (enabled('warn')) console.warn(format('warn', scope, msg));
    },
    error: (msg, err) => {
      if (!enabled('error')) return;
      if (err instanceof Error) {
        const shortStack = err.stack?.split('\n').slice(0, 3).join('\n') ?? err.message;
        console.error(`${format('error', scope, msg)}\n${shortStack}`);
      } else if (err !== undefined) {
        console.error(`${format('error', scope, msg)}: ${String(err)}`);
      } else {
        console.error(format('error', scope, msg));
      }
    }
  };
}
