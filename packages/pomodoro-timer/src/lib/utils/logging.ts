import type { PomodoroTimerConfig } from '../models/timer-config';

export interface Logger {
  trace(message: string, ...rest: unknown[]): void;
  debug(message: string, ...rest: unknown[]): void;
  info(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
}

/** Where log lines end up; `console` unless the host routes them elsewhere. */
export type LogSink = Pick<Console, keyof Logger>;

const levelRank: Record<keyof Logger, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

const prefix = '[pomodoro-timer]';

export function createLogger(config: Pick<PomodoroTimerConfig, 'logging'>, sink: LogSink = console): Logger {
  const threshold = config.logging;
  if (threshold === 'silent') {
    return createNoopLogger();
  }

  const rank = levelRank[threshold] ?? levelRank.warn;
  const write =
    (level: keyof Logger) =>
    (message: string, ...rest: unknown[]): void => {
      if (rank <= levelRank[level]) {
        sink[level](prefix + ' ' + message, ...rest);
      }
    };

  return {
    trace: write('trace'),
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error')
  };
}

export function createNoopLogger(): Logger {
  return {
    trace() {},
    debug() {},
    info() {},
    warn() {},
    error() {}
  };
}
