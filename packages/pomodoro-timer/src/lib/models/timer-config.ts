import type { TimerEvent } from './timer-event';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

export interface PomodoroTimerConfig {
  /** Seconds. */
  pomodoroTime: number;
  /** Seconds. */
  shortPauseTime: number;
  /** Seconds. */
  longPauseTime: number;
  pauseWhenIdle: boolean;
  sessionLimit: number;
  tickIntervalMs: number;
  storageKeyPrefix: string;
  logging: LogLevel;
}

export type PomodoroTimerPartialConfig = Partial<PomodoroTimerConfig>;

/** The subset of configuration the transition rules read. */
export type TimerSettings = Pick<PomodoroTimerConfig, 'pomodoroTime' | 'shortPauseTime' | 'longPauseTime' | 'pauseWhenIdle'>;

export interface TimerOptionValues {
  'pomodoro-time': number;
  'short-pause-time': number;
  'long-pause-time': number;
  'pause-when-idle': boolean;
}

export type TimerOptionKey = keyof TimerOptionValues;

export type TimerSettingChange = {
  [K in TimerOptionKey]: { key: K; value: TimerOptionValues[K] };
}[TimerOptionKey];

export interface PomodoroTimerHooks {
  onEvent?: (event: TimerEvent) => void;
}
