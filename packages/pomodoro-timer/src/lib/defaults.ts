import type { PomodoroTimerConfig } from './models/timer-config';

/** A pomodoro stopped at or after this share of its length still counts. */
export const SESSION_ACCEPTANCE = 20 / 25;

/** A pause cut shorter than this share of a short pause is treated as skipped. */
export const SHORT_PAUSE_ACCEPTANCE = 1 / 5;

/** Position between the short and long pause length that counts as a long pause taken. */
export const SHORT_LONG_PAUSE_ACCEPTANCE = 0.5;

export const MAX_RECOVERY_TRANSITIONS = 10_000;

export const DEFAULT_POMODORO_TIMER_CONFIG: PomodoroTimerConfig = {
  pomodoroTime: 1500,
  shortPauseTime: 300,
  longPauseTime: 900,
  pauseWhenIdle: false,
  sessionLimit: 4,
  tickIntervalMs: 1000,
  storageKeyPrefix: 'pomodoro-timer',
  logging: 'warn'
};

export const DEFAULT_STORAGE_KEYS = Object.freeze({
  sessionCount: 'session-count',
  state: 'state',
  stateChangedDate: 'state-changed-date'
});

