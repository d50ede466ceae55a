import { DEFAULT_POMODORO_TIMER_CONFIG } from './defaults';
import {
  LOG_LEVELS,
  type LogLevel,
  type PomodoroTimerConfig,
  type PomodoroTimerPartialConfig
} from './models/timer-config';

export interface ValidationIssue {
  field: string;
  message: string;
}

export interface ValidationResult {
  issues: ValidationIssue[];
  config: PomodoroTimerConfig;
}

type DurationField = 'pomodoroTime' | 'shortPauseTime' | 'longPauseTime';

const DURATION_FIELDS: readonly DurationField[] = ['pomodoroTime', 'shortPauseTime', 'longPauseTime'];
const LOG_LEVEL_SET = new Set<string>(LOG_LEVELS);

/**
 * Merges `partial` over `base`. Invalid fields keep the base value (or are
 * clamped, for `sessionLimit`) and are reported as issues.
 */
export function validateConfig(
  partial: PomodoroTimerPartialConfig | undefined,
  base: PomodoroTimerConfig = DEFAULT_POMODORO_TIMER_CONFIG
): ValidationResult {
  const issues: ValidationIssue[] = [];
  const config: PomodoroTimerConfig = { ...base };
  const input = partial ?? {};

  for (const field of DURATION_FIELDS) {
    const value = input[field];
    if (value === undefined) {
      continue;
    }
    const seconds = normalizeSeconds(value);
    if (seconds == null) {
      issues.push(createIssue(field, 'Value must be a finite number of seconds >= 1'));
      continue;
    }
    config[field] = seconds;
  }

  if (input.pauseWhenIdle !== undefined) {
    if (typeof input.pauseWhenIdle === 'boolean') {
      config.pauseWhenIdle = input.pauseWhenIdle;
    } else {
      issues.push(createIssue('pauseWhenIdle', 'Value must be a boolean'));
    }
  }

  if (input.sessionLimit !== undefined) {
    const { value, clamped } = clampSessionLimit(input.sessionLimit);
    config.sessionLimit = value;
    if (clamped) {
      issues.push(createIssue('sessionLimit', 'Value must be an integer >= 1, using ' + value));
    }
  }

  if (input.tickIntervalMs !== undefined) {
    if (Number.isFinite(input.tickIntervalMs) && input.tickIntervalMs > 0) {
      config.tickIntervalMs = input.tickIntervalMs;
    } else {
      issues.push(createIssue('tickIntervalMs', 'Value must be greater than 0'));
    }
  }

  if (input.storageKeyPrefix !== undefined) {
    if (typeof input.storageKeyPrefix === 'string' && input.storageKeyPrefix.trim()) {
      config.storageKeyPrefix = input.storageKeyPrefix;
    } else {
      issues.push(createIssue('storageKeyPrefix', 'Prefix cannot be empty'));
    }
  }

  if (input.logging !== undefined) {
    if (isLogLevel(input.logging)) {
      config.logging = input.logging;
    } else {
      issues.push(
        createIssue('logging', `Unsupported log level: ${String(input.logging)}. Allowed values: ${LOG_LEVELS.join(', ')}`)
      );
    }
  }

  return { issues, config };
}

export function clampSessionLimit(value: number): { value: number; clamped: boolean } {
  if (!Number.isFinite(value)) {
    return { value: 1, clamped: true };
  }
  const whole = Math.floor(value);
  if (whole < 1) {
    return { value: 1, clamped: true };
  }
  return { value: whole, clamped: whole !== value };
}

/** Whole seconds, or null when the value cannot be a duration. */
export function normalizeSeconds(value: number): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return null;
  }
  const seconds = Math.floor(value);
  return seconds >= 1 ? seconds : null;
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVEL_SET.has(value);
}

function createIssue(field: string, message: string): ValidationIssue {
  return { field, message };
}
