import type { PomodoroTimerPartialConfig } from './models/timer-config';
import { PomodoroTimerService, type PomodoroTimerOptions } from './services/pomodoro-timer.service';

export type PomodoroTimerConfigInput =
  | PomodoroTimerPartialConfig
  | (() => PomodoroTimerPartialConfig);

function resolveConfig(input: PomodoroTimerConfigInput | undefined): PomodoroTimerPartialConfig | undefined {
  return typeof input === 'function' ? input() : input;
}

/**
 * Builds the timer and restores it from the store, so a process restart picks
 * up where the previous one left off.
 */
export function createPomodoroTimer(
  options: Omit<PomodoroTimerOptions, 'config'> & { config?: PomodoroTimerConfigInput } = {}
): PomodoroTimerService {
  const service = new PomodoroTimerService({ ...options, config: resolveConfig(options.config) });
  service.restore();
  return service;
}
