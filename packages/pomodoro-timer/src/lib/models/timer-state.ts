export const TIMER_STATES = ['null', 'pomodoro', 'pause', 'idle'] as const;

export type TimerState = (typeof TIMER_STATES)[number];

export interface TimerSnapshot {
  state: TimerState;
  elapsedMs: number;
  elapsedLimitMs: number;
  session: number;
  sessionLimit: number;
  stateTimestamp: number;
}

const TIMER_STATE_SET = new Set<string>(TIMER_STATES);

export function isTimerState(value: unknown): value is TimerState {
  return typeof value === 'string' && TIMER_STATE_SET.has(value);
}

export function stateToString(state: TimerState): string {
  return state;
}

/** Unknown names map to `'null'`, the stopped state. */
export function stringToState(value: string | null | undefined): TimerState {
  return isTimerState(value) ? value : 'null';
}
