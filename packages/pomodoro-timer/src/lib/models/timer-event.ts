import type { TimerSnapshot, TimerState } from './timer-state';

export type TimerEventType =
  | 'StateChanged'
  | 'ElapsedChanged'
  | 'PomodoroStart'
  | 'PomodoroEnd'
  | 'NotifyPomodoroStart'
  | 'NotifyPomodoroEnd';

interface TimerEventBase {
  at: number;
  snapshot: TimerSnapshot;
}

export interface StateChangedEvent extends TimerEventBase {
  type: 'StateChanged';
  previousState: TimerState;
}

export interface ElapsedChangedEvent extends TimerEventBase {
  type: 'ElapsedChanged';
}

export interface PomodoroStartEvent extends TimerEventBase {
  type: 'PomodoroStart' | 'NotifyPomodoroStart';
  isRequested: boolean;
}

export interface PomodoroEndEvent extends TimerEventBase {
  type: 'PomodoroEnd' | 'NotifyPomodoroEnd';
  isCompleted: boolean;
}

export type TimerEvent = StateChangedEvent | ElapsedChangedEvent | PomodoroStartEvent | PomodoroEndEvent;

/**
 * Lifecycle signal produced by a transition before it is stamped with a time
 * and the committed snapshot.
 */
export type LifecycleSignal =
  | { type: 'PomodoroStart' | 'NotifyPomodoroStart'; isRequested: boolean }
  | { type: 'PomodoroEnd' | 'NotifyPomodoroEnd'; isCompleted: boolean };
