export * from './lib/models/timer-state';
export * from './lib/models/timer-event';
export * from './lib/models/timer-config';
export * from './lib/models/timer-settings-source';
export * from './lib/models/persisted-state';
export * from './lib/defaults';
export * from './lib/validation';
export * from './lib/session-accountant';
export * from './lib/state-machine';
export * from './lib/recovery';
export * from './lib/services/pomodoro-timer.service';
export * from './lib/services/time-source.service';
export * from './lib/services/ticker.service';
export * from './lib/services/idle-monitor.service';
export * from './lib/services/resume-notifier.service';
export * from './lib/utils/logging';
export * from './lib/utils/storage';
export * from './lib/utils/format-ms';
export * from './lib/provide-pomodoro-timer';
