import { BehaviorSubject, Subject, distinctUntilChanged, map, take, takeUntil } from 'rxjs';
import type { Observable, Subscription } from 'rxjs';

import type {
  PomodoroTimerConfig,
  PomodoroTimerHooks,
  PomodoroTimerPartialConfig,
  TimerOptionKey,
  TimerSettingChange,
  TimerSettings
} from '../models/timer-config';
import type { LifecycleSignal, TimerEvent } from '../models/timer-event';
import type { TimerSnapshot, TimerState } from '../models/timer-state';
import type { TimerSettingsSource } from '../models/timer-settings-source';
import { recoverTimer } from '../recovery';
import {
  autoTransitionTarget,
  commitTransition,
  createInitialSnapshot,
  isLimitReached,
  limitForOptionChange,
  type TransitionTrigger
} from '../state-machine';
import { formatMs } from '../utils/format-ms';
import { createLogger, type LogSink, type Logger } from '../utils/logging';
import { createStorage, persistTimerState, readTimerState, type StorageAdapter } from '../utils/storage';
import { clampSessionLimit, normalizeSeconds, validateConfig } from '../validation';
import type { IdleMonitor } from './idle-monitor.service';
import type { ResumeNotifier } from './resume-notifier.service';
import { TickerService } from './ticker.service';
import { TimeSourceService, type TimeSource } from './time-source.service';

export interface PomodoroTimerOptions {
  config?: PomodoroTimerPartialConfig;
  hooks?: PomodoroTimerHooks;
  storage?: StorageAdapter;
  /** JSON file used as the key/value store when no `storage` is given. */
  storagePath?: string;
  logSink?: LogSink;
  idleMonitor?: IdleMonitor;
  resumeNotifier?: ResumeNotifier;
  settingsSource?: TimerSettingsSource;
  timeSource?: TimeSource;
}

type DurationOptionKey = Exclude<TimerOptionKey, 'pause-when-idle'>;

interface PendingBatch {
  start: TimerSnapshot;
  stateChanged: boolean;
  elapsedChanged: boolean;
  signals: LifecycleSignal[];
}

export class PomodoroTimerService {
  private readonly timeSource: TimeSource;
  private readonly hooks: PomodoroTimerHooks;
  private readonly idleMonitor: IdleMonitor | null;
  private readonly logSink: LogSink | undefined;
  private config: PomodoroTimerConfig;
  private logger: Logger;
  private readonly storage: StorageAdapter;
  private readonly ticker: TickerService;

  private current: TimerSnapshot;
  private readonly snapshotSubject: BehaviorSubject<TimerSnapshot>;
  private readonly eventsSubject = new Subject<TimerEvent>();
  private readonly destroy$ = new Subject<void>();
  private idleWatchSub: Subscription | null = null;

  private batchDepth = 0;
  private batch: PendingBatch | null = null;
  private delivering = false;
  private readonly deferred: Array<() => void> = [];
  private destroyed = false;

  readonly events$: Observable<TimerEvent> = this.eventsSubject.asObservable();
  readonly snapshot$: Observable<TimerSnapshot>;
  readonly state$: Observable<TimerState>;
  /** Whole seconds. */
  readonly elapsed$: Observable<number>;

  constructor(options: PomodoroTimerOptions = {}) {
    const { config, issues } = validateConfig(options.config);
    this.config = config;
    this.logSink = options.logSink;
    this.logger = createLogger(config, this.logSink);
    issues.forEach(issue => this.logger.warn('Invalid config field: ' + issue.field + ' - ' + issue.message));

    this.timeSource = options.timeSource ?? new TimeSourceService();
    this.hooks = options.hooks ?? {};
    this.idleMonitor = options.idleMonitor ?? null;
    this.storage = options.storage ?? createStorage(options.storagePath, this.logger);
    this.ticker = new TickerService(config.tickIntervalMs, () => this.handleTick());

    this.current = createInitialSnapshot(config.sessionLimit);
    this.snapshotSubject = new BehaviorSubject<TimerSnapshot>(this.current);
    this.snapshot$ = this.snapshotSubject.asObservable();
    this.state$ = this.snapshot$.pipe(
      map(snapshot => snapshot.state),
      distinctUntilChanged()
    );
    this.elapsed$ = this.snapshot$.pipe(
      map(snapshot => Math.floor(snapshot.elapsedMs / 1000)),
      distinctUntilChanged()
    );

    options.settingsSource?.changes$.pipe(takeUntil(this.destroy$)).subscribe(change => {
      this.runInBatch(() => this.applyOptionChange(change.key, change.value));
    });

    options.resumeNotifier?.resumed$.pipe(takeUntil(this.destroy$)).subscribe(() => {
      this.logger.info('System resumed, restoring timer');
      this.restore();
    });
  }

  get state(): TimerState {
    return this.snapshotSubject.value.state;
  }

  get elapsed(): number {
    return Math.floor(this.snapshotSubject.value.elapsedMs / 1000);
  }

  set elapsed(seconds: number) {
    this.setElapsed(seconds);
  }

  get elapsedLimit(): number {
    return Math.floor(this.snapshotSubject.value.elapsedLimitMs / 1000);
  }

  /** Unix seconds at which the current state began. */
  get stateTimestamp(): number {
    return Math.floor(this.snapshotSubject.value.stateTimestamp / 1000);
  }

  get session(): number {
    return this.snapshotSubject.value.session;
  }

  get sessionLimit(): number {
    return this.snapshotSubject.value.sessionLimit;
  }

  set sessionLimit(value: number) {
    const { value: sessionLimit, clamped } = clampSessionLimit(value);
    if (clamped) {
      this.logger.warn('Invalid session limit ' + value + ', using ' + sessionLimit);
    }
    this.runInBatch(() => {
      this.config = { ...this.config, sessionLimit };
      this.current = { ...this.current, sessionLimit };
    });
  }

  start(): void {
    this.runInBatch(() => {
      const state = this.current.state;
      if (state === 'null' || state === 'idle') {
        this.transitionTo('pomodoro', 'requested');
      }
    });
  }

  stop(): void {
    this.runInBatch(() => {
      this.transitionTo('null', 'requested');
    });
  }

  reset(): void {
    this.runInBatch(() => {
      const wasRunning = this.current.state !== 'null';
      this.current = { ...this.current, session: 0 };
      this.transitionTo('null', 'requested');
      // leaving a pomodoro may have counted it
      this.current = { ...this.current, session: 0 };
      if (wasRunning) {
        this.transitionTo('pomodoro', 'requested');
      }
    });
  }

  /** Sets the elapsed time of the current state, in seconds. */
  setElapsed(seconds: number): void {
    if (!Number.isFinite(seconds) || seconds < 0) {
      this.logger.warn('Ignoring invalid elapsed value: ' + seconds);
      return;
    }
    this.runInBatch(() => {
      const now = this.timeSource.now();
      const elapsedMs = seconds * 1000;
      if (this.current.state !== 'null') {
        this.rebaseStateTimestamp(now - elapsedMs);
      }
      this.updateElapsed(elapsedMs, now);
    });
  }

  handleTick(now: number = this.timeSource.now()): void {
    if (this.destroyed) {
      return;
    }
    this.runInBatch(() => {
      if (this.current.state === 'null') {
        return;
      }
      // elapsed never runs backwards within a state, even if the wall clock does
      this.updateElapsed(Math.max(this.current.elapsedMs, now - this.current.stateTimestamp), now);
    });
  }

  handleIdleBecameActive(): void {
    this.runInBatch(() => {
      if (this.current.state === 'idle') {
        this.transitionTo('pomodoro', 'auto');
      }
    });
  }

  handleConfigChanged(key: 'pause-when-idle', value: boolean): void;
  handleConfigChanged(key: DurationOptionKey, value: number): void;
  handleConfigChanged(key: TimerOptionKey, value: number | boolean): void {
    this.runInBatch(() => this.applyOptionChange(key, value));
  }

  setConfig(partial: PomodoroTimerPartialConfig): void {
    const base = this.config;
    const { config, issues } = validateConfig(partial, base);
    issues.forEach(issue => this.logger.warn('Invalid config field: ' + issue.field + ' - ' + issue.message));

    if (config.logging !== base.logging) {
      this.logger = createLogger(config, this.logSink);
    }
    this.ticker.setPeriod(config.tickIntervalMs);

    this.runInBatch(() => {
      this.config = {
        ...this.config,
        storageKeyPrefix: config.storageKeyPrefix,
        tickIntervalMs: config.tickIntervalMs,
        logging: config.logging
      };
      if (config.sessionLimit !== this.current.sessionLimit) {
        this.config = { ...this.config, sessionLimit: config.sessionLimit };
        this.current = { ...this.current, sessionLimit: config.sessionLimit };
      }
      if (config.pomodoroTime !== base.pomodoroTime) {
        this.applyOptionChange('pomodoro-time', config.pomodoroTime);
      }
      if (config.shortPauseTime !== base.shortPauseTime) {
        this.applyOptionChange('short-pause-time', config.shortPauseTime);
      }
      if (config.longPauseTime !== base.longPauseTime) {
        this.applyOptionChange('long-pause-time', config.longPauseTime);
      }
      if (config.pauseWhenIdle !== base.pauseWhenIdle) {
        this.applyOptionChange('pause-when-idle', config.pauseWhenIdle);
      }
    });
  }

  /**
   * Rebuilds the timer from the persisted fields, replaying the transitions
   * missed while the process was not running or the system was suspended.
   */
  restore(now: number = this.timeSource.now()): void {
    if (this.destroyed) {
      return;
    }
    this.runInBatch(() => {
      const persisted = readTimerState(this.storage, this.config.storageKeyPrefix, this.logger);
      const result = recoverTimer(persisted, now, this.settings(), this.current.sessionLimit, this.logger);

      this.disableIdleWatch();
      this.current = result.snapshot;
      this.syncDrivers();
      this.persist(this.current.stateTimestamp);

      const pending = this.openBatch();
      pending.stateChanged = true;
      pending.elapsedChanged = true;
      pending.signals.push(...result.signals);

      this.logger.info(
        'Restored ' + this.current.state + ' at ' + formatMs(this.current.elapsedMs) +
          ' after replaying ' + result.replayed + ' transition(s)'
      );
    });
  }

  getSnapshot(): TimerSnapshot {
    return { ...this.snapshotSubject.value };
  }

  getConfig(): PomodoroTimerConfig {
    return { ...this.config };
  }

  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.ticker.stop();
    this.disableIdleWatch();
    this.destroy$.next();
    this.destroy$.complete();
    this.eventsSubject.complete();
    this.snapshotSubject.complete();
  }

  private settings(): TimerSettings {
    const { pomodoroTime, shortPauseTime, longPauseTime, pauseWhenIdle } = this.config;
    return { pomodoroTime, shortPauseTime, longPauseTime, pauseWhenIdle };
  }

  private updateElapsed(elapsedMs: number, timestamp: number): void {
    if (elapsedMs === this.current.elapsedMs) {
      return;
    }
    this.current = { ...this.current, elapsedMs };

    if (!isLimitReached(this.current)) {
      return;
    }
    const target = autoTransitionTarget(this.current.state, this.config);
    if (target) {
      this.transitionTo(target, 'auto', timestamp);
    }
  }

  private transitionTo(to: TimerState, trigger: TransitionTrigger, timestamp: number = this.timeSource.now()): void {
    const result = commitTransition(this.current, to, timestamp, this.settings(), trigger);

    if (result.changed) {
      this.disableIdleWatch();
      this.current = result.snapshot;
      const pending = this.openBatch();
      pending.stateChanged = true;
      pending.signals.push(...result.signals);
    }

    this.syncDrivers();
    this.persist(result.changed ? this.current.stateTimestamp : timestamp);
  }

  private applyOptionChange(key: TimerOptionKey, value: number | boolean): void {
    const change = toSettingChange(key, value);
    if (!change) {
      this.logger.warn('Ignoring invalid value for ' + key + ': ' + String(value));
      return;
    }

    switch (change.key) {
      case 'pomodoro-time':
        this.config = { ...this.config, pomodoroTime: change.value };
        break;
      case 'short-pause-time':
        this.config = { ...this.config, shortPauseTime: change.value };
        break;
      case 'long-pause-time':
        this.config = { ...this.config, longPauseTime: change.value };
        break;
      case 'pause-when-idle':
        this.config = { ...this.config, pauseWhenIdle: change.value };
        break;
    }

    const limit = limitForOptionChange(change.key, this.current, this.settings());
    if (limit == null) {
      return;
    }
    // the boundary itself is enforced by the next tick
    const elapsedMs = Math.min(this.current.elapsedMs, limit);
    this.current = { ...this.current, elapsedLimitMs: limit };
    if (elapsedMs !== this.current.elapsedMs) {
      this.current = { ...this.current, elapsedMs };
      this.rebaseStateTimestamp(this.timeSource.now() - elapsedMs);
    }
  }

  /** Moves the state start so that ticks count on from the current elapsed time. */
  private rebaseStateTimestamp(stateTimestamp: number): void {
    if (stateTimestamp === this.current.stateTimestamp) {
      return;
    }
    this.current = { ...this.current, stateTimestamp };
    this.persist(stateTimestamp);
  }

  private syncDrivers(): void {
    if (this.current.state === 'null') {
      this.ticker.stop();
    } else if (!this.destroyed) {
      this.ticker.ensureStarted();
    }
    if (this.current.state === 'idle') {
      this.enableIdleWatch();
    }
  }

  private enableIdleWatch(): void {
    if (!this.idleMonitor || this.idleWatchSub || this.destroyed) {
      return;
    }
    this.idleWatchSub = this.idleMonitor
      .watchUserActive()
      .pipe(take(1))
      .subscribe(() => {
        this.idleWatchSub = null;
        this.handleIdleBecameActive();
      });
  }

  private disableIdleWatch(): void {
    this.idleWatchSub?.unsubscribe();
    this.idleWatchSub = null;
  }

  private persist(stateChangedAt: number): void {
    persistTimerState(
      this.storage,
      this.config.storageKeyPrefix,
      { session: this.current.session, state: this.current.state, stateChangedAt },
      this.logger
    );
  }

  private runInBatch(work: () => void): void {
    if (this.delivering) {
      this.deferred.push(() => this.runInBatch(work));
      return;
    }
    this.beginBatch();
    try {
      work();
    } finally {
      this.commitBatch();
    }
  }

  private beginBatch(): void {
    this.batchDepth += 1;
    this.openBatch();
  }

  private openBatch(): PendingBatch {
    if (!this.batch) {
      this.batch = { start: this.current, stateChanged: false, elapsedChanged: false, signals: [] };
    }
    return this.batch;
  }

  private commitBatch(): void {
    this.batchDepth -= 1;
    if (this.batchDepth > 0 || !this.batch) {
      return;
    }
    const pending = this.batch;
    this.batch = null;

    const snapshot = this.current;
    if (snapshot === pending.start) {
      return;
    }

    const elapsedChanged =
      pending.elapsedChanged ||
      snapshot.elapsedMs !== pending.start.elapsedMs ||
      snapshot.elapsedLimitMs !== pending.start.elapsedLimitMs;

    const at = this.timeSource.now();
    const events: TimerEvent[] = [];
    if (pending.stateChanged) {
      events.push({ type: 'StateChanged', at, snapshot, previousState: pending.start.state });
    }
    for (const signal of pending.signals) {
      events.push({ ...signal, at, snapshot });
    }
    if (elapsedChanged) {
      events.push({ type: 'ElapsedChanged', at, snapshot });
    }

    if (!this.destroyed) {
      this.snapshotSubject.next(snapshot);
    }
    this.deliver(events);
  }

  private deliver(events: TimerEvent[]): void {
    this.delivering = true;
    try {
      for (const event of events) {
        this.logger.debug('Event: ' + event.type, event);
        this.eventsSubject.next(event);
        if (typeof this.hooks.onEvent === 'function') {
          try {
            this.hooks.onEvent(event);
          } catch (error) {
            this.logger.error('Error executing onEvent hook', error);
          }
        }
      }
    } finally {
      this.delivering = false;
    }

    while (this.deferred.length > 0 && !this.delivering) {
      const next = this.deferred.shift();
      next?.();
    }
  }
}

function toSettingChange(key: TimerOptionKey, value: number | boolean): TimerSettingChange | null {
  if (key === 'pause-when-idle') {
    return typeof value === 'boolean' ? { key, value } : null;
  }
  if (typeof value !== 'number') {
    return null;
  }
  const seconds = normalizeSeconds(value);
  return seconds == null ? null : { key, value: seconds };
}
