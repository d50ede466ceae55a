import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { DEFAULT_STORAGE_KEYS } from '../defaults';
import type { PersistedTimerState } from '../models/persisted-state';
import type { TimerState } from '../models/timer-state';
import { stateToString } from '../models/timer-state';
import type { Logger } from './logging';

export interface StorageAdapter {
  read(key: string): string | null;
  write(key: string, value: string): void;
}

export interface TimerStateRecord {
  session: number;
  state: TimerState;
  stateChangedAt: number;
}

export function createMemoryStorage(initial?: Record<string, string>): StorageAdapter {
  const memory = new Map<string, string>(Object.entries(initial ?? {}));
  return {
    read: key => memory.get(key) ?? null,
    write: (key, value) => {
      memory.set(key, value);
    }
  };
}

/**
 * Flat key/value store kept as one JSON object on disk. Falls back to memory
 * when the file cannot be read or parsed.
 */
export function createFileStorage(path: string, logger: Logger): StorageAdapter {
  let values: Record<string, string>;
  try {
    values = loadValues(path);
  } catch (error) {
    logger.warn('Falling back to memory storage due to error', error);
    return createMemoryStorage();
  }

  const flush = (): void => {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(values, null, 2) + '\n', 'utf-8');
  };

  return {
    read: key => (Object.prototype.hasOwnProperty.call(values, key) ? values[key] : null),
    write: (key, value) => {
      values = { ...values, [key]: value };
      flush();
    }
  };
}

function loadValues(path: string): Record<string, string> {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw error;
  }
  const parsed: unknown = JSON.parse(raw);
  if (parsed == null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Storage file does not hold a JSON object: ' + path);
  }
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      values[key] = value;
    }
  }
  return values;
}

// fs errors are not always instances of this realm's Error
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export function storageKey(prefix: string, key: string): string {
  return `${prefix}:${key}`;
}

export function persistTimerState(
  adapter: StorageAdapter,
  prefix: string,
  record: TimerStateRecord,
  logger: Logger
): void {
  try {
    adapter.write(storageKey(prefix, DEFAULT_STORAGE_KEYS.sessionCount), String(record.session));
    adapter.write(storageKey(prefix, DEFAULT_STORAGE_KEYS.state), stateToString(record.state));
    adapter.write(
      storageKey(prefix, DEFAULT_STORAGE_KEYS.stateChangedDate),
      new Date(record.stateChangedAt).toISOString()
    );
  } catch (error) {
    logger.warn('Unable to persist timer state', error);
  }
}

export function readTimerState(adapter: StorageAdapter, prefix: string, logger: Logger): PersistedTimerState {
  return {
    session: safeRead(adapter, storageKey(prefix, DEFAULT_STORAGE_KEYS.sessionCount), logger),
    state: safeRead(adapter, storageKey(prefix, DEFAULT_STORAGE_KEYS.state), logger),
    stateChangedDate: safeRead(adapter, storageKey(prefix, DEFAULT_STORAGE_KEYS.stateChangedDate), logger)
  };
}

function safeRead(adapter: StorageAdapter, key: string, logger: Logger): string | null {
  try {
    return adapter.read(key);
  } catch (error) {
    logger.warn('Unable to read ' + key, error);
    return null;
  }
}

/** File-backed storage when a path is given, memory otherwise. */
export function createStorage(path: string | undefined, logger: Logger): StorageAdapter {
  return path ? createFileStorage(path, logger) : createMemoryStorage();
}
