/**
 * Shared test fixtures
 */

import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SQLiteStore } from '../src/store/sqlite-store.js';
import { createConfig } from '../src/utils/config.js';
import type { AutocrewConfig, Task } from '../src/types.js';

export const BASE_TIME = Date.UTC(2026, 0, 15, 9, 30, 0);

export interface TestClock {
  now: () => Date;
  advance: (ms: number) => void;
}

/**
 * Manual clock starting at BASE_TIME
 */
export function createClock(start: number = BASE_TIME): TestClock {
  let current = start;
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export interface TempStore {
  store: SQLiteStore;
  dir: string;
  dbPath: string;
  cleanup: () => void;
}

/**
 * Store on a fresh database file in its own temp directory
 */
export function createTempStore(): TempStore {
  const dir = mkdtempSync(join(tmpdir(), 'autocrew-test-'));
  const dbPath = join(dir, 'state.db');
  const store = new SQLiteStore(dbPath);

  return {
    store,
    dir,
    dbPath,
    cleanup: () => {
      store.close();
      if (existsSync(dir)) rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function testConfig(overrides: Parameters<typeof createConfig>[0] = {}): AutocrewConfig {
  return createConfig(overrides);
}

export function makeTask(sessionId: string, overrides: Partial<Task> & { id: string }): Task {
  const at = new Date(BASE_TIME);
  return {
    sessionId,
    role: 'builder',
    description: `Task ${overrides.id}`,
    status: 'pending',
    dependencies: [],
    priority: 5,
    sequence: 1,
    retryCount: 0,
    feedback: [],
    createdAt: at,
    updatedAt: at,
    ...overrides,
  };
}
