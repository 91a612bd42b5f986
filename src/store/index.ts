/**
 * Store module exports
 */

import { join, resolve } from 'node:path';
import type { AutocrewConfig } from '../types.js';
import { getDefaultConfig } from '../utils/config.js';
import { SQLiteStore, type SQLiteStoreOptions } from './sqlite-store.js';

export { SQLiteStore, type SQLiteStoreOptions, type SessionPatch, type ReportInput } from './sqlite-store.js';
export { generateSessionId, isSessionId, formatAgentId } from './ids.js';

/**
 * Path of the database file that belongs to a project directory
 */
export function resolveStorePath(projectDir: string, config: AutocrewConfig = getDefaultConfig()): string {
  return join(resolve(projectDir), config.store.fileName);
}

/**
 * Open the store of a project directory. Each project keeps its own file,
 * so two projects never share sessions.
 */
export function openProjectStore(
  projectDir: string,
  config: AutocrewConfig = getDefaultConfig(),
  options: SQLiteStoreOptions = {}
): SQLiteStore {
  return new SQLiteStore(resolveStorePath(projectDir, config), options);
}
