/**
 * Session identifiers
 *
 * Format: YYYYMMDD_HHMMSS_mmm_xxxx (UTC, milliseconds, random hex). Every
 * field is fixed width, so sorting ids as strings sorts them by creation time.
 */

import { randomBytes } from 'node:crypto';

const SESSION_ID_PATTERN = /^\d{8}_\d{6}_\d{3}_[0-9a-f]{4}$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function generateSessionId(now: Date = new Date()): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1, 2)}${pad(now.getUTCDate(), 2)}`;
  const time = `${pad(now.getUTCHours(), 2)}${pad(now.getUTCMinutes(), 2)}${pad(now.getUTCSeconds(), 2)}`;
  const millis = pad(now.getUTCMilliseconds(), 3);
  const suffix = randomBytes(2).toString('hex');
  return `${date}_${time}_${millis}_${suffix}`;
}

export function isSessionId(value: string): boolean {
  return SESSION_ID_PATTERN.test(value);
}

/**
 * Agent ids are numbered per role within a session: builder_001, builder_002...
 */
export function formatAgentId(role: string, ordinal: number): string {
  return `${role}_${pad(ordinal, 3)}`;
}
