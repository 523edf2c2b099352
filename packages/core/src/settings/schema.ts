import type { LogLevelName, ReviewSettings, SortOrder, Weekday } from '../types/index.js';
import { DEFAULT_SETTINGS } from './defaults.js';
import { parseZonedTimestamp } from '../git/log.js';

// ─── Allowed Values ─────────────────────────────────────────────────────────

export const VALID_WEEKDAYS: readonly Weekday[] = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
];

export const VALID_SORT_ORDERS: readonly SortOrder[] = ['newest_first', 'oldest_first'];

export const VALID_LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

const TIME_OF_DAY = /^(\d{1,2}):(\d{2})$/;

/**
 * Settings as stored. `excludedFolders` is the older name of `pathFilters`
 * and is only read when `pathFilters` is absent.
 */
export type RawSettings = Partial<ReviewSettings> & { excludedFolders?: string[] };

// ─── Reading ────────────────────────────────────────────────────────────────

/**
 * Narrow parsed JSON to {@link RawSettings}.
 *
 * Unknown keys are ignored. A known key with a value of the wrong shape is
 * reported and left out, so the default applies.
 */
export function readRawSettings(json: unknown): { raw: RawSettings; errors: string[] } {
  const raw: RawSettings = {};
  const errors: string[] = [];

  if (!isRecord(json)) {
    return { raw, errors: ['settings must be a JSON object'] };
  }

  const reject = (key: string, expected: string): void => {
    errors.push(`${key} must be ${expected}`);
  };

  if (json.repoPath !== undefined) {
    if (typeof json.repoPath === 'string') raw.repoPath = json.repoPath;
    else reject('repoPath', 'a string');
  }

  if (json.lastRun !== undefined) {
    if (json.lastRun === null || typeof json.lastRun === 'string') raw.lastRun = json.lastRun;
    else reject('lastRun', 'an ISO-8601 string or null');
  }

  if (json.defaultWeekday !== undefined) {
    const weekday = typeof json.defaultWeekday === 'string' ? json.defaultWeekday.toLowerCase() : '';
    if (isOneOf(VALID_WEEKDAYS, weekday)) raw.defaultWeekday = weekday;
    else reject('defaultWeekday', `one of ${VALID_WEEKDAYS.join(', ')}`);
  }

  if (json.defaultTime !== undefined) {
    if (typeof json.defaultTime === 'string') raw.defaultTime = json.defaultTime;
    else reject('defaultTime', 'a string');
  }

  if (json.sortOrder !== undefined) {
    if (isOneOf(VALID_SORT_ORDERS, json.sortOrder)) raw.sortOrder = json.sortOrder;
    else reject('sortOrder', `one of ${VALID_SORT_ORDERS.join(', ')}`);
  }

  if (json.logLevel !== undefined) {
    if (isOneOf(VALID_LOG_LEVELS, json.logLevel)) raw.logLevel = json.logLevel;
    else reject('logLevel', `one of ${VALID_LOG_LEVELS.join(', ')}`);
  }

  for (const key of ['pathFilters', 'excludedFolders', 'documentExtensions'] as const) {
    const value = json[key];
    if (value === undefined) continue;
    if (isStringList(value)) raw[key] = [...value];
    else reject(key, 'a list of strings');
  }

  return { raw, errors };
}

// ─── Normalization ──────────────────────────────────────────────────────────

/**
 * Merge partial settings over the defaults.
 */
export function normalizeSettings(raw: RawSettings): ReviewSettings {
  return {
    repoPath: raw.repoPath ?? DEFAULT_SETTINGS.repoPath,
    lastRun: raw.lastRun ?? DEFAULT_SETTINGS.lastRun,
    defaultWeekday: raw.defaultWeekday ?? DEFAULT_SETTINGS.defaultWeekday,
    defaultTime: raw.defaultTime ?? DEFAULT_SETTINGS.defaultTime,
    pathFilters: [...(raw.pathFilters ?? raw.excludedFolders ?? DEFAULT_SETTINGS.pathFilters)],
    sortOrder: raw.sortOrder ?? DEFAULT_SETTINGS.sortOrder,
    documentExtensions: [...(raw.documentExtensions ?? DEFAULT_SETTINGS.documentExtensions)],
    logLevel: raw.logLevel ?? DEFAULT_SETTINGS.logLevel,
  };
}

// ─── Validation ─────────────────────────────────────────────────────────────

/**
 * Check settings for values the engine cannot use.
 *
 * @returns One message per problem; empty when the settings are valid.
 */
export function validateSettings(settings: ReviewSettings): string[] {
  const errors: string[] = [];

  if (settings.repoPath.trim().length === 0) {
    errors.push('repoPath must not be empty');
  }

  if (!VALID_WEEKDAYS.includes(settings.defaultWeekday)) {
    errors.push(`defaultWeekday '${settings.defaultWeekday}' is not a weekday name`);
  }

  if (parseTimeOfDay(settings.defaultTime) === null) {
    errors.push(`defaultTime '${settings.defaultTime}' must be HH:MM`);
  }

  if (!VALID_SORT_ORDERS.includes(settings.sortOrder)) {
    errors.push(`sortOrder '${settings.sortOrder}' must be one of ${VALID_SORT_ORDERS.join(', ')}`);
  }

  if (!VALID_LOG_LEVELS.includes(settings.logLevel)) {
    errors.push(`logLevel '${settings.logLevel}' must be one of ${VALID_LOG_LEVELS.join(', ')}`);
  }

  if (settings.documentExtensions.length === 0) {
    errors.push('documentExtensions must list at least one extension');
  }
  for (const ext of settings.documentExtensions) {
    if (!ext.startsWith('.') || ext.length < 2) {
      errors.push(`documentExtensions entry '${ext}' must start with "."`);
    }
  }

  if (settings.lastRun !== null && !isZonedTimestamp(settings.lastRun)) {
    errors.push(`lastRun '${settings.lastRun}' must be an ISO-8601 timestamp with an offset`);
  }

  return errors;
}

/**
 * Parse `HH:MM` into hours and minutes, or null when out of range.
 */
export function parseTimeOfDay(value: string): { hours: number; minutes: number } | null {
  const match = TIME_OF_DAY.exec(value.trim());
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return { hours, minutes };
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isOneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return allowed.some((candidate) => candidate === value);
}

function isZonedTimestamp(value: string): boolean {
  try {
    parseZonedTimestamp(value);
    return true;
  } catch {
    return false;
  }
}
