import { AppError } from '../../common/errors/app-error.js';

/**
 * Time normalization.
 *
 * Upstream timestamps come in two shapes: offset-bearing (`...+00:00`, `...Z`)
 * or bare local (`2026-01-31T09:31:03`). Both are parsed once into a tagged
 * variant and turned into local wall-clock milliseconds: milliseconds since
 * 1970-01-01T00:00:00 *local*, computed as if local time were UTC. Everything
 * downstream (ordering, day bucketing, baseline comparison) works on that
 * single representation.
 */

export type ParsedTimestamp =
  | { kind: 'offset'; raw: string; utcMs: number; offsetMinutes: number }
  | { kind: 'local'; raw: string; wallMs: number };

const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/;

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function parseOffsetMinutes(raw: string, token: string): number {
  if (token === 'Z') {
    return 0;
  }

  const sign = token.startsWith('-') ? -1 : 1;
  const digits = token.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;

  if (hours > 14 || minutes > 59) {
    throw AppError.malformedTimestamp(raw, `offset ${token} out of range`);
  }

  return sign * (hours * 60 + minutes);
}

/**
 * Parse an upstream timestamp into its tagged form.
 * Throws MALFORMED_TIMESTAMP when the string cannot be read at all.
 */
export function parseTimestamp(raw: string): ParsedTimestamp {
  const input = raw.trim();
  const match = TIMESTAMP_PATTERN.exec(input);

  if (!match) {
    throw AppError.malformedTimestamp(raw, 'unrecognized format');
  }

  const [, y, mo, d, h = '00', mi = '00', s = '00', fraction = '', offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(fraction.slice(0, 3).padEnd(3, '0'));

  if (month < 1 || month > 12) {
    throw AppError.malformedTimestamp(raw, `month ${month} out of range`);
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    throw AppError.malformedTimestamp(raw, `day ${day} out of range`);
  }
  if (hour > 23 || minute > 59 || second > 59) {
    throw AppError.malformedTimestamp(raw, 'time of day out of range');
  }

  const fieldsMs = Date.UTC(year, month - 1, day, hour, minute, second, millis);

  if (offset === undefined) {
    return { kind: 'local', raw, wallMs: fieldsMs };
  }

  const offsetMinutes = parseOffsetMinutes(raw, offset);
  return {
    kind: 'offset',
    raw,
    utcMs: fieldsMs - offsetMinutes * MS_PER_MINUTE,
    offsetMinutes,
  };
}

export function offsetHoursToMs(localOffsetHours: number): number {
  return Math.round(localOffsetHours * 60) * MS_PER_MINUTE;
}

/**
 * Convert an upstream timestamp to local wall-clock milliseconds.
 * Offset-bearing input is moved to UTC by its own offset, then shifted by the
 * fixed local offset. Bare input is taken as already local.
 */
export function normalize(input: string | ParsedTimestamp, localOffsetHours: number): number {
  const parsed = typeof input === 'string' ? parseTimestamp(input) : input;

  switch (parsed.kind) {
    case 'offset':
      return parsed.utcMs + offsetHoursToMs(localOffsetHours);
    case 'local':
      return parsed.wallMs;
  }
}

/**
 * Local wall-clock milliseconds for a real instant.
 */
export function toLocalWallMs(instant: Date, localOffsetHours: number): number {
  return instant.getTime() + offsetHoursToMs(localOffsetHours);
}

/**
 * YYYY-MM-DDTHH:mm:ss (seconds precision, no offset)
 */
export function formatLocal(wallMs: number): string {
  return new Date(wallMs).toISOString().slice(0, 19);
}

export function localDateKey(wallMs: number): string {
  return new Date(wallMs).toISOString().slice(0, 10);
}

export function startOfLocalDay(wallMs: number): number {
  return wallMs - (((wallMs % MS_PER_DAY) + MS_PER_DAY) % MS_PER_DAY);
}

/**
 * Read a persisted local instant or date back into wall-clock milliseconds.
 */
export function parseLocal(value: string): number {
  const parsed = parseTimestamp(value);
  if (parsed.kind !== 'local') {
    throw AppError.malformedTimestamp(value, 'expected a local timestamp without offset');
  }
  return parsed.wallMs;
}

export function isLocalInstant(value: string): boolean {
  try {
    parseLocal(value);
    return true;
  } catch {
    return false;
  }
}

export function isDateKey(value: string): boolean {
  return DATE_KEY_PATTERN.test(value) && isLocalInstant(value);
}

export function addDays(dateKey: string, days: number): string {
  return localDateKey(parseLocal(dateKey) + days * MS_PER_DAY);
}

export function compareDateKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
