/**
 * NewsScout — Run Identifiers
 *
 * Format: {PREFIX}-{YYYY}-{MMDD}-{SEQ}, e.g. RUN-2026-1019-K3F9QX
 */

import { nanoid } from 'nanoid';

export function generateRunId(prefix = 'RUN', now: Date = new Date()): string {
  const year = now.getUTCFullYear();
  const month = String(now.getUTCMonth() + 1).padStart(2, '0');
  const day = String(now.getUTCDate()).padStart(2, '0');
  const seq = nanoid(6).toUpperCase();

  return `${prefix}-${year}-${month}${day}-${seq}`;
}

/**
 * Filename-safe UTC timestamp: YYYYMMDD_HHMMSS.
 */
export function fileTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}
