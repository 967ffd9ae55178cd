/**
 * Форматирование длительностей и биллинг.
 * Все длительности — в секундах; доли секунды отбрасываются при выводе.
 */

export interface BillingInfo {
  hours: number;
  billableAmount: number;
  rate: number;
}

function splitSeconds(seconds: number): { hours: number; minutes: number; secs: number } {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  return {
    hours: Math.floor(total / 3600),
    minutes: Math.floor((total % 3600) / 60),
    secs: total % 60,
  };
}

/** HH:MM:SS; hours grow past two digits instead of wrapping. */
export function formatTimerDisplay(seconds: number): string {
  const { hours, minutes, secs } = splitSeconds(seconds);
  return [hours, minutes, secs].map((part) => part.toString().padStart(2, '0')).join(':');
}

/** Inverse of formatTimerDisplay; anything that is not H+:MM:SS is 0. */
export function parseTimerDisplay(display: string): number {
  const match = /^(\d+):([0-5]\d):([0-5]\d)$/.exec(display.trim());
  if (!match) {
    return 0;
  }
  return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
}

/** "1h 1m 1s"; zero components are omitted, "0s" for an empty duration. */
export function formatDurationDetailed(seconds: number): string {
  const { hours, minutes, secs } = splitSeconds(seconds);
  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);
  return parts.join(' ');
}

const ISO_DURATION =
  /^P(?:(\d+(?:\.\d+)?)D)?(?:T(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/**
 * ISO-8601 duration (PT1H30M45S) → whole seconds.
 * Absent components count as 0; malformed or missing input is 0.
 */
export function parseIsoDuration(duration: string | null | undefined): number {
  if (!duration) {
    return 0;
  }
  const match = ISO_DURATION.exec(duration.trim());
  if (!match) {
    return 0;
  }
  const [, days, hours, minutes, seconds] = match;
  const value = (part: string | undefined) => (part ? Number(part) : 0);
  return Math.floor(
    value(days) * 86400 + value(hours) * 3600 + value(minutes) * 60 + value(seconds),
  );
}

export function calculateBilling(durationSeconds: number, hourlyRate: number): BillingInfo {
  const hours = Math.max(0, durationSeconds) / 3600;
  return {
    hours,
    billableAmount: hours * hourlyRate,
    rate: hourlyRate,
  };
}

export function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

export function formatHours(hours: number): string {
  return `${hours.toFixed(2)}h`;
}

/** Current calendar month in UTC: [start of month, start of next month). */
export function currentMonthRange(nowMs: number): { start: Date; end: Date } {
  const now = new Date(nowMs);
  const start = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
  const end = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + 1, 1));
  return { start, end };
}

/** ISO timestamp → seconds since epoch, or null when unparsable. */
export function parseTimestamp(value: string | null | undefined): number | null {
  if (!value) {
    return null;
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms / 1000;
}
