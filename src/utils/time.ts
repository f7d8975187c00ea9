export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function daysToMs(days: number): number {
  return days * MS_PER_DAY;
}

export function toIso(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

export function parseIsoToMs(value: string): number | undefined {
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function ageInDays(nowMs: number, iso: string): number | undefined {
  const then = parseIsoToMs(iso);
  if (then === undefined) {
    return undefined;
  }
  return (nowMs - then) / MS_PER_DAY;
}

/** `YYYYMMDD_HHMMSS` in UTC, used to name backups of damaged files. */
export function fileStamp(epochMs: number): string {
  const date = new Date(epochMs);
  const pad = (value: number) => value.toString().padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}
