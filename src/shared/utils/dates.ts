// Calendar arithmetic on ISO YYYY-MM-DD dates (UTC, whole days)

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

export const DAYS_PER_MONTH = 30.44;
export const DAYS_PER_YEAR = 365.25;

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return date.getUTCFullYear() === Number(y)
    && date.getUTCMonth() === Number(m) - 1
    && date.getUTCDate() === Number(d);
}

export function toEpochDay(iso: string): number {
  const match = ISO_DATE.exec(iso);
  if (!match) {
    throw new RangeError(`Not an ISO date: ${iso}`);
  }
  const [, y, m, d] = match;
  return Math.round(Date.UTC(Number(y), Number(m) - 1, Number(d)) / MS_PER_DAY);
}

/** Signed whole days from `from` to `to`. */
export function daysBetween(from: string, to: string): number {
  return toEpochDay(to) - toEpochDay(from);
}

export function monthsBetween(from: string, to: string): number {
  return daysBetween(from, to) / DAYS_PER_MONTH;
}

export function yearsBetween(from: string, to: string): number {
  return daysBetween(from, to) / DAYS_PER_YEAR;
}

export function ageOn(birthDate: string | null, asOf: string): number | null {
  if (birthDate === null) return null;
  return yearsBetween(birthDate, asOf);
}

export function compareIsoDates(a: string, b: string): number {
  // Lexicographic order matches chronological order for YYYY-MM-DD
  return a < b ? -1 : a > b ? 1 : 0;
}

export function todayIso(): string {
  return new Date().toISOString().slice(0, 10);
}
