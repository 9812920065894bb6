import { MonthKey } from "./types";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Calendar day of a transaction date, which may carry a time part. */
export function dayOf(dateOrTimestamp: string): string {
  return dateOrTimestamp.slice(0, 10);
}

export function monthKeyOf(dateOrTimestamp: string): MonthKey {
  return dateOrTimestamp.slice(0, 7);
}

export function monthKeyForDate(d: Date): MonthKey {
  return `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}`;
}

export function parseMonthKey(month: MonthKey): { year: number; month1to12: number } {
  const m = /^(\d{4})-(\d{2})$/.exec(month);
  if (!m) throw new Error(`Invalid month key: ${month}`);
  return { year: Number(m[1]), month1to12: Number(m[2]) };
}

export function addMonths(month: MonthKey, delta: number): MonthKey {
  const { year, month1to12 } = parseMonthKey(month);
  const d = new Date(Date.UTC(year, month1to12 - 1 + delta, 1));
  return monthKeyForDate(d);
}

/** Whole months from `b` to `a` (positive when `a` is later). */
export function monthsBetween(a: MonthKey, b: MonthKey): number {
  const pa = parseMonthKey(a);
  const pb = parseMonthKey(b);
  return (pa.year - pb.year) * 12 + (pa.month1to12 - pb.month1to12);
}

export function daysInMonth(month: MonthKey): number {
  const { year, month1to12 } = parseMonthKey(month);
  return new Date(Date.UTC(year, month1to12, 0)).getUTCDate();
}

export function monthRange(month: MonthKey): { startDate: string; endDate: string } {
  return { startDate: `${month}-01`, endDate: `${month}-${pad2(daysInMonth(month))}` };
}

export function addDaysISO(dateISO: string, days: number): string {
  const d = new Date(dateISO + "T00:00:00Z");
  d.setUTCDate(d.getUTCDate() + days);
  return isoDate(d);
}

export function weekdayOf(dateISO: string): number {
  return new Date(dateISO + "T00:00:00Z").getUTCDay();
}

export function dayOfMonth(dateISO: string): number {
  return Number(dateISO.slice(8, 10));
}

export function hoursBetween(olderISO: string, newer: Date): number {
  return (newer.getTime() - new Date(olderISO).getTime()) / (60 * 60 * 1000);
}

/** Whole years between a birth date and `asOf`. */
export function ageAt(birthDateISO: string, asOf: Date): number {
  const birth = new Date(dayOf(birthDateISO) + "T00:00:00Z");
  let age = asOf.getUTCFullYear() - birth.getUTCFullYear();
  const beforeBirthday =
    asOf.getUTCMonth() < birth.getUTCMonth() ||
    (asOf.getUTCMonth() === birth.getUTCMonth() && asOf.getUTCDate() < birth.getUTCDate());
  if (beforeBirthday) age -= 1;
  return age;
}
