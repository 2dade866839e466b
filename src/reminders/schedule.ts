import { ValidationError } from "../errors.js";
import type { ReminderRecord, TimeOfDay } from "./types.js";

export function daysInMonth(year: number, monthIndex: number): number {
  return new Date(year, monthIndex + 1, 0).getDate();
}

/**
 * Local fire time of a monthly reminder within the month containing `ref`.
 * A day past the end of the month falls back to the month's last day.
 */
export function fireTimeInMonth(rem: Pick<ReminderRecord, "dayOfMonth" | "hour" | "minute">, ref: Date): Date {
  const year = ref.getFullYear();
  const month = ref.getMonth();
  const day = Math.min(rem.dayOfMonth, daysInMonth(year, month));
  return new Date(year, month, day, rem.hour, rem.minute, 0, 0);
}

function floorToMinute(ms: number): number {
  return ms - (((ms % 60_000) + 60_000) % 60_000);
}

/**
 * Latest fire time at or before `now` that still counts: this month's once it
 * has passed, otherwise last month's while a failed delivery is pending.
 */
function latestSlot(rem: ReminderRecord, now: Date): number | null {
  const thisMonth = fireTimeInMonth(rem, now).getTime();
  if (thisMonth <= now.getTime()) return thisMonth;
  if (rem.attempts === 0) return null;
  return fireTimeInMonth(rem, new Date(now.getFullYear(), now.getMonth() - 1, 1)).getTime();
}

export function isReminderDue(rem: ReminderRecord, now: Date): boolean {
  const slot = latestSlot(rem, now);
  if (slot === null || slot < floorToMinute(rem.createdAtMs)) return false;
  return rem.lastFiredAtMs === null || rem.lastFiredAtMs < slot;
}

/** Next local fire time strictly after `from`, honouring the last-day fallback. */
export function nextFireTime(rem: Pick<ReminderRecord, "dayOfMonth" | "hour" | "minute">, from: Date): Date {
  const thisMonth = fireTimeInMonth(rem, from);
  if (thisMonth.getTime() > from.getTime()) return thisMonth;
  return fireTimeInMonth(rem, new Date(from.getFullYear(), from.getMonth() + 1, 1));
}

export function parseDayOfMonth(text: string): number {
  const t = String(text ?? "").trim();
  if (!/^\d{1,2}$/.test(t)) throw new ValidationError("day", `"${t}" is not a day of the month`);
  const day = Number(t);
  if (day < 1 || day > 31) throw new ValidationError("day", `day ${day} is outside 1-31`);
  return day;
}

/** Accepts "HH:MM", "H:MM" and "HHMM" in 24-hour time. */
export function parseTimeOfDay(text: string): TimeOfDay {
  const t = String(text ?? "").trim();
  const m = t.match(/^(\d{1,2}):(\d{2})$/) ?? t.match(/^(\d{2})(\d{2})$/);
  if (!m) throw new ValidationError("time", `"${t}" is not a time of day`);
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  if (hour > 23 || minute > 59) throw new ValidationError("time", `"${t}" is outside 00:00-23:59`);
  return { hour, minute };
}

export function formatTimeOfDay(t: TimeOfDay): string {
  return `${String(t.hour).padStart(2, "0")}:${String(t.minute).padStart(2, "0")}`;
}
