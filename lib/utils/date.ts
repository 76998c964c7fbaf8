// lib/utils/date.ts
import { differenceInCalendarDays, format, isValid, parse } from "date-fns";
import type { DateKey, MonthKey } from "@/lib/models/types";

const DATE_KEY_RE = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_KEY_RE = /^\d{4}-\d{2}$/;

/** Date → YYYY-MM-DD（本地時區） */
export function toDateKey(d: Date): DateKey {
  return format(d, "yyyy-MM-dd");
}

export function toMonthKey(d: Date): MonthKey {
  return format(d, "yyyy-MM");
}

/** 解析 YYYY-MM-DD；格式錯或日期不存在（2024-02-30）回 null */
export function parseDateKey(key: string): Date | null {
  if (!DATE_KEY_RE.test(key)) return null;
  const d = parse(key, "yyyy-MM-dd", new Date(2000, 0, 1));
  return isValid(d) ? d : null;
}

export function isDateKey(key: string): boolean {
  return parseDateKey(key) !== null;
}

export function isMonthKey(key: string): boolean {
  if (!MONTH_KEY_RE.test(key)) return false;
  return isValid(parse(key, "yyyy-MM", new Date(2000, 0, 1)));
}

/** a - b（日曆天） */
export function daysBetween(a: DateKey, b: DateKey): number | null {
  const da = parseDateKey(a);
  const db = parseDateKey(b);
  if (!da || !db) return null;
  return differenceInCalendarDays(da, db);
}
