// lib/stats/streak.ts
import type { DateKey } from "@/lib/models/types";
import { daysBetween, isDateKey, toDateKey } from "@/lib/utils/date";

function distinctValid(dates: DateKey[]): DateKey[] {
  const out = new Set<DateKey>();
  for (const d of dates) {
    if (!isDateKey(d)) {
      console.warn("[stats] skip malformed workout date", d);
      continue;
    }
    out.add(d);
  }
  return [...out];
}

/**
 * 目前連續天數：從 today 往回走。
 * 跟上一個計入的日期（一開始是 today）同一天或差一天就算連續，
 * 差兩天以上就中斷。只看最近 scanDays 個訓練日；未來日期不算。
 */
export function currentStreak(dates: DateKey[], today: Date = new Date(), scanDays = 30): number {
  const todayKey = toDateKey(today);
  const recent = distinctValid(dates)
    .filter((d) => d <= todayKey)
    .sort((a, b) => (a < b ? 1 : -1))
    .slice(0, scanDays);

  let streak = 0;
  let cursor = todayKey;
  for (const d of recent) {
    const gap = daysBetween(cursor, d);
    if (gap === null || gap > 1) break;
    streak++;
    cursor = d;
  }
  return streak;
}

/** 全期間最長連續天數 */
export function maxStreak(dates: DateKey[]): number {
  const asc = distinctValid(dates).sort();
  let best = 0;
  let run = 0;
  let prev: DateKey | null = null;
  for (const d of asc) {
    run = prev !== null && daysBetween(d, prev) === 1 ? run + 1 : 1;
    if (run > best) best = run;
    prev = d;
  }
  return best;
}
