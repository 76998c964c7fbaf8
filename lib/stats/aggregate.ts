// lib/stats/aggregate.ts
// 純計算：吃已載入的資料列，不碰 DB
import { getDay, subDays } from "date-fns";
import { CATEGORY_OPTIONS, type Category, type DateKey } from "@/lib/models/types";
import { parseDateKey, toDateKey, toMonthKey } from "@/lib/utils/date";

/** set + 所屬 workout 日期 + 種目資訊 */
export type SetFact = {
  setId: string;
  workoutId: string;
  date: DateKey;
  exerciseId: string;
  exerciseName: string;
  variation: string;
  category: Category;
  setNumber: number;
  weight: number;
  reps: number;
  oneRm: number;
};

/* ============================ Periods ============================ */
export type Period = 30 | 90 | 180 | 365 | "all";
export const PERIOD_OPTIONS: Period[] = [30, 90, 180, 365, "all"];

/** 期間起點（含）；"all" 回 null */
export function periodStart(period: Period, today: Date = new Date()): DateKey | null {
  if (period === "all") return null;
  return toDateKey(subDays(today, period));
}

/* ========================== Best records ========================== */
export type BestRecord = {
  exerciseId: string;
  exerciseName: string;
  variation: string;
  category: Category;
  maxWeight: number;
  maxReps: number;
  maxOneRm: number;
};

/** 三個最大值各自獨立，不一定來自同一組 */
export function bestRecords(facts: SetFact[], limit = 10): BestRecord[] {
  const byEx = new Map<string, BestRecord>();
  for (const f of facts) {
    const cur = byEx.get(f.exerciseId);
    if (!cur) {
      byEx.set(f.exerciseId, {
        exerciseId: f.exerciseId,
        exerciseName: f.exerciseName,
        variation: f.variation,
        category: f.category,
        maxWeight: f.weight,
        maxReps: f.reps,
        maxOneRm: f.oneRm,
      });
      continue;
    }
    cur.maxWeight = Math.max(cur.maxWeight, f.weight);
    cur.maxReps = Math.max(cur.maxReps, f.reps);
    cur.maxOneRm = Math.max(cur.maxOneRm, f.oneRm);
  }
  return [...byEx.values()].sort((a, b) => b.maxOneRm - a.maxOneRm).slice(0, limit);
}

/* ======================== Per-date progress ======================== */
export type ProgressPoint = { date: DateKey; value: number };
export type WeightPoint = { date: DateKey; max: number; average: number };

function groupByDate(facts: SetFact[], exerciseId: string): Map<DateKey, SetFact[]> {
  const map = new Map<DateKey, SetFact[]>();
  for (const f of facts) {
    if (f.exerciseId !== exerciseId) continue;
    const list = map.get(f.date);
    if (list) list.push(f);
    else map.set(f.date, [f]);
  }
  return new Map([...map.entries()].sort(([a], [b]) => (a > b ? 1 : -1)));
}

/** 每日最大 1RM */
export function oneRmProgress(facts: SetFact[], exerciseId: string): ProgressPoint[] {
  return [...groupByDate(facts, exerciseId)].map(([date, list]) => ({
    date,
    value: Math.max(...list.map((f) => f.oneRm)),
  }));
}

/** 每日最大／平均重量 */
export function weightProgress(facts: SetFact[], exerciseId: string): WeightPoint[] {
  return [...groupByDate(facts, exerciseId)].map(([date, list]) => ({
    date,
    max: Math.max(...list.map((f) => f.weight)),
    average: list.reduce((s, f) => s + f.weight, 0) / list.length,
  }));
}

/** 每日總量 Σ weight × reps */
export function volumeProgress(facts: SetFact[], exerciseId: string): ProgressPoint[] {
  return [...groupByDate(facts, exerciseId)].map(([date, list]) => ({
    date,
    value: list.reduce((s, f) => s + f.weight * f.reps, 0),
  }));
}

/* ============================ Frequency ============================ */
/**
 * 星期分布：index 0 = 週一 … 6 = 週日。
 * 同一天只算一次；永遠回傳 7 格。
 */
export function weekdayFrequency(dates: DateKey[]): number[] {
  const buckets = [0, 0, 0, 0, 0, 0, 0];
  for (const key of new Set(dates)) {
    const d = parseDateKey(key);
    if (!d) {
      console.warn("[stats] skip malformed workout date", key);
      continue;
    }
    buckets[(getDay(d) + 6) % 7]++;
  }
  return buckets;
}

export type CategoryCount = { category: Category; sets: number };

/** 部位別組數，多到少 */
export function categoryBreakdown(facts: SetFact[]): CategoryCount[] {
  const counts = new Map<Category, number>();
  for (const f of facts) counts.set(f.category, (counts.get(f.category) ?? 0) + 1);
  return CATEGORY_OPTIONS.filter((c) => counts.has(c))
    .map((category) => ({ category, sets: counts.get(category) ?? 0 }))
    .sort((a, b) => b.sets - a.sets);
}

/* ============================= Summary ============================= */
export type WorkoutSummary = {
  totalWorkouts: number;
  totalSets: number;
  averageSetsPerWorkout: number;
  thisMonthWorkouts: number;
  /** 只算 weight > 0 的組 */
  averageWeight: number;
  totalVolume: number;
};

export function workoutSummary(facts: SetFact[], workoutDates: DateKey[], today: Date = new Date()): WorkoutSummary {
  const days = new Set(workoutDates);
  const month = toMonthKey(today);
  const weighted = facts.filter((f) => f.weight > 0);
  return {
    totalWorkouts: days.size,
    totalSets: facts.length,
    averageSetsPerWorkout: days.size > 0 ? facts.length / days.size : 0,
    thisMonthWorkouts: [...days].filter((d) => d.startsWith(`${month}-`)).length,
    averageWeight: weighted.length > 0 ? weighted.reduce((s, f) => s + f.weight, 0) / weighted.length : 0,
    totalVolume: facts.reduce((s, f) => s + f.weight * f.reps, 0),
  };
}

export type ExerciseSummary = {
  totalSets: number;
  maxWeight: number;
  averageWeight: number;
  maxOneRm: number;
  totalVolume: number;
  averageVolumePerSet: number;
};

/** 單一種目的統計表；沒有資料回 null */
export function exerciseSummary(facts: SetFact[]): ExerciseSummary | null {
  if (facts.length === 0) return null;
  const totalVolume = facts.reduce((s, f) => s + f.weight * f.reps, 0);
  return {
    totalSets: facts.length,
    maxWeight: Math.max(...facts.map((f) => f.weight)),
    averageWeight: facts.reduce((s, f) => s + f.weight, 0) / facts.length,
    maxOneRm: Math.max(...facts.map((f) => f.oneRm)),
    totalVolume,
    averageVolumePerSet: totalVolume / facts.length,
  };
}
