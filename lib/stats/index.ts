// lib/stats/index.ts
// DB → SetFact，然後交給 aggregate 的純函式
import { config } from "@/lib/config";
import { inRange, type DateRange, type LiftLogDB } from "@/lib/db";
import type { DateKey } from "@/lib/models/types";
import {
  bestRecords,
  categoryBreakdown,
  exerciseSummary,
  oneRmProgress,
  periodStart,
  volumeProgress,
  weekdayFrequency,
  weightProgress,
  workoutSummary,
  type BestRecord,
  type CategoryCount,
  type ExerciseSummary,
  type Period,
  type ProgressPoint,
  type SetFact,
  type WeightPoint,
  type WorkoutSummary,
} from "@/lib/stats/aggregate";
import { currentStreak, maxStreak } from "@/lib/stats/streak";
import { isDateKey, toDateKey } from "@/lib/utils/date";

export * from "@/lib/stats/aggregate";
export * from "@/lib/stats/oneRm";
export * from "@/lib/stats/streak";

export type FactFilter = DateRange & { exerciseId?: string };

/** 壞掉的列（日期格式錯、找不到 workout/種目、數字不是有限值）略過並記錄 */
export async function loadSetFacts(db: LiftLogDB, filter: FactFilter = {}): Promise<SetFact[]> {
  const [sets, workouts, exercises] = await Promise.all([
    filter.exerciseId ? db.getAllFromIndex("sets", "by_exercise", filter.exerciseId) : db.getAll("sets"),
    db.getAll("workouts"),
    db.getAll("exercises"),
  ]);
  const workoutById = new Map(workouts.map((w) => [w.id, w]));
  const exerciseById = new Map(exercises.map((e) => [e.id, e]));

  const facts: SetFact[] = [];
  let skipped = 0;
  for (const s of sets) {
    const w = workoutById.get(s.workoutId);
    const e = exerciseById.get(s.exerciseId);
    const numeric = Number.isFinite(s.weight) && Number.isFinite(s.reps) && Number.isFinite(s.oneRm);
    if (!w || !e || !numeric || !isDateKey(w.date)) {
      skipped++;
      continue;
    }
    if (!inRange(w.date, filter)) continue;
    facts.push({
      setId: s.id,
      workoutId: w.id,
      date: w.date,
      exerciseId: e.id,
      exerciseName: e.name,
      variation: e.variation,
      category: e.category,
      setNumber: s.setNumber,
      weight: s.weight,
      reps: s.reps,
      oneRm: s.oneRm,
    });
  }
  if (skipped > 0) console.warn("[stats] skipped malformed set rows", skipped);
  return facts;
}

async function workoutDates(db: LiftLogDB, range: DateRange = {}): Promise<DateKey[]> {
  const all = await db.getAll("workouts");
  return all.map((w) => w.date).filter((d) => inRange(d, range));
}

function rangeFor(period: Period, today: Date): DateRange {
  const from = periodStart(period, today);
  return from === null ? {} : { from, to: toDateKey(today) };
}

export async function getBestRecords(db: LiftLogDB, limit: number = config.topRecords): Promise<BestRecord[]> {
  return bestRecords(await loadSetFacts(db), limit);
}

export type Streaks = { current: number; max: number };

export async function getStreaks(
  db: LiftLogDB,
  today: Date = new Date(),
  scanDays: number = config.streakScanDays,
): Promise<Streaks> {
  const dates = await workoutDates(db);
  return { current: currentStreak(dates, today, scanDays), max: maxStreak(dates) };
}

export type ExerciseProgress = {
  oneRm: ProgressPoint[];
  weight: WeightPoint[];
  volume: ProgressPoint[];
};

export async function getExerciseProgress(
  db: LiftLogDB,
  exerciseId: string,
  period: Period = "all",
  today: Date = new Date(),
): Promise<ExerciseProgress> {
  const facts = await loadSetFacts(db, { exerciseId, ...rangeFor(period, today) });
  return {
    oneRm: oneRmProgress(facts, exerciseId),
    weight: weightProgress(facts, exerciseId),
    volume: volumeProgress(facts, exerciseId),
  };
}

export async function getWeekdayFrequency(db: LiftLogDB, range: DateRange = {}): Promise<number[]> {
  return weekdayFrequency(await workoutDates(db, range));
}

export async function getCategoryBreakdown(db: LiftLogDB, range: DateRange = {}): Promise<CategoryCount[]> {
  return categoryBreakdown(await loadSetFacts(db, range));
}

export async function getWorkoutSummary(db: LiftLogDB, today: Date = new Date()): Promise<WorkoutSummary> {
  const [facts, dates] = await Promise.all([loadSetFacts(db), workoutDates(db)]);
  return workoutSummary(facts, dates, today);
}

export async function getExerciseSummary(db: LiftLogDB, exerciseId: string): Promise<ExerciseSummary | null> {
  return exerciseSummary(await loadSetFacts(db, { exerciseId }));
}
