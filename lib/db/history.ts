// lib/db/history.ts
import { inRange, type DateRange, type LiftLogDB } from "@/lib/db";
import type { DateKey, SetRecord } from "@/lib/models/types";

export type ExerciseRecord = SetRecord & { date: DateKey };

/** 某種目最近的紀錄：新日期在前、同日依組號，最多 10 筆；沒有回 null */
export async function getLastExerciseRecord(db: LiftLogDB, exerciseId: string): Promise<ExerciseRecord[] | null> {
  const [sets, workouts] = await Promise.all([
    db.getAllFromIndex("sets", "by_exercise", exerciseId),
    db.getAll("workouts"),
  ]);
  const dateOf = new Map(workouts.map((w) => [w.id, w.date]));
  const rows: ExerciseRecord[] = [];
  for (const s of sets) {
    const date = dateOf.get(s.workoutId);
    if (date) rows.push({ ...s, date });
  }
  if (rows.length === 0) return null;
  rows.sort((a, b) => b.date.localeCompare(a.date) || a.setNumber - b.setNumber);
  return rows.slice(0, 10);
}

export type HistoryFilter = DateRange & { exerciseId?: string };
export type HistoryPage = HistoryFilter & { limit?: number; offset?: number };

export type HistoryRow = {
  setId: string;
  date: DateKey;
  exerciseName: string;
  variation: string;
  setNumber: number;
  weight: number;
  reps: number;
  oneRm: number;
};

async function loadHistoryRows(db: LiftLogDB, filter: HistoryFilter): Promise<HistoryRow[]> {
  const [sets, workouts, exercises] = await Promise.all([
    filter.exerciseId ? db.getAllFromIndex("sets", "by_exercise", filter.exerciseId) : db.getAll("sets"),
    db.getAll("workouts"),
    db.getAll("exercises"),
  ]);
  const workoutById = new Map(workouts.map((w) => [w.id, w]));
  const exerciseById = new Map(exercises.map((e) => [e.id, e]));

  const rows: { row: HistoryRow; createdAt: number }[] = [];
  for (const s of sets) {
    const w = workoutById.get(s.workoutId);
    const e = exerciseById.get(s.exerciseId);
    if (!w || !e || !inRange(w.date, filter)) continue;
    rows.push({
      createdAt: s.createdAt,
      row: {
        setId: s.id,
        date: w.date,
        exerciseName: e.name,
        variation: e.variation,
        setNumber: s.setNumber,
        weight: s.weight,
        reps: s.reps,
        oneRm: s.oneRm,
      },
    });
  }
  // 日期新到舊，同日依寫入順序
  rows.sort((a, b) => b.row.date.localeCompare(a.row.date) || a.createdAt - b.createdAt || a.row.setNumber - b.row.setNumber);
  return rows.map((r) => r.row);
}

export async function getHistory(db: LiftLogDB, page: HistoryPage = {}): Promise<HistoryRow[]> {
  const { limit = 100, offset = 0, ...filter } = page;
  const rows = await loadHistoryRows(db, filter);
  return rows.slice(offset, offset + limit);
}

export async function countHistory(db: LiftLogDB, filter: HistoryFilter = {}): Promise<number> {
  return (await loadHistoryRows(db, filter)).length;
}

export async function countAllSets(db: LiftLogDB): Promise<number> {
  return db.count("sets");
}
