// lib/db/index.ts
import { openDB, type DBSchema, type IDBPDatabase, type IDBPTransaction, type StoreNames } from "idb";
import { emitDataChanged } from "@/lib/bus";
import { config } from "@/lib/config";
import { migrateGoalRows } from "@/lib/db/migrate";
import seedExercises from "@/lib/db/seed-exercises.json";
import { LiftLogError, NotFoundError, StoreError } from "@/lib/errors";
import type {
  BodyCompositionGoal,
  BodyStats,
  Category,
  DateKey,
  Exercise,
  Goal,
  Meta,
  SetRecord,
  Workout,
} from "@/lib/models/types";
import { CATEGORY_OPTIONS } from "@/lib/models/types";
import {
  ExerciseSchema,
  SetEntrySchema,
  SetInsertSchema,
  WorkoutSchema,
  parseInput,
  type ExerciseInput,
  type SetEntryInput,
  type SetInsertInput,
  type WorkoutInput,
} from "@/lib/models/validation";
import { estimateOneRm } from "@/lib/stats/oneRm";
import { safeUUID } from "@/lib/utils/uuid";

export const DB_VERSION = 2;

// IndexedDB Schema
export interface LiftLogSchema extends DBSchema {
  meta: {
    key: string;
    value: Meta;
  };
  exercises: {
    key: string;
    value: Exercise;
  };
  workouts: {
    key: string;
    value: Workout;
    indexes: { by_date: string };
  };
  sets: {
    key: string;
    value: SetRecord;
    indexes: { by_workout: string; by_exercise: string };
  };
  goals: {
    key: string;
    value: Goal;
    indexes: { by_exercise: string; by_kind_exercise_month: [string, string, string] };
  };
  bodyStats: {
    key: string;
    value: BodyStats;
    indexes: { by_date: string };
  };
  bodyGoals: {
    key: string;
    value: BodyCompositionGoal;
  };
}

export type LiftLogDB = IDBPDatabase<LiftLogSchema>;
export type StoreName = StoreNames<LiftLogSchema>;
export type WriteTx<S extends StoreName[]> = IDBPTransaction<LiftLogSchema, S, "readwrite">;

/* ============================== Open ============================== */
export async function openLiftLogDB(name: string = config.dbName): Promise<LiftLogDB> {
  const db = await openDB<LiftLogSchema>(name, DB_VERSION, {
    async upgrade(db, oldVersion, _newVersion, tx) {
      try {
        if (oldVersion < 1) {
          db.createObjectStore("exercises", { keyPath: "id" });
          const workouts = db.createObjectStore("workouts", { keyPath: "id" });
          workouts.createIndex("by_date", "date");
          const sets = db.createObjectStore("sets", { keyPath: "id" });
          sets.createIndex("by_workout", "workoutId");
          sets.createIndex("by_exercise", "exerciseId");
          db.createObjectStore("goals", { keyPath: "id" });
          const body = db.createObjectStore("bodyStats", { keyPath: "id" });
          body.createIndex("by_date", "date");
        }

        if (oldVersion < 2) {
          // goals：各世代整理成 tagged 形狀後才加唯一索引
          const goals = tx.objectStore("goals");
          const rows: unknown[] = await goals.getAll();
          const migrated = migrateGoalRows(rows);
          await goals.clear();
          for (const g of migrated.goals) await goals.put(g);
          goals.createIndex("by_exercise", "exerciseId");
          goals.createIndex("by_kind_exercise_month", ["kind", "exerciseId", "targetMonth"], { unique: true });
          if (rows.length > 0) {
            console.info("[migrate] goals", {
              kept: migrated.goals.length,
              dropped: migrated.dropped,
              merged: migrated.merged,
            });
          }

          // bodyStats：同一天留最後更新的一筆，by_date 改成唯一
          const body = tx.objectStore("bodyStats");
          const snapshots = await body.getAll();
          const latest = new Map<DateKey, BodyStats>();
          for (const s of snapshots) {
            const cur = latest.get(s.date);
            if (!cur || s.updatedAt >= cur.updatedAt) latest.set(s.date, s);
          }
          for (const s of snapshots) {
            if (latest.get(s.date)?.id !== s.id) await body.delete(s.id);
          }
          body.deleteIndex("by_date");
          body.createIndex("by_date", "date", { unique: true });

          db.createObjectStore("bodyGoals", { keyPath: "id" });
          db.createObjectStore("meta", { keyPath: "id" });
        }
      } catch (e) {
        console.error("[migrate] upgrade failed, aborting", e);
        tx.abort();
      }
    },
    blocked() {
      console.warn("[db] upgrade blocked by another open connection", name);
    },
  });

  await ensureSeed(db);
  await ensureMeta(db);
  return db;
}

/** 種目表空的時候植入參考種目 */
async function ensureSeed(db: LiftLogDB): Promise<void> {
  const inserted = await withTransaction(db, ["exercises"], async (tx) => {
    const store = tx.objectStore("exercises");
    if ((await store.count()) > 0) return 0;
    const now = Date.now();
    for (const raw of seedExercises) {
      const input = parseInput(ExerciseSchema, raw);
      await store.put({ id: safeUUID(), ...input, createdAt: now });
    }
    return seedExercises.length;
  });
  if (inserted > 0) console.info("[db] seeded exercises", inserted);
}

async function ensureMeta(db: LiftLogDB): Promise<void> {
  const meta = await db.get("meta", "app");
  if (!meta) await db.put("meta", { id: "app", heightCm: null, lastBackupAt: null });
}

/* =========================== Transactions =========================== */
// 同一個 handle 上的寫入交易依序執行
const writeLocks = new WeakMap<LiftLogDB, Promise<void>>();

/**
 * 在單一 readwrite 交易內執行 fn。fn 裡只能 await IDB 請求，否則交易會提早 commit。
 * 任何錯誤都會 abort（全部回滾）後重新丟出；非 LiftLogError 包成 StoreError。
 */
export function withTransaction<S extends StoreName[], T>(
  db: LiftLogDB,
  stores: S,
  fn: (tx: WriteTx<S>) => Promise<T>,
): Promise<T> {
  const prev = writeLocks.get(db) ?? Promise.resolve();
  const run = prev.then(() => runInTransaction(db, stores, fn));
  writeLocks.set(
    db,
    run.then(
      () => undefined,
      () => undefined,
    ),
  );
  return run;
}

async function runInTransaction<S extends StoreName[], T>(
  db: LiftLogDB,
  stores: S,
  fn: (tx: WriteTx<S>) => Promise<T>,
): Promise<T> {
  const tx = db.transaction(stores, "readwrite");
  try {
    const result = await fn(tx);
    await tx.done;
    return result;
  } catch (e) {
    try {
      tx.abort();
    } catch (abortErr) {
      console.debug("[db] transaction already finished", abortErr);
    }
    await Promise.allSettled([tx.done]);
    console.error("[db] transaction rolled back", stores, e);
    if (e instanceof LiftLogError) throw e;
    throw new StoreError(`Write to ${stores.join(", ")} failed`, e);
  }
}

/* ============================ Exercises ============================ */
function categoryRank(c: Category): number {
  return CATEGORY_OPTIONS.indexOf(c);
}

function compareByName(a: Exercise, b: Exercise): number {
  return a.name.localeCompare(b.name) || a.variation.localeCompare(b.variation);
}

/** 部位（固定順序）→ 名稱 → 器材 */
export async function listExercises(db: LiftLogDB): Promise<Exercise[]> {
  const all = await db.getAll("exercises");
  return all.sort((a, b) => categoryRank(a.category) - categoryRank(b.category) || compareByName(a, b));
}

export async function listExercisesByCategory(db: LiftLogDB, category: Category): Promise<Exercise[]> {
  const all = await db.getAll("exercises");
  return all.filter((e) => e.category === category).sort(compareByName);
}

export async function getExercise(db: LiftLogDB, id: string): Promise<Exercise | undefined> {
  return (await db.get("exercises", id)) ?? undefined;
}

export async function addExercise(db: LiftLogDB, input: ExerciseInput): Promise<Exercise> {
  const v = parseInput(ExerciseSchema, input);
  const ex: Exercise = { id: safeUUID(), ...v, createdAt: Date.now() };
  await withTransaction(db, ["exercises"], async (tx) => {
    await tx.objectStore("exercises").put(ex);
  });
  emitDataChanged("exercises");
  return ex;
}

/** (name, variation, category) 完全一致就回傳既有的 */
export async function findOrCreateExercise(db: LiftLogDB, input: ExerciseInput): Promise<Exercise> {
  const v = parseInput(ExerciseSchema, input);
  const { exercise, created } = await withTransaction(db, ["exercises"], async (tx) => {
    const store = tx.objectStore("exercises");
    const all = await store.getAll();
    const hit = all.find((e) => e.name === v.name && e.variation === v.variation && e.category === v.category);
    if (hit) return { exercise: hit, created: false };
    const ex: Exercise = { id: safeUUID(), ...v, createdAt: Date.now() };
    await store.put(ex);
    return { exercise: ex, created: true };
  });
  if (created) emitDataChanged("exercises");
  return exercise;
}

export function exerciseDisplayName(e: Pick<Exercise, "name" | "variation">): string {
  return `${e.name} (${e.variation})`;
}

/* ============================= Workouts ============================= */
function byDateThenCreated(a: Workout, b: Workout): number {
  return a.date.localeCompare(b.date) || a.createdAt - b.createdAt;
}

export async function addWorkout(db: LiftLogDB, input: WorkoutInput): Promise<Workout> {
  const v = parseInput(WorkoutSchema, input);
  const w: Workout = { id: safeUUID(), date: v.date, notes: v.notes, createdAt: Date.now() };
  await withTransaction(db, ["workouts"], async (tx) => {
    await tx.objectStore("workouts").put(w);
  });
  emitDataChanged("workouts");
  return w;
}

/** 同日有多筆時取最早建立的 */
export async function getWorkoutByDate(db: LiftLogDB, date: DateKey): Promise<Workout | undefined> {
  const list = await db.getAllFromIndex("workouts", "by_date", date);
  return list.sort(byDateThenCreated)[0];
}

export async function getOrCreateWorkout(db: LiftLogDB, date: DateKey, notes?: string | null): Promise<Workout> {
  const v = parseInput(WorkoutSchema, { date, notes });
  const { workout, created } = await withTransaction(db, ["workouts"], async (tx) => {
    const store = tx.objectStore("workouts");
    const existing = (await store.index("by_date").getAll(v.date)).sort(byDateThenCreated)[0];
    if (existing) return { workout: existing, created: false };
    const w: Workout = { id: safeUUID(), date: v.date, notes: v.notes, createdAt: Date.now() };
    await store.put(w);
    return { workout: w, created: true };
  });
  if (created) emitDataChanged("workouts");
  return workout;
}

export type DateRange = { from?: DateKey; to?: DateKey };

export function inRange(date: DateKey, range: DateRange): boolean {
  if (range.from !== undefined && date < range.from) return false;
  if (range.to !== undefined && date > range.to) return false;
  return true;
}

/** 日期由舊到新 */
export async function listWorkouts(db: LiftLogDB, range: DateRange = {}): Promise<Workout[]> {
  const all = await db.getAll("workouts");
  return all.filter((w) => inRange(w.date, range)).sort(byDateThenCreated);
}

export async function updateWorkoutNotes(db: LiftLogDB, id: string, notes: string | null): Promise<Workout> {
  const next = await withTransaction(db, ["workouts"], async (tx) => {
    const store = tx.objectStore("workouts");
    const cur = await store.get(id);
    if (!cur) throw new NotFoundError("workout", id);
    const trimmed = notes?.trim();
    const w: Workout = { ...cur, notes: trimmed ? trimmed : null };
    await store.put(w);
    return w;
  });
  emitDataChanged("workouts");
  return next;
}

/* =============================== Sets ============================== */
/**
 * 記錄一組：找（或建立）當天的 workout，組號 = 該種目在該 workout 已有組數 + 1，
 * 1RM 在這裡算好存進去。整段在同一個交易內。
 */
export async function logSet(db: LiftLogDB, input: SetEntryInput): Promise<SetRecord> {
  const v = parseInput(SetEntrySchema, input);
  const rec = await withTransaction(db, ["exercises", "workouts", "sets"], async (tx) => {
    if (!(await tx.objectStore("exercises").get(v.exerciseId))) {
      throw new NotFoundError("exercise", v.exerciseId);
    }
    const workouts = tx.objectStore("workouts");
    const now = Date.now();
    let workout = (await workouts.index("by_date").getAll(v.date)).sort(byDateThenCreated)[0];
    if (!workout) {
      workout = { id: safeUUID(), date: v.date, notes: v.notes, createdAt: now };
      await workouts.put(workout);
    }

    const sets = tx.objectStore("sets");
    const inWorkout = await sets.index("by_workout").getAll(workout.id);
    const setNumber = inWorkout.filter((s) => s.exerciseId === v.exerciseId).length + 1;
    const r: SetRecord = {
      id: safeUUID(),
      workoutId: workout.id,
      exerciseId: v.exerciseId,
      setNumber,
      weight: v.weight,
      reps: v.reps,
      oneRm: estimateOneRm(v.weight, v.reps),
      createdAt: now,
    };
    await sets.put(r);
    return r;
  });
  emitDataChanged("sets");
  return rec;
}

/** 寫進既有的 workout（匯入、補登用） */
export async function addSet(db: LiftLogDB, input: SetInsertInput): Promise<SetRecord> {
  const v = parseInput(SetInsertSchema, input);
  const rec = await withTransaction(db, ["exercises", "workouts", "sets"], async (tx) => {
    if (!(await tx.objectStore("workouts").get(v.workoutId))) throw new NotFoundError("workout", v.workoutId);
    if (!(await tx.objectStore("exercises").get(v.exerciseId))) throw new NotFoundError("exercise", v.exerciseId);
    const r: SetRecord = { id: safeUUID(), ...v, oneRm: estimateOneRm(v.weight, v.reps), createdAt: Date.now() };
    await tx.objectStore("sets").put(r);
    return r;
  });
  emitDataChanged("sets");
  return rec;
}

export async function deleteSet(db: LiftLogDB, id: string): Promise<void> {
  await withTransaction(db, ["sets"], async (tx) => {
    const store = tx.objectStore("sets");
    if (!(await store.get(id))) throw new NotFoundError("set", id);
    await store.delete(id);
  });
  emitDataChanged("sets");
}

/** 刪掉 workout 與底下所有 set；回傳刪掉的 set 數 */
export async function deleteWorkoutWithSets(db: LiftLogDB, workoutId: string): Promise<number> {
  const removed = await withTransaction(db, ["workouts", "sets"], async (tx) => {
    const workouts = tx.objectStore("workouts");
    if (!(await workouts.get(workoutId))) throw new NotFoundError("workout", workoutId);
    const sets = tx.objectStore("sets");
    const keys = await sets.index("by_workout").getAllKeys(workoutId);
    for (const k of keys) await sets.delete(k);
    await workouts.delete(workoutId);
    return keys.length;
  });
  // workout 與 set 都變了
  emitDataChanged("all");
  return removed;
}

/** 組號順序 */
export async function listSetsByWorkout(db: LiftLogDB, workoutId: string): Promise<SetRecord[]> {
  if (!workoutId) return [];
  const list = await db.getAllFromIndex("sets", "by_workout", workoutId);
  return list.sort((a, b) => a.setNumber - b.setNumber || a.createdAt - b.createdAt);
}
