// lib/db/body.ts
import { emitDataChanged } from "@/lib/bus";
import { inRange, withTransaction, type DateRange, type LiftLogDB } from "@/lib/db";
import { NotFoundError } from "@/lib/errors";
import type { BodyCompositionGoal, BodyStats } from "@/lib/models/types";
import {
  BodyGoalSchema,
  BodyStatsSchema,
  parseInput,
  type BodyGoalInput,
  type BodyStatsInput,
} from "@/lib/models/validation";
import { safeUUID } from "@/lib/utils/uuid";

/* ============================ Body stats ============================ */
/** 一天一筆：同日期就覆寫 */
export async function saveBodyStats(db: LiftLogDB, input: BodyStatsInput): Promise<BodyStats> {
  const v = parseInput(BodyStatsSchema, input);
  const saved = await withTransaction(db, ["bodyStats"], async (tx) => {
    const store = tx.objectStore("bodyStats");
    const cur = await store.index("by_date").get(v.date);
    const row: BodyStats = {
      id: cur?.id ?? safeUUID(),
      date: v.date,
      weight: v.weight,
      bodyFatPercentage: v.bodyFatPercentage,
      muscleMass: v.muscleMass,
      updatedAt: Date.now(),
    };
    await store.put(row);
    return row;
  });
  emitDataChanged("bodyStats");
  return saved;
}

export async function listBodyStats(db: LiftLogDB, range: DateRange = {}): Promise<BodyStats[]> {
  const all = await db.getAllFromIndex("bodyStats", "by_date");
  return all.filter((s) => inRange(s.date, range));
}

export async function getLatestBodyStats(db: LiftLogDB): Promise<BodyStats | undefined> {
  const cursor = await db.transaction("bodyStats").store.index("by_date").openCursor(null, "prev");
  return cursor?.value;
}

export async function deleteBodyStats(db: LiftLogDB, id: string): Promise<void> {
  await withTransaction(db, ["bodyStats"], async (tx) => {
    const store = tx.objectStore("bodyStats");
    if (!(await store.get(id))) throw new NotFoundError("body stats", id);
    await store.delete(id);
  });
  emitDataChanged("bodyStats");
}

/* ======================= Body composition goals ======================= */
export async function addBodyGoal(db: LiftLogDB, input: BodyGoalInput): Promise<BodyCompositionGoal> {
  const v = parseInput(BodyGoalSchema, input);
  const now = Date.now();
  const goal: BodyCompositionGoal = { id: safeUUID(), ...v, achieved: false, createdAt: now, updatedAt: now };
  await withTransaction(db, ["bodyGoals"], async (tx) => {
    await tx.objectStore("bodyGoals").put(goal);
  });
  emitDataChanged("bodyGoals");
  return goal;
}

/** 欄位整組替換；achieved 與 createdAt 保留 */
export async function updateBodyGoal(db: LiftLogDB, id: string, input: BodyGoalInput): Promise<BodyCompositionGoal> {
  const v = parseInput(BodyGoalSchema, input);
  return patchBodyGoal(db, id, v);
}

export async function markBodyGoalAchieved(db: LiftLogDB, id: string): Promise<BodyCompositionGoal> {
  return patchBodyGoal(db, id, { achieved: true });
}

export type BodyGoalCurrents = Pick<
  BodyCompositionGoal,
  "currentWeight" | "currentMuscleMass" | "currentBodyFat" | "currentBmi"
>;

export async function setBodyGoalCurrents(
  db: LiftLogDB,
  id: string,
  currents: BodyGoalCurrents,
): Promise<BodyCompositionGoal> {
  return patchBodyGoal(db, id, currents);
}

async function patchBodyGoal(
  db: LiftLogDB,
  id: string,
  patch: Partial<Omit<BodyCompositionGoal, "id" | "createdAt">>,
): Promise<BodyCompositionGoal> {
  const next = await withTransaction(db, ["bodyGoals"], async (tx) => {
    const store = tx.objectStore("bodyGoals");
    const cur = await store.get(id);
    if (!cur) throw new NotFoundError("body goal", id);
    const g: BodyCompositionGoal = { ...cur, ...patch, id, createdAt: cur.createdAt, updatedAt: Date.now() };
    await store.put(g);
    return g;
  });
  emitDataChanged("bodyGoals");
  return next;
}

export async function deleteBodyGoal(db: LiftLogDB, id: string): Promise<void> {
  await withTransaction(db, ["bodyGoals"], async (tx) => {
    const store = tx.objectStore("bodyGoals");
    if (!(await store.get(id))) throw new NotFoundError("body goal", id);
    await store.delete(id);
  });
  emitDataChanged("bodyGoals");
}

export async function getBodyGoal(db: LiftLogDB, id: string): Promise<BodyCompositionGoal | undefined> {
  return (await db.get("bodyGoals", id)) ?? undefined;
}

/** 期限近的在前 */
export async function listBodyGoals(
  db: LiftLogDB,
  opts: { includeAchieved?: boolean } = {},
): Promise<BodyCompositionGoal[]> {
  const all = await db.getAll("bodyGoals");
  return all
    .filter((g) => opts.includeAchieved !== false || !g.achieved)
    .sort((a, b) => a.targetDate.localeCompare(b.targetDate) || a.createdAt - b.createdAt);
}
