// lib/db/goals.ts
import { emitDataChanged } from "@/lib/bus";
import { withTransaction, type LiftLogDB, type WriteTx } from "@/lib/db";
import { goalKey } from "@/lib/db/migrate";
import { NotFoundError, ValidationError } from "@/lib/errors";
import type { Goal, GoalKind } from "@/lib/models/types";

/** 目標月份舊到新 */
export async function listGoals<K extends GoalKind = GoalKind>(
  db: LiftLogDB,
  kind?: K,
): Promise<Extract<Goal, { kind: K }>[]> {
  const all = await db.getAll("goals");
  return all
    .filter((g): g is Extract<Goal, { kind: K }> => kind === undefined || g.kind === kind)
    .sort((a, b) => a.targetMonth.localeCompare(b.targetMonth) || a.createdAt - b.createdAt);
}

export async function getGoal(db: LiftLogDB, id: string): Promise<Goal | undefined> {
  return (await db.get("goals", id)) ?? undefined;
}

export async function deleteGoal(db: LiftLogDB, id: string): Promise<void> {
  await withTransaction(db, ["goals"], async (tx) => {
    const store = tx.objectStore("goals");
    if (!(await store.get(id))) throw new NotFoundError("goal", id);
    await store.delete(id);
  });
  emitDataChanged("goals");
}

/** (kind, exercise, month) 已有別的目標就擋下 */
async function assertUnique(tx: WriteTx<("goals" | "exercises")[]>, g: Goal): Promise<void> {
  if (!(await tx.objectStore("exercises").get(g.exerciseId))) throw new NotFoundError("exercise", g.exerciseId);
  const clash = await tx
    .objectStore("goals")
    .index("by_kind_exercise_month")
    .get([g.kind, g.exerciseId, g.targetMonth]);
  if (clash && clash.id !== g.id) {
    throw new ValidationError([`a goal already exists for ${goalKey(g)}`]);
  }
}

export async function insertGoal<G extends Goal>(db: LiftLogDB, goal: G): Promise<G> {
  await withTransaction(db, ["goals", "exercises"], async (tx) => {
    await assertUnique(tx, goal);
    await tx.objectStore("goals").put(goal);
  });
  emitDataChanged("goals");
  return goal;
}

/**
 * 讀目前的列交給 build 產生新版本後寫回。build 回傳 null 表示不需要寫。
 * 回傳寫入後的列（沒寫就是原本的列）與是否有寫。
 */
export async function replaceGoal<G extends Goal>(
  db: LiftLogDB,
  id: string,
  narrow: (g: Goal) => g is G,
  build: (cur: G) => G | null,
): Promise<{ goal: G; changed: boolean }> {
  const out = await withTransaction(db, ["goals", "exercises"], async (tx) => {
    const cur = await tx.objectStore("goals").get(id);
    if (!cur || !narrow(cur)) throw new NotFoundError("goal", id);
    const next = build(cur);
    if (!next) return { goal: cur, changed: false };
    const row: G = { ...next, id, createdAt: cur.createdAt, updatedAt: Date.now() };
    await assertUnique(tx, row);
    await tx.objectStore("goals").put(row);
    return { goal: row, changed: true };
  });
  if (out.changed) emitDataChanged("goals");
  return out;
}
