// lib/goals/legacy.ts
// 舊版目標：單一重量門檻，current 追蹤該種目的歷史最佳 1RM
import type { LiftLogDB } from "@/lib/db";
import { getGoal, insertGoal, listGoals, replaceGoal } from "@/lib/db/goals";
import { NotFoundError } from "@/lib/errors";
import { isLegacyGoal, type LegacyGoal } from "@/lib/models/types";
import { LegacyGoalSchema, parseInput, type LegacyGoalInput } from "@/lib/models/validation";
import { safeUUID } from "@/lib/utils/uuid";

export async function addLegacyGoal(db: LiftLogDB, input: LegacyGoalInput): Promise<LegacyGoal> {
  const v = parseInput(LegacyGoalSchema, input);
  const now = Date.now();
  return insertGoal(db, {
    kind: "legacy",
    id: safeUUID(),
    ...v,
    achieved: false,
    createdAt: now,
    updatedAt: now,
  });
}

/** 欄位整組替換（achieved 保留） */
export async function updateLegacyGoal(db: LiftLogDB, id: string, input: LegacyGoalInput): Promise<LegacyGoal> {
  const v = parseInput(LegacyGoalSchema, input);
  const { goal } = await replaceGoal(db, id, isLegacyGoal, (cur) => ({ ...cur, ...v }));
  return goal;
}

export async function markLegacyGoalAchieved(db: LiftLogDB, id: string): Promise<LegacyGoal> {
  const { goal } = await replaceGoal(db, id, isLegacyGoal, (cur) => ({
    ...cur,
    currentWeight: cur.targetWeight,
    achieved: true,
  }));
  return goal;
}

/** 0–100，無條件捨去 */
export function legacyProgress(current: number, target: number): number {
  if (target <= 0) return 0;
  return Math.max(0, Math.min(Math.trunc((current / target) * 100), 100));
}

/** 該種目存過的最大 1RM；沒紀錄回 0 */
export async function bestStoredOneRm(db: LiftLogDB, exerciseId: string): Promise<number> {
  const sets = await db.getAllFromIndex("sets", "by_exercise", exerciseId);
  return sets.reduce((max, s) => (Number.isFinite(s.oneRm) && s.oneRm > max ? s.oneRm : max), 0);
}

/** 只往上更新；回傳是否有寫入 */
export async function refreshLegacyGoal(db: LiftLogDB, id: string): Promise<{ goal: LegacyGoal; changed: boolean }> {
  const found = await getGoal(db, id);
  if (!found || !isLegacyGoal(found)) throw new NotFoundError("goal", id);
  const best = await bestStoredOneRm(db, found.exerciseId);
  return replaceGoal(db, id, isLegacyGoal, (cur) => (best > cur.currentWeight ? { ...cur, currentWeight: best } : null));
}

/** 未達成的舊版目標全部重算；回傳更新筆數 */
export async function refreshAllLegacyGoals(db: LiftLogDB): Promise<number> {
  const goals = (await listGoals(db, "legacy")).filter((g) => !g.achieved);
  let updated = 0;
  for (const g of goals) {
    const { changed } = await refreshLegacyGoal(db, g.id);
    if (changed) updated++;
  }
  console.info("[goals] refreshed legacy goals", { checked: goals.length, updated });
  return updated;
}

/** 數字已到但還沒標記達成的 */
export function achievableLegacyGoals(goals: LegacyGoal[]): LegacyGoal[] {
  return goals.filter((g) => !g.achieved && g.currentWeight >= g.targetWeight);
}
