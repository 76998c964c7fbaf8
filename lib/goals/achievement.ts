// lib/goals/achievement.ts
// 新版目標：「X kg × Y 次 × Z 組」，以單次訓練內達標的組數追蹤
import { config } from "@/lib/config";
import type { LiftLogDB } from "@/lib/db";
import { getGoal, insertGoal, listGoals, replaceGoal } from "@/lib/db/goals";
import { NotFoundError } from "@/lib/errors";
import { isAchievementGoal, type AchievementGoal, type SetRecord } from "@/lib/models/types";
import { AchievementGoalSchema, parseInput, type AchievementGoalInput } from "@/lib/models/validation";
import { safeUUID } from "@/lib/utils/uuid";

type GoalTarget = Pick<AchievementGoal, "targetWeight" | "targetReps">;

export async function addAchievementGoal(db: LiftLogDB, input: AchievementGoalInput): Promise<AchievementGoal> {
  const v = parseInput(AchievementGoalSchema, input);
  const now = Date.now();
  return insertGoal(db, {
    kind: "achievement",
    id: safeUUID(),
    ...v,
    currentAchievedSets: 0,
    currentMaxWeight: 0,
    achieved: false,
    createdAt: now,
    updatedAt: now,
  });
}

/**
 * 目標欄位替換。種目、重量或次數變了就依新條件重算進度並取消 achieved；
 * 只改組數、月份、備註時進度保留。
 */
export async function updateAchievementGoal(
  db: LiftLogDB,
  id: string,
  input: AchievementGoalInput,
): Promise<AchievementGoal> {
  const v = parseInput(AchievementGoalSchema, input);
  const sets = await db.getAllFromIndex("sets", "by_exercise", v.exerciseId);
  const { goal } = await replaceGoal(db, id, isAchievementGoal, (cur) => {
    const criteriaChanged =
      cur.exerciseId !== v.exerciseId || cur.targetWeight !== v.targetWeight || cur.targetReps !== v.targetReps;
    if (!criteriaChanged) return { ...cur, ...v };
    return {
      ...cur,
      ...v,
      currentAchievedSets: countAchievedSets(sets, v),
      currentMaxWeight: sets.reduce((max, s) => Math.max(max, s.weight), 0),
      achieved: false,
    };
  });
  return goal;
}

export async function markAchievementGoalAchieved(db: LiftLogDB, id: string): Promise<AchievementGoal> {
  const { goal } = await replaceGoal(db, id, isAchievementGoal, (cur) => ({
    ...cur,
    currentAchievedSets: cur.targetSets,
    achieved: true,
  }));
  return goal;
}

export function achievementProgress(achievedSets: number, targetSets: number): number {
  if (targetSets <= 0) return 0;
  return Math.max(0, Math.min(Math.trunc((achievedSets / targetSets) * 100), 100));
}

export function isAchievementGoalAchieved(g: AchievementGoal): boolean {
  return g.achieved || g.currentAchievedSets >= g.targetSets;
}

export function remainingSets(achievedSets: number, targetSets: number): number {
  return Math.max(0, targetSets - achievedSets);
}

export function isQualifyingSet(set: { weight: number; reps: number }, goal: GoalTarget): boolean {
  return set.weight >= goal.targetWeight && set.reps >= goal.targetReps;
}

/** 每場訓練各自數達標組數，取最好的一場 */
export function countAchievedSets(sets: Pick<SetRecord, "workoutId" | "weight" | "reps">[], goal: GoalTarget): number {
  const perWorkout = new Map<string, number>();
  for (const s of sets) {
    if (!isQualifyingSet(s, goal)) continue;
    perWorkout.set(s.workoutId, (perWorkout.get(s.workoutId) ?? 0) + 1);
  }
  return Math.max(0, ...perWorkout.values());
}

/** 重算達標組數與最大重量，只往上更新 */
export async function refreshAchievementGoal(
  db: LiftLogDB,
  id: string,
): Promise<{ goal: AchievementGoal; changed: boolean }> {
  const found = await getGoal(db, id);
  if (!found || !isAchievementGoal(found)) throw new NotFoundError("goal", id);
  const sets = await db.getAllFromIndex("sets", "by_exercise", found.exerciseId);
  const maxWeight = sets.reduce((max, s) => Math.max(max, s.weight), 0);

  return replaceGoal(db, id, isAchievementGoal, (cur) => {
    const achievedSets = countAchievedSets(sets, cur);
    const next = {
      ...cur,
      currentAchievedSets: Math.max(cur.currentAchievedSets, achievedSets),
      currentMaxWeight: Math.max(cur.currentMaxWeight, maxWeight),
    };
    const same =
      next.currentAchievedSets === cur.currentAchievedSets && next.currentMaxWeight === cur.currentMaxWeight;
    return same ? null : next;
  });
}

export async function refreshAllAchievementGoals(db: LiftLogDB): Promise<number> {
  const goals = (await listGoals(db, "achievement")).filter((g) => !g.achieved);
  let updated = 0;
  for (const g of goals) {
    const { changed } = await refreshAchievementGoal(db, g.id);
    if (changed) updated++;
  }
  console.info("[goals] refreshed achievement goals", { checked: goals.length, updated });
  return updated;
}

/** 快達成：還沒達成、已有進度、剩下的組數在門檻內 */
export function almostThereGoals(goals: AchievementGoal[], threshold: number = config.almostThereSets): AchievementGoal[] {
  return goals.filter((g) => {
    if (isAchievementGoalAchieved(g) || g.currentAchievedSets <= 0) return false;
    const left = remainingSets(g.currentAchievedSets, g.targetSets);
    return left > 0 && left <= threshold;
  });
}

export function describeTarget(g: Pick<AchievementGoal, "targetWeight" | "targetReps" | "targetSets">): string {
  return `${g.targetWeight}kg × ${g.targetReps} reps × ${g.targetSets} sets`;
}
