// lib/goals/index.ts
import { isAchievementGoalAchieved } from "@/lib/goals/achievement";
import type { Goal } from "@/lib/models/types";

export { deleteGoal, getGoal, listGoals } from "@/lib/db/goals";
export * from "@/lib/goals/achievement";
export * from "@/lib/goals/body";
export * from "@/lib/goals/legacy";

export type GoalStatistics = {
  total: number;
  achieved: number;
  active: number;
  /** 0–100 */
  achievementRate: number;
};

export function isGoalAchieved(g: Goal): boolean {
  return g.kind === "achievement" ? isAchievementGoalAchieved(g) : g.achieved;
}

export function goalStatistics(goals: Goal[]): GoalStatistics {
  const achieved = goals.filter(isGoalAchieved).length;
  return {
    total: goals.length,
    achieved,
    active: goals.length - achieved,
    achievementRate: goals.length > 0 ? (achieved / goals.length) * 100 : 0,
  };
}
