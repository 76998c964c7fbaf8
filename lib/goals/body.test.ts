import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { LiftLogDB } from "@/lib/db";
import { addBodyGoal, saveBodyStats } from "@/lib/db/body";
import { setHeight } from "@/lib/db/meta";
import { NotFoundError } from "@/lib/errors";
import {
  bodyGoalProgress,
  calculateBmi,
  daysRemaining,
  isOverdue,
  overallBodyProgress,
  refreshBodyGoalCurrents,
} from "@/lib/goals/body";
import type { BodyCompositionGoal } from "@/lib/models/types";
import { openTestDB } from "@/lib/testing/openTestDB";

function goal(over: Partial<BodyCompositionGoal>): BodyCompositionGoal {
  return {
    id: "bg",
    name: "cut",
    targetWeight: null,
    targetMuscleMass: null,
    targetBodyFat: null,
    targetBmi: null,
    targetDate: "2024-08-01",
    currentWeight: null,
    currentMuscleMass: null,
    currentBodyFat: null,
    currentBmi: null,
    initialWeight: null,
    initialMuscleMass: null,
    initialBodyFat: null,
    initialBmi: null,
    achieved: false,
    notes: null,
    createdAt: 1,
    updatedAt: 1,
    ...over,
  };
}

describe("bodyGoalProgress", () => {
  it("measures weight loss from the baseline", () => {
    const g = goal({ targetWeight: 65, initialWeight: 75, currentWeight: 70 });
    expect(bodyGoalProgress(g)).toEqual([{ dimension: "weight", status: "ok", percent: 50 }]);
  });

  it("measures weight gain from the baseline", () => {
    const g = goal({ targetWeight: 80, initialWeight: 70, currentWeight: 73 });
    expect(bodyGoalProgress(g)).toEqual([{ dimension: "weight", status: "ok", percent: 30 }]);
  });

  it("clamps movement away from the target to 0", () => {
    const g = goal({ targetWeight: 65, initialWeight: 75, currentWeight: 77 });
    expect(bodyGoalProgress(g)).toEqual([{ dimension: "weight", status: "ok", percent: 0 }]);
  });

  it("reports a missing baseline instead of estimating", () => {
    const g = goal({ targetWeight: 65, currentWeight: 70 });
    expect(bodyGoalProgress(g)).toEqual([{ dimension: "weight", status: "no-baseline" }]);
  });

  it("reports a missing current value", () => {
    const g = goal({ targetBodyFat: 15, initialBodyFat: 20 });
    expect(bodyGoalProgress(g)).toEqual([{ dimension: "bodyFat", status: "no-current" }]);
  });

  it("treats a passed muscle or body fat target as done without a baseline", () => {
    const g = goal({ targetMuscleMass: 35, currentMuscleMass: 36, targetBodyFat: 15, currentBodyFat: 14 });
    expect(bodyGoalProgress(g)).toEqual([
      { dimension: "muscleMass", status: "ok", percent: 100 },
      { dimension: "bodyFat", status: "ok", percent: 100 },
    ]);
  });

  it("averages the numeric dimensions", () => {
    const g = goal({
      targetWeight: 65,
      initialWeight: 75,
      currentWeight: 70,
      targetBodyFat: 15,
      initialBodyFat: 20,
      currentBodyFat: 19,
      targetBmi: 22,
      currentBmi: 23,
    });
    expect(overallBodyProgress(g)).toBe(35);
  });

  it("has no overall progress without numbers", () => {
    expect(overallBodyProgress(goal({ targetWeight: 65 }))).toBeNull();
  });
});

describe("body helpers", () => {
  it("rounds BMI to one decimal", () => {
    expect(calculateBmi(70, 175)).toBe(22.9);
    expect(calculateBmi(70, 0)).toBe(0);
  });

  it("knows when a goal is overdue", () => {
    const today = new Date(2024, 7, 2);
    expect(isOverdue(goal({}), today)).toBe(true);
    expect(isOverdue(goal({ achieved: true }), today)).toBe(false);
    expect(isOverdue(goal({}), new Date(2024, 7, 1))).toBe(false);
  });

  it("counts the days left, never below zero", () => {
    expect(daysRemaining(goal({}), new Date(2024, 6, 22))).toBe(10);
    expect(daysRemaining(goal({}), new Date(2024, 7, 5))).toBe(0);
  });
});

describe("refreshBodyGoalCurrents", () => {
  let db: LiftLogDB;

  beforeEach(async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    db = await openTestDB();
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  it("copies the latest snapshot and derives BMI from height", async () => {
    const g = await addBodyGoal(db, { name: "cut", targetDate: "2024-08-01", targetWeight: 65, initialWeight: 75 });
    await setHeight(db, 175);
    await saveBodyStats(db, { date: "2024-05-01", weight: 72, muscleMass: 30 });
    await saveBodyStats(db, { date: "2024-05-08", weight: 70 });

    const r = await refreshBodyGoalCurrents(db, g.id);
    expect(r).toMatchObject({ currentWeight: 70, currentMuscleMass: null, currentBmi: 22.9 });
    expect(overallBodyProgress(r)).toBe(50);
  });

  it("leaves the goal alone without any snapshot", async () => {
    const g = await addBodyGoal(db, { name: "cut", targetDate: "2024-08-01", targetWeight: 65 });
    expect(await refreshBodyGoalCurrents(db, g.id)).toEqual(g);
  });

  it("rejects an unknown goal", async () => {
    await expect(refreshBodyGoalCurrents(db, "missing")).rejects.toThrow(NotFoundError);
  });
});
