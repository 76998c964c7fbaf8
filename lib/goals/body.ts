// lib/goals/body.ts
// 體組成目標：起始值一律來自實際紀錄，沒有起始值就不估算進度
import type { LiftLogDB } from "@/lib/db";
import { getBodyGoal, getLatestBodyStats, setBodyGoalCurrents } from "@/lib/db/body";
import { getMeta } from "@/lib/db/meta";
import { NotFoundError } from "@/lib/errors";
import type { BodyCompositionGoal, BodyDimension } from "@/lib/models/types";
import { daysBetween, toDateKey } from "@/lib/utils/date";

export type DimensionProgress =
  | { dimension: BodyDimension; status: "no-baseline" }
  | { dimension: BodyDimension; status: "no-current" }
  | { dimension: BodyDimension; status: "ok"; percent: number };

type Reading = { target: number; current: number | null; initial: number | null };

function clampPercent(moved: number, required: number): number {
  if (required <= 0) return 100;
  return Math.max(0, Math.min(Math.trunc((moved / required) * 100), 100));
}

/** 體重、BMI：增或減由目標與起始值決定 */
function towardTarget(dimension: BodyDimension, r: Reading): DimensionProgress {
  if (r.current === null) return { dimension, status: "no-current" };
  if (r.initial === null) return { dimension, status: "no-baseline" };
  const percent =
    r.target > r.initial
      ? clampPercent(r.current - r.initial, r.target - r.initial)
      : clampPercent(r.initial - r.current, r.initial - r.target);
  return { dimension, status: "ok", percent };
}

/** 肌肉量：增加目標 */
function increase(dimension: BodyDimension, r: Reading): DimensionProgress {
  if (r.current === null) return { dimension, status: "no-current" };
  if (r.current >= r.target) return { dimension, status: "ok", percent: 100 };
  if (r.initial === null) return { dimension, status: "no-baseline" };
  return { dimension, status: "ok", percent: clampPercent(r.current - r.initial, r.target - r.initial) };
}

/** 體脂率：減少目標 */
function decrease(dimension: BodyDimension, r: Reading): DimensionProgress {
  if (r.current === null) return { dimension, status: "no-current" };
  if (r.current <= r.target) return { dimension, status: "ok", percent: 100 };
  if (r.initial === null) return { dimension, status: "no-baseline" };
  return { dimension, status: "ok", percent: clampPercent(r.initial - r.current, r.initial - r.target) };
}

/** 有設目標的維度才回報 */
export function bodyGoalProgress(g: BodyCompositionGoal): DimensionProgress[] {
  const out: DimensionProgress[] = [];
  if (g.targetWeight !== null) {
    out.push(towardTarget("weight", { target: g.targetWeight, current: g.currentWeight, initial: g.initialWeight }));
  }
  if (g.targetMuscleMass !== null) {
    out.push(
      increase("muscleMass", {
        target: g.targetMuscleMass,
        current: g.currentMuscleMass,
        initial: g.initialMuscleMass,
      }),
    );
  }
  if (g.targetBodyFat !== null) {
    out.push(decrease("bodyFat", { target: g.targetBodyFat, current: g.currentBodyFat, initial: g.initialBodyFat }));
  }
  if (g.targetBmi !== null) {
    out.push(towardTarget("bmi", { target: g.targetBmi, current: g.currentBmi, initial: g.initialBmi }));
  }
  return out;
}

/** 有數字的維度取平均（捨去）；一個都沒有回 null */
export function overallBodyProgress(g: BodyCompositionGoal): number | null {
  const percents: number[] = [];
  for (const p of bodyGoalProgress(g)) {
    if (p.status === "ok") percents.push(p.percent);
  }
  if (percents.length === 0) return null;
  return Math.trunc(percents.reduce((s, p) => s + p, 0) / percents.length);
}

/** 小數一位 */
export function calculateBmi(weightKg: number, heightCm: number): number {
  if (weightKg <= 0 || heightCm <= 0) return 0;
  const m = heightCm / 100;
  return Math.round((weightKg / (m * m)) * 10) / 10;
}

export function isOverdue(g: Pick<BodyCompositionGoal, "targetDate" | "achieved">, today: Date = new Date()): boolean {
  return !g.achieved && g.targetDate < toDateKey(today);
}

export function daysRemaining(g: Pick<BodyCompositionGoal, "targetDate">, today: Date = new Date()): number {
  return Math.max(0, daysBetween(g.targetDate, toDateKey(today)) ?? 0);
}

/** 最新體組成（與身高算出的 BMI）寫入目標的 current 欄位；沒有紀錄就不動 */
export async function refreshBodyGoalCurrents(db: LiftLogDB, id: string): Promise<BodyCompositionGoal> {
  const goal = await getBodyGoal(db, id);
  if (!goal) throw new NotFoundError("body goal", id);
  const latest = await getLatestBodyStats(db);
  if (!latest) return goal;

  const { heightCm } = await getMeta(db);
  const weight = latest.weight ?? goal.currentWeight;
  const bmi = weight !== null && heightCm !== null ? calculateBmi(weight, heightCm) : goal.currentBmi;

  return setBodyGoalCurrents(db, id, {
    currentWeight: weight,
    currentMuscleMass: latest.muscleMass ?? goal.currentMuscleMass,
    currentBodyFat: latest.bodyFatPercentage ?? goal.currentBodyFat,
    currentBmi: bmi,
  });
}
