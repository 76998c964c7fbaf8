// lib/db/migrate.ts
// 目標資料的世代整理：舊版（只有重量）、新版（重量 × 次數 × 組數）、目前的 tagged 形狀
import { z } from "zod";
import type { Goal, GoalKind } from "@/lib/models/types";
import { MonthKeySchema } from "@/lib/models/validation";

/** sqlite 時代的 0/1 也收 */
const flag = z
  .union([z.boolean(), z.number()])
  .optional()
  .transform((v) => Boolean(v));
const stamp = z
  .number()
  .finite()
  .optional()
  .transform((v) => v ?? 0);
const counter = z
  .number()
  .finite()
  .nonnegative()
  .optional()
  .transform((v) => v ?? 0);

const base = {
  id: z.string().min(1),
  exerciseId: z.string().min(1),
  targetWeight: z.number().finite().positive(),
  targetMonth: MonthKeySchema,
  achieved: flag,
  createdAt: stamp,
  updatedAt: stamp,
};

const StoredLegacySchema = z.object({
  ...base,
  currentWeight: counter,
});

const StoredAchievementSchema = z.object({
  ...base,
  targetReps: z.number().int().min(1),
  targetSets: z.number().int().min(1),
  currentAchievedSets: counter,
  currentMaxWeight: counter,
  notes: z
    .string()
    .nullish()
    .transform((v) => v ?? null),
});

const TaggedGoalSchema = z.discriminatedUnion("kind", [
  StoredLegacySchema.extend({ kind: z.literal("legacy") }),
  StoredAchievementSchema.extend({ kind: z.literal("achievement") }),
]);

function withUpdatedAt<G extends Goal>(g: G): G {
  return g.updatedAt > 0 ? g : { ...g, updatedAt: g.createdAt };
}

/**
 * 任何世代的目標列 → 目前的 Goal；認不出來回 null。
 * 有 kind 的照原樣驗證；有 targetReps/targetSets 的當新版；其餘當舊版。
 */
export function normalizeGoalRow(raw: unknown): Goal | null {
  if (typeof raw !== "object" || raw === null) return null;

  if ("kind" in raw) {
    const r = TaggedGoalSchema.safeParse(raw);
    return r.success ? withUpdatedAt(r.data) : null;
  }
  if ("targetReps" in raw || "targetSets" in raw) {
    const r = StoredAchievementSchema.safeParse(raw);
    return r.success ? withUpdatedAt({ kind: "achievement", ...r.data }) : null;
  }
  const r = StoredLegacySchema.safeParse(raw);
  return r.success ? withUpdatedAt({ kind: "legacy", ...r.data }) : null;
}

export function goalKey(g: { kind: GoalKind; exerciseId: string; targetMonth: string }): string {
  return `${g.kind}|${g.exerciseId}|${g.targetMonth}`;
}

export type GoalMigrationResult = {
  goals: Goal[];
  /** 認不出來的列 */
  dropped: number;
  /** (kind, exercise, month) 重複而被併掉的列 */
  merged: number;
};

/** 整理一批目標列；重複的 (kind, exercise, month) 留 updatedAt 最新的那筆 */
export function migrateGoalRows(rows: unknown[]): GoalMigrationResult {
  const byKey = new Map<string, Goal>();
  let dropped = 0;
  let merged = 0;

  for (const raw of rows) {
    const g = normalizeGoalRow(raw);
    if (!g) {
      dropped++;
      console.warn("[migrate] drop unrecognised goal row", raw);
      continue;
    }
    const key = goalKey(g);
    const cur = byKey.get(key);
    if (cur) {
      merged++;
      if (g.updatedAt >= cur.updatedAt) byKey.set(key, g);
      continue;
    }
    byKey.set(key, g);
  }

  return { goals: [...byKey.values()], dropped, merged };
}
