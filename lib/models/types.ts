// File: lib/models/types.ts

/** ===== 基本列舉（字面量） ===== */
/** 種目清單的排序依此順序（非字母序） */
export const CATEGORY_OPTIONS = ["chest", "back", "legs", "shoulders", "arms"] as const;
export type Category = (typeof CATEGORY_OPTIONS)[number];

export function isCategory(v: unknown): v is Category {
  return CATEGORY_OPTIONS.some((c) => c === v);
}

/** YYYY-MM-DD */
export type DateKey = string;
/** YYYY-MM */
export type MonthKey = string;

/** ===== Meta（身高／備份時間） ===== */
export type Meta = {
  id: "app";
  heightCm: number | null;
  lastBackupAt: number | null;
};

/** ===== Exercise（種目，初次開啟時植入） ===== */
export type Exercise = {
  id: string;
  name: string;
  /** 器材：barbell / dumbbell / machine ... */
  variation: string;
  category: Category;
  createdAt: number;
};

/** ===== Workout（一天一場，未強制唯一） ===== */
export type Workout = {
  id: string;
  date: DateKey;
  notes: string | null;
  createdAt: number;
};

/** ===== SetRecord ===== */
export type SetRecord = {
  id: string;
  workoutId: string;
  exerciseId: string;
  setNumber: number;
  /** kg */
  weight: number;
  reps: number;
  /** Epley 估算值，寫入時固定，之後不重算 */
  oneRm: number;
  createdAt: number;
};

/** ===== Goals（兩種目標模型並存，以 kind 區分） ===== */
type GoalBase = {
  id: string;
  exerciseId: string;
  targetWeight: number;
  targetMonth: MonthKey;
  achieved: boolean;
  createdAt: number;
  updatedAt: number;
};

/** 舊版：單一重量門檻，以歷史最佳 1RM 追蹤 */
export type LegacyGoal = GoalBase & {
  kind: "legacy";
  currentWeight: number;
};

/** 新版：重量 × 次數 × 組數，以達標組數追蹤 */
export type AchievementGoal = GoalBase & {
  kind: "achievement";
  targetReps: number;
  targetSets: number;
  currentAchievedSets: number;
  currentMaxWeight: number;
  notes: string | null;
};

export type Goal = LegacyGoal | AchievementGoal;
export type GoalKind = Goal["kind"];

export function isLegacyGoal(g: Goal): g is LegacyGoal {
  return g.kind === "legacy";
}
export function isAchievementGoal(g: Goal): g is AchievementGoal {
  return g.kind === "achievement";
}

/** ===== Body（體組成） ===== */
export type BodyStats = {
  id: string;
  date: DateKey;
  /** kg */
  weight: number | null;
  bodyFatPercentage: number | null;
  /** kg */
  muscleMass: number | null;
  updatedAt: number;
};

export type BodyDimension = "weight" | "muscleMass" | "bodyFat" | "bmi";

export type BodyCompositionGoal = {
  id: string;
  name: string;
  targetWeight: number | null;
  targetMuscleMass: number | null;
  targetBodyFat: number | null;
  targetBmi: number | null;
  targetDate: DateKey;
  currentWeight: number | null;
  currentMuscleMass: number | null;
  currentBodyFat: number | null;
  currentBmi: number | null;
  /** 起始值：只用實際紀錄，不自行推估 */
  initialWeight: number | null;
  initialMuscleMass: number | null;
  initialBodyFat: number | null;
  initialBmi: number | null;
  achieved: boolean;
  notes: string | null;
  createdAt: number;
  updatedAt: number;
};
