// lib/models/validation.ts
import { z } from "zod";
import { fromZodError } from "@/lib/errors";
import { CATEGORY_OPTIONS } from "@/lib/models/types";
import { isDateKey, isMonthKey } from "@/lib/utils/date";

/** 輸入值限制 */
export const WEIGHT_MAX = 500;
export const WEIGHT_STEP = 0.5;
export const REPS_MIN = 1;
export const REPS_MAX = 50;

export const DateKeySchema = z.string().refine(isDateKey, "date must be a real day in YYYY-MM-DD");
export const MonthKeySchema = z.string().trim().refine(isMonthKey, "month must be YYYY-MM");

const notes = z
  .string()
  .trim()
  .nullish()
  .transform((v) => (v ? v : null));

export const WeightSchema = z
  .number({ invalid_type_error: "weight must be a number" })
  .finite()
  .positive("weight must be greater than 0")
  .max(WEIGHT_MAX, `weight must be ${WEIGHT_MAX}kg or less`)
  .refine((w) => Math.round(w / WEIGHT_STEP) * WEIGHT_STEP === w, `weight must be a multiple of ${WEIGHT_STEP}kg`);

export const RepsSchema = z
  .number({ invalid_type_error: "reps must be a number" })
  .int("reps must be a whole number")
  .min(REPS_MIN, `reps must be at least ${REPS_MIN}`)
  .max(REPS_MAX, `reps must be ${REPS_MAX} or less`);

/* ============================= Sets ============================= */
export const SetEntrySchema = z.object({
  date: DateKeySchema,
  exerciseId: z.string().min(1),
  weight: WeightSchema,
  reps: RepsSchema,
  notes,
});
export type SetEntryInput = z.input<typeof SetEntrySchema>;

export const SetInsertSchema = z.object({
  workoutId: z.string().min(1),
  exerciseId: z.string().min(1),
  setNumber: z.number().int().positive(),
  weight: WeightSchema,
  reps: RepsSchema,
});
export type SetInsertInput = z.input<typeof SetInsertSchema>;

export const WorkoutSchema = z.object({
  date: DateKeySchema,
  notes,
});
export type WorkoutInput = z.input<typeof WorkoutSchema>;

/* =========================== Exercises =========================== */
export const ExerciseSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  variation: z.string().trim().min(1, "variation is required"),
  category: z.enum(CATEGORY_OPTIONS),
});
export type ExerciseInput = z.input<typeof ExerciseSchema>;

/* ============================= Goals ============================= */
export const LegacyGoalSchema = z.object({
  exerciseId: z.string().min(1, "exercise is required"),
  targetWeight: z.number().finite().positive("target weight must be greater than 0"),
  currentWeight: z.number().finite().nonnegative().default(0),
  targetMonth: MonthKeySchema,
});
export type LegacyGoalInput = z.input<typeof LegacyGoalSchema>;

export const AchievementGoalSchema = z.object({
  exerciseId: z.string().min(1, "exercise is required"),
  targetWeight: z.number().finite().positive("target weight must be greater than 0"),
  targetReps: z.number().int().min(1, "target reps must be at least 1"),
  targetSets: z.number().int().min(1, "target sets must be at least 1"),
  targetMonth: MonthKeySchema,
  notes,
});
export type AchievementGoalInput = z.input<typeof AchievementGoalSchema>;

/* ============================= Body ============================= */
const measurement = z.number().finite().positive().nullish().transform((v) => v ?? null);

export const BodyStatsSchema = z
  .object({
    date: DateKeySchema,
    weight: measurement,
    bodyFatPercentage: z.number().finite().gt(0).lt(100).nullish().transform((v) => v ?? null),
    muscleMass: measurement,
  })
  .refine(
    (s) => s.weight !== null || s.bodyFatPercentage !== null || s.muscleMass !== null,
    "at least one measurement is required",
  );
export type BodyStatsInput = z.input<typeof BodyStatsSchema>;

export const BodyGoalSchema = z
  .object({
    name: z.string().trim().min(1, "goal name is required"),
    targetDate: DateKeySchema,
    targetWeight: measurement,
    targetMuscleMass: measurement,
    targetBodyFat: measurement,
    targetBmi: measurement,
    currentWeight: measurement,
    currentMuscleMass: measurement,
    currentBodyFat: measurement,
    currentBmi: measurement,
    initialWeight: measurement,
    initialMuscleMass: measurement,
    initialBodyFat: measurement,
    initialBmi: measurement,
    notes,
  })
  .refine(
    (g) =>
      g.targetWeight !== null || g.targetMuscleMass !== null || g.targetBodyFat !== null || g.targetBmi !== null,
    "at least one target is required",
  );
export type BodyGoalInput = z.input<typeof BodyGoalSchema>;

export const HeightSchema = z.number().finite().min(50).max(272);

/** 驗證失敗丟 ValidationError；成功回傳轉換後的值 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const r = schema.safeParse(value);
  if (!r.success) throw fromZodError(r.error);
  return r.data;
}
