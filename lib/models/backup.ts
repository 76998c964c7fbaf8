// lib/models/backup.ts
import { z } from "zod";
import { CATEGORY_OPTIONS } from "@/lib/models/types";
import { DateKeySchema } from "@/lib/models/validation";

const nullableNumber = z.number().finite().nullable();

export const ExerciseExportSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  variation: z.string().min(1),
  category: z.enum(CATEGORY_OPTIONS),
  createdAt: z.number(),
});

export const WorkoutExportSchema = z.object({
  id: z.string().min(1),
  date: DateKeySchema,
  notes: z.string().nullable(),
  createdAt: z.number(),
});

export const SetRecordExportSchema = z.object({
  id: z.string().min(1),
  workoutId: z.string().min(1),
  exerciseId: z.string().min(1),
  setNumber: z.number().int().positive(),
  weight: z.number().finite().positive(),
  reps: z.number().int().positive(),
  oneRm: z.number().finite(),
  createdAt: z.number(),
});
export type SetRecordExport = z.infer<typeof SetRecordExportSchema>;

export const BodyStatsExportSchema = z.object({
  id: z.string().min(1),
  date: DateKeySchema,
  weight: nullableNumber,
  bodyFatPercentage: nullableNumber,
  muscleMass: nullableNumber,
  updatedAt: z.number(),
});

export const BodyGoalExportSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  targetWeight: nullableNumber,
  targetMuscleMass: nullableNumber,
  targetBodyFat: nullableNumber,
  targetBmi: nullableNumber,
  targetDate: DateKeySchema,
  currentWeight: nullableNumber,
  currentMuscleMass: nullableNumber,
  currentBodyFat: nullableNumber,
  currentBmi: nullableNumber,
  initialWeight: nullableNumber,
  initialMuscleMass: nullableNumber,
  initialBodyFat: nullableNumber,
  initialBmi: nullableNumber,
  achieved: z.boolean(),
  notes: z.string().nullable(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

/** 備份檔格式（含 checksum）；goals 收任何世代的列，套用時再整理 */
export const BackupV1Schema = z.object({
  app: z.literal("LiftLog"),
  kind: z.literal("backup"),
  version: z.literal(1),
  exportedAt: z.string(), // ISO
  exercises: z.array(ExerciseExportSchema),
  workouts: z.array(WorkoutExportSchema),
  sets: z.array(SetRecordExportSchema),
  goals: z.array(z.unknown()),
  bodyStats: z.array(BodyStatsExportSchema),
  bodyGoals: z.array(BodyGoalExportSchema),
  checksum: z.string(),
});

export type BackupV1 = z.infer<typeof BackupV1Schema>;
