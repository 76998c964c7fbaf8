// lib/config.ts
import { z } from "zod";
import { fromZodError } from "@/lib/errors";

const ConfigSchema = z.object({
  LIFTLOG_DB_NAME: z.string().min(1).default("lift-log"),
  LIFTLOG_BACKUP_DIR: z.string().min(1).default("backup"),
  LIFTLOG_TOP_RECORDS: z.coerce.number().int().positive().default(10),
  LIFTLOG_STREAK_SCAN_DAYS: z.coerce.number().int().positive().default(30),
  LIFTLOG_ALMOST_THERE_SETS: z.coerce.number().int().positive().default(1),
});

export type LiftLogConfig = {
  dbName: string;
  backupDir: string;
  /** 最佳紀錄排行顯示幾筆 */
  topRecords: number;
  /** 目前連續天數只往回看最近 N 個訓練日 */
  streakScanDays: number;
  /** 剩幾組以內算「快達成」 */
  almostThereSets: number;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): LiftLogConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) throw fromZodError(parsed.error);
  const e = parsed.data;
  return {
    dbName: e.LIFTLOG_DB_NAME,
    backupDir: e.LIFTLOG_BACKUP_DIR,
    topRecords: e.LIFTLOG_TOP_RECORDS,
    streakScanDays: e.LIFTLOG_STREAK_SCAN_DAYS,
    almostThereSets: e.LIFTLOG_ALMOST_THERE_SETS,
  };
}

export const config = loadConfig();
