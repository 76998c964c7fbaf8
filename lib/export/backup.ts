// lib/export/backup.ts
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { format } from "date-fns";
import { emitDataChanged } from "@/lib/bus";
import { config } from "@/lib/config";
import { withTransaction, type LiftLogDB } from "@/lib/db";
import { setMeta } from "@/lib/db/meta";
import { migrateGoalRows } from "@/lib/db/migrate";
import { ImportError, fromZodError } from "@/lib/errors";
import { BackupV1Schema, type BackupV1 } from "@/lib/models/backup";
import type { Exercise } from "@/lib/models/types";
import { estimateOneRm } from "@/lib/stats/oneRm";

/** 遞迴排序鍵，確保序列化穩定（避免 checksum 受鍵序影響） */
function stableStringify(value: unknown): string {
  const sort = (v: unknown): unknown => {
    if (Array.isArray(v)) return v.map(sort);
    if (v !== null && typeof v === "object") {
      const entries: [string, unknown][] = Object.entries(v);
      const out: Record<string, unknown> = {};
      for (const [k, val] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) out[k] = sort(val);
      return out;
    }
    return v;
  };
  return JSON.stringify(sort(value));
}

async function sha256Hex(text: string) {
  const data = new TextEncoder().encode(text);
  const buf = await crypto.subtle.digest("SHA-256", data);
  return Array.from(new Uint8Array(buf))
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

/** 讀 DB → 組 bundle（含 checksum） */
export async function exportBackup(db: LiftLogDB, now: Date = new Date()): Promise<BackupV1> {
  const [exercises, workouts, sets, goals, bodyStats, bodyGoals] = await Promise.all([
    db.getAll("exercises"),
    db.getAll("workouts"),
    db.getAll("sets"),
    db.getAll("goals"),
    db.getAll("bodyStats"),
    db.getAll("bodyGoals"),
  ]);
  const base: Omit<BackupV1, "checksum"> = {
    app: "LiftLog",
    kind: "backup",
    version: 1,
    exportedAt: now.toISOString(),
    exercises,
    workouts,
    sets,
    goals,
    bodyStats,
    bodyGoals,
  };
  const hex = await sha256Hex(stableStringify(base));
  return { ...base, checksum: `sha256:${hex}` };
}

/** 解析 + 結構驗證 + checksum 驗證 */
export async function parseAndValidateBackup(text: string): Promise<BackupV1> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ImportError(`Backup is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = BackupV1Schema.safeParse(raw);
  if (!parsed.success) {
    throw new ImportError(`Backup has an unexpected shape: ${fromZodError(parsed.error).issues.join("; ")}`);
  }
  const { checksum, ...without } = parsed.data;
  const expected = await sha256Hex(stableStringify(without));
  if (checksum !== `sha256:${expected}` && checksum !== expected) {
    throw new ImportError("Checksum mismatch");
  }
  return parsed.data;
}

function exerciseKey(e: Pick<Exercise, "name" | "variation" | "category">): string {
  return `${e.name}|${e.variation}|${e.category}`;
}

export type ApplyBackupResult = { applied: number; skipped: number };

/**
 * 一個交易寫入全部資料；預設不覆蓋同 id。
 * 已有同名種目（名稱、器材、部位都相同）時不新增，改指向既有的那筆。
 * 目標經 migrateGoalRows 整理；set 的 1RM 依重量與次數重算。
 */
export async function applyBackup(
  db: LiftLogDB,
  bundle: BackupV1,
  opts: { overwrite?: boolean } = {},
): Promise<ApplyBackupResult> {
  const overwrite = !!opts.overwrite;
  const { goals } = migrateGoalRows(bundle.goals);

  const result = await withTransaction(
    db,
    ["exercises", "workouts", "sets", "goals", "bodyStats", "bodyGoals"],
    async (tx) => {
      let applied = 0;
      let skipped = 0;

      // 同 (name, variation, category) 的種目沿用既有的 id，set 與目標跟著換
      const exercises = tx.objectStore("exercises");
      const idByKey = new Map<string, string>();
      for (const e of await exercises.getAll()) idByKey.set(exerciseKey(e), e.id);
      const remapped = new Map<string, string>();
      for (const row of bundle.exercises) {
        const sameId = await exercises.get(row.id);
        const match = sameId ? undefined : idByKey.get(exerciseKey(row));
        if (match) {
          remapped.set(row.id, match);
          skipped++;
          continue;
        }
        if (!overwrite && sameId) {
          skipped++;
          continue;
        }
        await exercises.put(row);
        idByKey.set(exerciseKey(row), row.id);
        applied++;
      }
      const exerciseIdOf = (id: string) => remapped.get(id) ?? id;

      const workouts = tx.objectStore("workouts");
      for (const row of bundle.workouts) {
        if (!overwrite && (await workouts.get(row.id))) {
          skipped++;
          continue;
        }
        await workouts.put(row);
        applied++;
      }

      const sets = tx.objectStore("sets");
      for (const row of bundle.sets) {
        const exerciseId = exerciseIdOf(row.exerciseId);
        const orphan = !(await workouts.get(row.workoutId)) || !(await exercises.get(exerciseId));
        if (orphan || (!overwrite && (await sets.get(row.id)))) {
          skipped++;
          continue;
        }
        await sets.put({ ...row, exerciseId, oneRm: estimateOneRm(row.weight, row.reps) });
        applied++;
      }

      // 唯一鍵撞到別的 id：覆寫模式刪掉舊的，否則略過
      const goalStore = tx.objectStore("goals");
      for (const raw of goals) {
        const g = { ...raw, exerciseId: exerciseIdOf(raw.exerciseId) };
        const clash = await goalStore.index("by_kind_exercise_month").get([g.kind, g.exerciseId, g.targetMonth]);
        const same = await goalStore.get(g.id);
        if (!overwrite && (same || clash)) {
          skipped++;
          continue;
        }
        if (clash && clash.id !== g.id) await goalStore.delete(clash.id);
        await goalStore.put(g);
        applied++;
      }

      const bodyStats = tx.objectStore("bodyStats");
      for (const row of bundle.bodyStats) {
        const clash = await bodyStats.index("by_date").get(row.date);
        const same = await bodyStats.get(row.id);
        if (!overwrite && (same || clash)) {
          skipped++;
          continue;
        }
        if (clash && clash.id !== row.id) await bodyStats.delete(clash.id);
        await bodyStats.put(row);
        applied++;
      }

      const bodyGoals = tx.objectStore("bodyGoals");
      for (const row of bundle.bodyGoals) {
        if (!overwrite && (await bodyGoals.get(row.id))) {
          skipped++;
          continue;
        }
        await bodyGoals.put(row);
        applied++;
      }

      return { applied, skipped };
    },
  );

  console.info("[backup] applied", { ...result, overwrite });
  emitDataChanged("all");
  return result;
}

export function backupFileName(now: Date = new Date()): string {
  return `lift-log-backup-${format(now, "yyyyMMdd_HHmmss")}.json`;
}

/** 寫出備份檔並記下 lastBackupAt；回傳檔案路徑 */
export async function writeBackupFile(
  db: LiftLogDB,
  dir: string = config.backupDir,
  now: Date = new Date(),
): Promise<string> {
  const bundle = await exportBackup(db, now);
  await mkdir(dir, { recursive: true });
  const path = join(dir, backupFileName(now));
  await writeFile(path, JSON.stringify(bundle, null, 2), "utf8");
  await setMeta(db, { lastBackupAt: now.getTime() });
  console.info("[backup] wrote", path);
  return path;
}
