// lib/import/csv.ts
// 單一種目的訓練紀錄 CSV：Date, 1 Set [WT], 1 Set [Reps], 1 Set [1RM], … 最多 5 組
import { isValid, parse } from "date-fns";
import { emitDataChanged } from "@/lib/bus";
import { findOrCreateExercise, withTransaction, type LiftLogDB } from "@/lib/db";
import { ImportError } from "@/lib/errors";
import type { DateKey, SetRecord, Workout } from "@/lib/models/types";
import { RepsSchema, WeightSchema, type ExerciseInput } from "@/lib/models/validation";
import { estimateOneRm } from "@/lib/stats/oneRm";
import { toDateKey } from "@/lib/utils/date";
import { safeUUID } from "@/lib/utils/uuid";

export const MAX_CSV_SETS = 5;
const DATE_FORMATS = ["yyyy/MM/dd", "yyyy-MM-dd", "MM/dd/yyyy"];

export type CsvSet = { setNumber: number; weight: number; reps: number };
export type CsvWorkoutRow = { date: DateKey; sets: CsvSet[] };
export type ParsedWorkoutCsv = { rows: CsvWorkoutRow[]; skipped: number };

/** 一行切成欄位；支援雙引號與 "" 跳脫 */
function splitCsvLine(line: string): string[] {
  const out: string[] = [];
  let cur = "";
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        cur += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        cur += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      out.push(cur.trim());
      cur = "";
    } else {
      cur += ch;
    }
  }
  out.push(cur.trim());
  return out;
}

export function parseCsvDate(raw: string): DateKey | null {
  const s = raw.trim();
  for (const fmt of DATE_FORMATS) {
    const d = parse(s, fmt, new Date(2000, 0, 1));
    if (isValid(d)) return toDateKey(d);
  }
  return null;
}

function toNumber(cell: string | undefined): number | null {
  if (cell === undefined || cell === "") return null;
  const n = Number(cell);
  return Number.isFinite(n) ? n : null;
}

/**
 * 解析 CSV。[1RM] 欄不讀（一律重算）。
 * 重量與次數都是正數才算一組；日期讀不懂或沒有任何一組的列略過並計數。
 */
export function parseWorkoutCsv(text: string): ParsedWorkoutCsv {
  const lines = text
    .replace(/^\uFEFF/, "")
    .split(/\r?\n/)
    .filter((l) => l.trim() !== "");
  if (lines.length === 0) throw new ImportError("CSV is empty");

  const header = splitCsvLine(lines[0]);
  const dateCol = header.indexOf("Date");
  if (dateCol < 0) throw new ImportError("CSV has no Date column");

  const setCols: { setNumber: number; wt: number; reps: number }[] = [];
  for (let n = 1; n <= MAX_CSV_SETS; n++) {
    const wt = header.indexOf(`${n} Set [WT]`);
    const reps = header.indexOf(`${n} Set [Reps]`);
    if (wt >= 0 && reps >= 0) setCols.push({ setNumber: n, wt, reps });
  }
  if (setCols.length === 0) throw new ImportError("CSV has no set columns");

  const rows: CsvWorkoutRow[] = [];
  let skipped = 0;
  for (let i = 1; i < lines.length; i++) {
    const cells = splitCsvLine(lines[i]);
    const date = parseCsvDate(cells[dateCol] ?? "");
    if (!date) {
      skipped++;
      console.warn("[import] skip row with unreadable date", { line: i + 1, value: cells[dateCol] });
      continue;
    }

    const sets: CsvSet[] = [];
    for (const col of setCols) {
      const weight = toNumber(cells[col.wt]);
      const reps = toNumber(cells[col.reps]);
      if (weight === null || reps === null || weight <= 0 || reps <= 0) continue;
      const w = WeightSchema.safeParse(weight);
      const r = RepsSchema.safeParse(Math.trunc(reps));
      if (!w.success || !r.success) {
        console.warn("[import] skip out-of-range set", { line: i + 1, set: col.setNumber, weight, reps });
        continue;
      }
      sets.push({ setNumber: col.setNumber, weight: w.data, reps: r.data });
    }
    if (sets.length === 0) {
      skipped++;
      console.warn("[import] skip row without sets", { line: i + 1 });
      continue;
    }
    rows.push({ date, sets });
  }
  return { rows, skipped };
}

export type CsvImportResult = {
  importedWorkouts: number;
  importedSets: number;
  skippedWorkouts: number;
  skippedRows: number;
};

/**
 * 匯入到指定種目。該日已有這個種目的組：預設略過；overwrite 時換掉那些組。
 * 全部在同一個交易內。
 */
export async function importWorkoutCsv(
  db: LiftLogDB,
  text: string,
  opts: { exercise: ExerciseInput; overwrite?: boolean },
): Promise<CsvImportResult> {
  const { rows, skipped } = parseWorkoutCsv(text);
  const exercise = await findOrCreateExercise(db, opts.exercise);
  const overwrite = !!opts.overwrite;

  const result = await withTransaction(db, ["workouts", "sets"], async (tx) => {
    const workouts = tx.objectStore("workouts");
    const sets = tx.objectStore("sets");
    let importedWorkouts = 0;
    let importedSets = 0;
    let skippedWorkouts = 0;

    for (const row of rows) {
      const sameDay = (await workouts.index("by_date").getAll(row.date)).sort((a, b) => a.createdAt - b.createdAt);
      let workout: Workout | undefined = sameDay[0];
      const now = Date.now();

      if (workout) {
        const existing = (await sets.index("by_workout").getAll(workout.id)).filter(
          (s) => s.exerciseId === exercise.id,
        );
        if (existing.length > 0 && !overwrite) {
          skippedWorkouts++;
          continue;
        }
        for (const s of existing) await sets.delete(s.id);
      } else {
        workout = { id: safeUUID(), date: row.date, notes: "CSV import", createdAt: now };
        await workouts.put(workout);
      }

      for (const s of row.sets) {
        const rec: SetRecord = {
          id: safeUUID(),
          workoutId: workout.id,
          exerciseId: exercise.id,
          setNumber: s.setNumber,
          weight: s.weight,
          reps: s.reps,
          oneRm: estimateOneRm(s.weight, s.reps),
          createdAt: now,
        };
        await sets.put(rec);
        importedSets++;
      }
      importedWorkouts++;
    }
    return { importedWorkouts, importedSets, skippedWorkouts };
  });

  const out: CsvImportResult = { ...result, skippedRows: skipped };
  console.info("[import] csv", out);
  emitDataChanged("sets");
  return out;
}
