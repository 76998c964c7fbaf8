//lib/export/text.ts
import { exerciseDisplayName, getWorkoutByDate, listExercises, listSetsByWorkout, type LiftLogDB } from "@/lib/db";
import type { DateKey, Exercise } from "@/lib/models/types";
import { volumeOf } from "@/lib/stats/oneRm";

/** 某一天的訓練，種目分組，附小計與總量 */
export async function exportWorkoutText(db: LiftLogDB, date: DateKey): Promise<string> {
  const workout = await getWorkoutByDate(db, date);
  const sets = workout ? await listSetsByWorkout(db, workout.id) : [];
  const notesLine = workout?.notes ? `\n[Notes] ${workout.notes}` : "";

  if (sets.length === 0) {
    return `[Date] ${date}${notesLine}\n[Summary] 0 exercises; 0 sets; total 0 kg`;
  }

  const exercises = await listExercises(db);
  const exById = new Map<string, Exercise>();
  exercises.forEach((e) => exById.set(e.id, e));

  type Group = { name: string; rows: string[]; subtotalKg: number };
  const byEx = new Map<string, Group>();

  // 種目依第一次出現的順序
  const ordered = sets.slice().sort((a, b) => a.createdAt - b.createdAt || a.setNumber - b.setNumber);
  for (const s of ordered) {
    let g = byEx.get(s.exerciseId);
    if (!g) {
      const ex = exById.get(s.exerciseId);
      g = { name: ex ? exerciseDisplayName(ex) : "Unknown", rows: [], subtotalKg: 0 };
      byEx.set(s.exerciseId, g);
    }
    g.rows.push(`${s.weight}kg×${s.reps}`);
    g.subtotalKg += volumeOf([s]);
  }

  const blocks: string[] = [];
  for (const g of byEx.values()) {
    blocks.push(`${g.name}\n${g.rows.join(", ")}\nSubtotal ${g.subtotalKg.toFixed(1)} kg`);
  }

  const totalKg = Array.from(byEx.values()).reduce((a, b) => a + b.subtotalKg, 0);

  return `[Date] ${date}${notesLine}

${blocks.join("\n\n")}

[Summary] ${byEx.size} exercises; ${sets.length} sets; total ${totalKg.toFixed(1)} kg`;
}
