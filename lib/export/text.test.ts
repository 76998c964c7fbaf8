import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { addWorkout, logSet, type LiftLogDB } from "@/lib/db";
import { exportWorkoutText } from "@/lib/export/text";
import { openTestDB, seededExercise } from "@/lib/testing/openTestDB";

let db: LiftLogDB;

beforeEach(async () => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  db = await openTestDB();
  let clock = 1_000;
  vi.spyOn(Date, "now").mockImplementation(() => ++clock);
});

afterEach(() => {
  db.close();
  vi.restoreAllMocks();
});

describe("exportWorkoutText", () => {
  it("groups sets by exercise in the order they were logged", async () => {
    const bench = await seededExercise(db, "Bench Press", "barbell");
    const squat = await seededExercise(db, "Squat", "barbell");
    await logSet(db, { date: "2024-05-01", exerciseId: bench.id, weight: 100, reps: 5, notes: "heavy day" });
    await logSet(db, { date: "2024-05-01", exerciseId: squat.id, weight: 140, reps: 5 });
    await logSet(db, { date: "2024-05-01", exerciseId: bench.id, weight: 102.5, reps: 3 });

    expect(await exportWorkoutText(db, "2024-05-01")).toBe(
      [
        "[Date] 2024-05-01",
        "[Notes] heavy day",
        "",
        "Bench Press (barbell)",
        "100kg×5, 102.5kg×3",
        "Subtotal 807.5 kg",
        "",
        "Squat (barbell)",
        "140kg×5",
        "Subtotal 700.0 kg",
        "",
        "[Summary] 2 exercises; 3 sets; total 1507.5 kg",
      ].join("\n"),
    );
  });

  it("prints an empty summary for a day without sets", async () => {
    expect(await exportWorkoutText(db, "2024-05-02")).toBe(
      "[Date] 2024-05-02\n[Summary] 0 exercises; 0 sets; total 0 kg",
    );
  });

  it("keeps the notes of a workout without sets", async () => {
    await addWorkout(db, { date: "2024-05-03", notes: "rest" });
    expect(await exportWorkoutText(db, "2024-05-03")).toBe(
      "[Date] 2024-05-03\n[Notes] rest\n[Summary] 0 exercises; 0 sets; total 0 kg",
    );
  });
});
