import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { addExercise, listExercises, logSet, type LiftLogDB } from "@/lib/db";
import { addBodyGoal, listBodyStats, saveBodyStats } from "@/lib/db/body";
import { getMeta } from "@/lib/db/meta";
import { ImportError } from "@/lib/errors";
import {
  applyBackup,
  backupFileName,
  exportBackup,
  parseAndValidateBackup,
  writeBackupFile,
} from "@/lib/export/backup";
import { addLegacyGoal, getGoal, listGoals } from "@/lib/goals";
import type { Exercise } from "@/lib/models/types";
import { openTestDB, seededExercise } from "@/lib/testing/openTestDB";

let db: LiftLogDB;
let other: LiftLogDB;
let bench: Exercise;
const exportedAt = new Date("2024-05-01T00:00:00.000Z");

beforeEach(async () => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  db = await openTestDB();
  other = await openTestDB();
  bench = await seededExercise(db, "Bench Press", "barbell");
  await logSet(db, { date: "2024-05-01", exerciseId: bench.id, weight: 100, reps: 5 });
  await addLegacyGoal(db, { exerciseId: bench.id, targetWeight: 120, targetMonth: "2024-06" });
  await saveBodyStats(db, { date: "2024-05-01", weight: 72 });
  await addBodyGoal(db, { name: "cut", targetDate: "2024-08-01", targetWeight: 68 });
});

afterEach(() => {
  db.close();
  other.close();
  vi.restoreAllMocks();
});

describe("exportBackup", () => {
  it("bundles every store with a checksum", async () => {
    const bundle = await exportBackup(db, exportedAt);
    expect(bundle).toMatchObject({ app: "LiftLog", kind: "backup", version: 1, exportedAt: "2024-05-01T00:00:00.000Z" });
    expect(bundle.exercises).toHaveLength(35);
    expect(bundle.workouts).toHaveLength(1);
    expect(bundle.sets).toHaveLength(1);
    expect(bundle.goals).toHaveLength(1);
    expect(bundle.bodyStats).toHaveLength(1);
    expect(bundle.bodyGoals).toHaveLength(1);
    expect(bundle.checksum).toMatch(/^sha256:[0-9a-f]{64}$/);
  });
});

describe("parseAndValidateBackup", () => {
  it("accepts its own output", async () => {
    const bundle = await exportBackup(db, exportedAt);
    expect(await parseAndValidateBackup(JSON.stringify(bundle))).toEqual(bundle);
  });

  it("does not depend on key order", async () => {
    const { checksum, ...rest } = await exportBackup(db, exportedAt);
    const reordered = { checksum, ...Object.fromEntries(Object.entries(rest).reverse()) };
    await expect(parseAndValidateBackup(JSON.stringify(reordered))).resolves.toMatchObject({ checksum });
  });

  it("rejects edited data", async () => {
    const bundle = await exportBackup(db, exportedAt);
    const edited = { ...bundle, sets: bundle.sets.map((s) => ({ ...s, reps: 6 })) };
    await expect(parseAndValidateBackup(JSON.stringify(edited))).rejects.toThrow("Checksum mismatch");
  });

  it("rejects text that is not JSON", async () => {
    await expect(parseAndValidateBackup("{")).rejects.toThrow(ImportError);
    await expect(parseAndValidateBackup("{")).rejects.toThrow(/^Backup is not valid JSON/);
  });

  it("rejects a file from somewhere else", async () => {
    await expect(parseAndValidateBackup(JSON.stringify({ app: "Other" }))).rejects.toThrow(
      /^Backup has an unexpected shape/,
    );
  });
});

describe("applyBackup", () => {
  it("restores into a fresh database onto its own exercise list", async () => {
    const bundle = await exportBackup(db, exportedAt);
    expect(await applyBackup(other, bundle)).toEqual({ applied: 5, skipped: 35 });
    expect(await other.count("exercises")).toBe(35);

    const otherBench = await seededExercise(other, "Bench Press", "barbell");
    const benches = (await listExercises(other)).filter((e) => e.name === "Bench Press" && e.variation === "barbell");
    expect(benches).toHaveLength(1);
    const restored = await other.getAll("sets");
    expect(restored.map((s) => s.exerciseId)).toEqual([otherBench.id]);
    const [goal] = await listGoals(other);
    expect(goal.exerciseId).toBe(otherBench.id);
  });

  it("keeps exercises the target database does not have", async () => {
    const press = await addExercise(db, { name: "Landmine Press", variation: "barbell", category: "shoulders" });
    await logSet(db, { date: "2024-05-02", exerciseId: press.id, weight: 40, reps: 8 });
    const bundle = await exportBackup(db, exportedAt);

    expect(await applyBackup(other, bundle)).toEqual({ applied: 8, skipped: 35 });
    expect(await other.get("exercises", press.id)).toMatchObject({ name: "Landmine Press" });
    expect(await other.count("exercises")).toBe(36);
  });

  it("skips existing rows unless told to overwrite", async () => {
    const bundle = await exportBackup(db, exportedAt);
    expect(await applyBackup(db, bundle)).toEqual({ applied: 0, skipped: 40 });
    expect(await applyBackup(db, bundle, { overwrite: true })).toEqual({ applied: 40, skipped: 0 });
    expect(await db.count("goals")).toBe(1);
  });

  it("replaces a snapshot on the same date when overwriting", async () => {
    const bundle = await exportBackup(db, exportedAt);
    await saveBodyStats(other, { date: "2024-05-01", weight: 80 });
    await applyBackup(other, bundle, { overwrite: true });
    const stats = await listBodyStats(other);
    expect(stats).toHaveLength(1);
    expect(stats[0]).toMatchObject({ id: bundle.bodyStats[0].id, weight: 72 });
  });

  it("skips orphan sets, recomputes one-rep max and upgrades old goal rows", async () => {
    const bundle = await exportBackup(db, exportedAt);
    const [set] = bundle.sets;
    const oldGoal = {
      id: "old",
      exerciseId: bench.id,
      targetWeight: 120,
      currentWeight: 80,
      targetMonth: "2024-06",
      achieved: 1,
      createdAt: 5,
    };
    const patched = {
      ...bundle,
      sets: [{ ...set, oneRm: 1 }, { ...set, id: "orphan", workoutId: "ghost" }],
      goals: [oldGoal],
    };

    expect(await applyBackup(other, patched)).toEqual({ applied: 5, skipped: 36 });
    const otherBench = await seededExercise(other, "Bench Press", "barbell");
    expect((await other.get("sets", set.id))?.oneRm).toBeCloseTo(116.67, 2);
    expect(await other.get("sets", "orphan")).toBeUndefined();
    expect(await getGoal(other, "old")).toEqual({
      kind: "legacy",
      id: "old",
      exerciseId: otherBench.id,
      targetWeight: 120,
      currentWeight: 80,
      targetMonth: "2024-06",
      achieved: true,
      createdAt: 5,
      updatedAt: 5,
    });
  });
});

describe("backup files", () => {
  it("names files by local time", () => {
    expect(backupFileName(new Date(2024, 4, 1, 9, 5, 3))).toBe("lift-log-backup-20240501_090503.json");
  });

  it("writes a file that reads back and records the time", async () => {
    const dir = await mkdtemp(join(tmpdir(), "lift-log-"));
    try {
      const now = new Date(2024, 4, 1, 9, 5, 3);
      const path = await writeBackupFile(db, join(dir, "nested"), now);
      expect(path).toBe(join(dir, "nested", "lift-log-backup-20240501_090503.json"));
      const bundle = await parseAndValidateBackup(await readFile(path, "utf8"));
      expect(bundle.sets).toHaveLength(1);
      expect((await getMeta(db)).lastBackupAt).toBe(now.getTime());
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
