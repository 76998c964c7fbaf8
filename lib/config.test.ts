import { describe, expect, it } from "vitest";
import { loadConfig } from "@/lib/config";
import { ValidationError } from "@/lib/errors";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      dbName: "lift-log",
      backupDir: "backup",
      topRecords: 10,
      streakScanDays: 30,
      almostThereSets: 1,
    });
  });

  it("reads and coerces environment values", () => {
    const c = loadConfig({ LIFTLOG_DB_NAME: "gym", LIFTLOG_TOP_RECORDS: "5", LIFTLOG_ALMOST_THERE_SETS: "2" });
    expect(c.dbName).toBe("gym");
    expect(c.topRecords).toBe(5);
    expect(c.almostThereSets).toBe(2);
  });

  it("rejects non-numeric and non-positive values", () => {
    expect(() => loadConfig({ LIFTLOG_STREAK_SCAN_DAYS: "abc" })).toThrow(ValidationError);
    expect(() => loadConfig({ LIFTLOG_TOP_RECORDS: "0" })).toThrow(ValidationError);
  });
});
