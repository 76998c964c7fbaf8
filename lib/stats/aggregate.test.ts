import { describe, expect, it } from "vitest";
import {
  bestRecords,
  categoryBreakdown,
  exerciseSummary,
  oneRmProgress,
  periodStart,
  volumeProgress,
  weekdayFrequency,
  weightProgress,
  workoutSummary,
  type SetFact,
} from "@/lib/stats/aggregate";
import { estimateOneRm } from "@/lib/stats/oneRm";

let seq = 0;
function fact(p: Partial<SetFact>): SetFact {
  const weight = p.weight ?? 100;
  const reps = p.reps ?? 5;
  seq++;
  return {
    setId: `s${seq}`,
    workoutId: "w1",
    date: "2024-05-01",
    exerciseId: "bench",
    exerciseName: "Bench Press",
    variation: "barbell",
    category: "chest",
    setNumber: 1,
    oneRm: estimateOneRm(weight, reps),
    ...p,
    weight,
    reps,
  };
}

const squat = { exerciseId: "squat", exerciseName: "Squat", category: "legs" } as const;

describe("bestRecords", () => {
  const facts = [
    fact({ weight: 100, reps: 5 }),
    fact({ weight: 110, reps: 1 }),
    fact({ weight: 60, reps: 12 }),
    fact({ ...squat, weight: 140, reps: 3 }),
  ];

  it("keeps independent maxima per exercise, ordered by one-rep max", () => {
    const [first, second] = bestRecords(facts);
    expect(first.exerciseId).toBe("squat");
    expect(first.maxOneRm).toBeCloseTo(154, 6);
    expect(second.exerciseId).toBe("bench");
    expect(second.maxWeight).toBe(110);
    expect(second.maxReps).toBe(12);
    expect(second.maxOneRm).toBeCloseTo(116.67, 2);
  });

  it("honours the limit", () => {
    expect(bestRecords(facts, 1).map((r) => r.exerciseId)).toEqual(["squat"]);
  });
});

describe("periodStart", () => {
  it("subtracts the period in days", () => {
    expect(periodStart(30, new Date(2024, 4, 31))).toBe("2024-05-01");
  });

  it("is null for the whole history", () => {
    expect(periodStart("all", new Date(2024, 4, 31))).toBeNull();
  });
});

describe("per-date progress", () => {
  const facts = [
    fact({ date: "2024-05-02", weight: 100, reps: 5 }),
    fact({ date: "2024-05-02", weight: 105, reps: 3 }),
    fact({ date: "2024-05-01", weight: 90, reps: 5 }),
    fact({ ...squat, date: "2024-05-01", weight: 140, reps: 5 }),
  ];

  it("takes the best one-rep max of each date, oldest first", () => {
    const points = oneRmProgress(facts, "bench");
    expect(points.map((p) => p.date)).toEqual(["2024-05-01", "2024-05-02"]);
    expect(points[0].value).toBeCloseTo(105, 6);
    expect(points[1].value).toBeCloseTo(116.67, 2);
  });

  it("reports max and average weight", () => {
    expect(weightProgress(facts, "bench")).toEqual([
      { date: "2024-05-01", max: 90, average: 90 },
      { date: "2024-05-02", max: 105, average: 102.5 },
    ]);
  });

  it("sums volume per date", () => {
    expect(volumeProgress(facts, "bench")).toEqual([
      { date: "2024-05-01", value: 450 },
      { date: "2024-05-02", value: 815 },
    ]);
  });
});

describe("weekdayFrequency", () => {
  it("buckets distinct dates Monday first", () => {
    // 2024-05-06 is a Monday, 2024-05-12 a Sunday
    expect(weekdayFrequency(["2024-05-06", "2024-05-06", "2024-05-08", "2024-05-12", "bad"])).toEqual([
      1, 0, 1, 0, 0, 0, 1,
    ]);
  });

  it("always returns seven buckets", () => {
    expect(weekdayFrequency([])).toEqual([0, 0, 0, 0, 0, 0, 0]);
  });
});

describe("categoryBreakdown", () => {
  it("counts sets per category, most first", () => {
    const facts = [
      fact({}),
      fact({}),
      fact({ ...squat }),
      fact({ ...squat }),
      fact({ ...squat }),
      fact({ exerciseId: "curl", category: "arms" }),
    ];
    expect(categoryBreakdown(facts)).toEqual([
      { category: "legs", sets: 3 },
      { category: "chest", sets: 2 },
      { category: "arms", sets: 1 },
    ]);
  });

  it("keeps catalogue order on ties", () => {
    const facts = [fact({ exerciseId: "row", category: "back" }), fact({})];
    expect(categoryBreakdown(facts).map((c) => c.category)).toEqual(["chest", "back"]);
  });
});

describe("workoutSummary", () => {
  it("summarises workouts and sets", () => {
    const facts = [fact({ weight: 100, reps: 5 }), fact({ weight: 80, reps: 10 }), fact({ weight: 0, reps: 10 })];
    const dates = ["2024-05-01", "2024-05-20", "2024-04-30", "2024-05-20"];
    expect(workoutSummary(facts, dates, new Date(2024, 4, 25))).toEqual({
      totalWorkouts: 3,
      totalSets: 3,
      averageSetsPerWorkout: 1,
      thisMonthWorkouts: 2,
      averageWeight: 90,
      totalVolume: 1300,
    });
  });

  it("is all zeros without data", () => {
    expect(workoutSummary([], [], new Date(2024, 4, 25))).toEqual({
      totalWorkouts: 0,
      totalSets: 0,
      averageSetsPerWorkout: 0,
      thisMonthWorkouts: 0,
      averageWeight: 0,
      totalVolume: 0,
    });
  });
});

describe("exerciseSummary", () => {
  it("is null without sets", () => {
    expect(exerciseSummary([])).toBeNull();
  });

  it("computes the stats table", () => {
    const s = exerciseSummary([fact({ weight: 100, reps: 5 }), fact({ weight: 80, reps: 10 })]);
    expect(s).not.toBeNull();
    expect(s?.totalSets).toBe(2);
    expect(s?.maxWeight).toBe(100);
    expect(s?.averageWeight).toBe(90);
    expect(s?.maxOneRm).toBeCloseTo(116.67, 2);
    expect(s?.totalVolume).toBe(1300);
    expect(s?.averageVolumePerSet).toBe(650);
  });
});
