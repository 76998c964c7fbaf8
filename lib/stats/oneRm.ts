// lib/stats/oneRm.ts

type WeightReps = { weight: number; reps: number };

/**
 * Epley：1RM = weight × (1 + reps / 30)
 * reps = 1 時直接回傳重量。寫入 set 時計算一次並存起來。
 */
export function estimateOneRm(weight: number, reps: number): number {
  if (reps === 1) return weight;
  return weight * (1 + reps / 30);
}

/** 成長率（%）；previous 為 0 時回 0 */
export function growthRate(current: number, previous: number): number {
  if (previous === 0) return 0;
  return ((current - previous) / previous) * 100;
}

export function volumeOf(sets: WeightReps[]): number {
  return sets.reduce((sum, s) => sum + s.weight * s.reps, 0);
}

export function averageWeight(sets: WeightReps[]): number {
  if (sets.length === 0) return 0;
  return sets.reduce((sum, s) => sum + s.weight, 0) / sets.length;
}

export function maxOneRm(sets: WeightReps[]): number {
  if (sets.length === 0) return 0;
  return Math.max(...sets.map((s) => estimateOneRm(s.weight, s.reps)));
}
