import { DivisionByZeroError, type Matrix, OutOfRangeError, type Tour } from "./util.js";

export type OrderingComparison = {
  conventional: number;
  optimal: number;
  speedup: number;
  reduction: number;
};

export function identityTour(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

/** Total cost around the tour, including the edge from the last index back to the first. */
export function cycleLength(matrix: Matrix, tour: Tour): number {
  if (tour.length === 0) throw new OutOfRangeError("cannot evaluate an empty tour");
  const n = matrix.length;
  for (const idx of tour) {
    if (!Number.isInteger(idx) || idx < 0 || idx >= n) {
      throw new OutOfRangeError(`tour index ${idx} outside 0..${n - 1}`);
    }
  }
  let total = 0;
  for (let k = 0; k < tour.length - 1; k += 1) {
    total += matrix[tour[k]][tour[k + 1]];
  }
  return total + matrix[tour[tour.length - 1]][tour[0]];
}

export function speedup(conventional: number, optimal: number): number {
  if (optimal === 0) throw new DivisionByZeroError("optimal cycle length is zero");
  return conventional / optimal;
}

export function reduction(conventional: number, optimal: number): number {
  return conventional - optimal;
}

/** Conventional lexicographic ordering against `tour` on the same matrix. */
export function compareOrderings(matrix: Matrix, tour: Tour): OrderingComparison {
  const conventional = cycleLength(matrix, identityTour(matrix.length));
  const optimal = cycleLength(matrix, tour);
  return {
    conventional,
    optimal,
    speedup: speedup(conventional, optimal),
    reduction: reduction(conventional, optimal),
  };
}
