import fs from "fs";
import path from "path";
import { expand, schemeLabels, schemeSettings, settingLabel, type Scheme } from "./angles.js";
import { buildCostMatrix } from "./cost_matrix.js";
import { compareOrderings } from "./cycle.js";
import type { TomoRules } from "./rules.js";
import { runSolver, type SpawnFn } from "./solver.js";
import { writeProblem } from "./tsp_problem.js";
import { readTour } from "./tsp_tour.js";
import type { Tour } from "./util.js";

export type OrderingReport = {
  name: string;
  qubits: number;
  scheme: Scheme;
  dimension: number;
  tour: Tour;
  labels: string[];
  conventional: number;
  optimal: number;
  speedup: number;
  reduction: number;
};

export type PipelineOptions = {
  outDir: string;
  rules: TomoRules;
  name?: string;
  spawn?: SpawnFn;
};

export function problemName(qubits: number, scheme: Scheme): string {
  return `tomo_${scheme === "three-bases" ? "3b" : "6s"}_${qubits}q`;
}

/** Builds the problem for the configured qubit count, solves it and scores the tour. */
export function optimizeOrdering(options: PipelineOptions): OrderingReport {
  const { qubits, scheme } = options.rules.tomography;
  const name = options.name ?? problemName(qubits, scheme);
  const settings = expand(schemeSettings(scheme), qubits);
  const matrix = buildCostMatrix(settings);
  console.error(`${name}: ${settings.length} settings, ${settings[0].length} angles each`);

  fs.mkdirSync(options.outDir, { recursive: true });
  const problemPath = path.join(options.outDir, `${name}.tsp`);
  writeProblem(
    problemPath,
    matrix,
    name,
    `${qubits}-qubit ${scheme} tomography, weights x${options.rules.solver.scale}`,
    options.rules.solver.scale,
  );
  console.error(`${name}: wrote ${problemPath}`);

  const solutionPath = runSolver(problemPath, {
    bin: options.rules.solver.bin,
    args: options.rules.solver.args,
    timeoutMs: options.rules.solver.timeout_ms,
    spawn: options.spawn,
  });
  const tour = readTour(solutionPath, settings.length);
  const cmp = compareOrderings(matrix, tour);
  console.error(
    `${name}: conventional=${cmp.conventional} optimal=${cmp.optimal} speedup=${cmp.speedup.toFixed(3)}`,
  );

  const labels = schemeLabels(scheme);
  return {
    name,
    qubits,
    scheme,
    dimension: settings.length,
    tour,
    labels: tour.map((idx) => settingLabel(idx, qubits, labels)),
    ...cmp,
  };
}
