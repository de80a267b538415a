import yaml from "js-yaml";
import type { Scheme } from "./angles.js";
import { DEFAULT_SCALE } from "./tsp_problem.js";
import { asNum, readText } from "./util.js";

export type TomoRules = {
  tomography: {
    qubits: number;
    scheme: Scheme;
  };
  solver: {
    bin?: string;
    args: string[];
    scale: number;
    timeout_ms: number;
  };
};

export const defaultRules: TomoRules = {
  tomography: { qubits: 2, scheme: "six-state" },
  solver: { args: ["-x"], scale: DEFAULT_SCALE, timeout_ms: 0 },
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function asScheme(v: unknown): Scheme | undefined {
  return v === "six-state" || v === "three-bases" ? v : undefined;
}

function positiveInt(v: unknown): number | undefined {
  const n = asNum(v);
  return n !== undefined && Number.isInteger(n) && n >= 1 ? n : undefined;
}

export function mergeRules(rules: unknown): TomoRules {
  const raw: Record<string, unknown> = isRecord(rules) ? rules : {};
  const tomo: Record<string, unknown> = isRecord(raw.tomography) ? raw.tomography : {};
  const solver: Record<string, unknown> = isRecord(raw.solver) ? raw.solver : {};
  const bin = typeof solver.bin === "string" && solver.bin.trim().length > 0 ? solver.bin : undefined;
  const timeout = asNum(solver.timeout_ms);
  return {
    tomography: {
      qubits: positiveInt(tomo.qubits) ?? defaultRules.tomography.qubits,
      scheme: asScheme(tomo.scheme) ?? defaultRules.tomography.scheme,
    },
    solver: {
      bin,
      args: Array.isArray(solver.args)
        ? solver.args.filter((x): x is string => typeof x === "string")
        : [...defaultRules.solver.args],
      scale: positiveInt(solver.scale) ?? defaultRules.solver.scale,
      timeout_ms: timeout !== undefined && timeout >= 0 ? timeout : defaultRules.solver.timeout_ms,
    },
  };
}

export function loadRules(rulesPath?: string): TomoRules {
  return mergeRules(rulesPath ? yaml.load(readText(rulesPath)) : undefined);
}

/** Command-line qubit count over the rules file; `-` or no argument keeps the file's value. */
export function withQubits(rules: TomoRules, arg?: string): TomoRules | undefined {
  if (arg === undefined || arg === "-") return rules;
  const qubits = positiveInt(arg);
  return qubits === undefined ? undefined : { ...rules, tomography: { ...rules.tomography, qubits } };
}
