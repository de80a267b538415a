import { type Setting, die } from "./util.js";

export type Scheme = "six-state" | "three-bases";

// (HWP, QWP) in degrees.
const SIX_STATE: readonly Setting[] = Object.freeze([
  Object.freeze([0, 0]),
  Object.freeze([45, 0]),
  Object.freeze([22.5, 0]),
  Object.freeze([-22.5, 0]),
  Object.freeze([0, 45]),
  Object.freeze([0, -45]),
]);

export const THREE_BASES: readonly Setting[] = Object.freeze([
  Object.freeze([0, 0]),
  Object.freeze([22.5, 0]),
  Object.freeze([0, 45]),
]);

export const SIX_STATE_LABELS: readonly string[] = Object.freeze(["H", "V", "D", "A", "R", "L"]);
export const THREE_BASES_LABELS: readonly string[] = Object.freeze(["H", "D", "R"]);

/** One-qubit projections H, V, D, A, R, L in that order. */
export function baseSettings(): readonly Setting[] {
  return SIX_STATE;
}

export function schemeSettings(scheme: Scheme): readonly Setting[] {
  return scheme === "three-bases" ? THREE_BASES : SIX_STATE;
}

export function schemeLabels(scheme: Scheme): readonly string[] {
  return scheme === "three-bases" ? THREE_BASES_LABELS : SIX_STATE_LABELS;
}

function checkQubitCount(qubitCount: number): void {
  if (!Number.isInteger(qubitCount) || qubitCount < 1) {
    die(`qubit count must be an integer >= 1, got ${qubitCount}`);
  }
}

/**
 * Cartesian power of `base`, flattened per setting. Output index `idx` read in
 * base `base.length` with `qubitCount` digits selects the per-qubit settings,
 * most significant digit first, so the last qubit varies fastest.
 */
export function expand(base: readonly Setting[], qubitCount: number): Setting[] {
  checkQubitCount(qubitCount);
  if (base.length === 0) die("base configuration space is empty");
  const arity = base[0].length;
  if (base.some((s) => s.length !== arity)) die("base settings have mixed arity");

  const total = base.length ** qubitCount;
  const digits = new Array<number>(qubitCount).fill(0);
  const out: Setting[] = [];
  for (let idx = 0; idx < total; idx += 1) {
    const setting: number[] = [];
    for (const d of digits) setting.push(...base[d]);
    out.push(setting);
    for (let q = qubitCount - 1; q >= 0; q -= 1) {
      digits[q] += 1;
      if (digits[q] < base.length) break;
      digits[q] = 0;
    }
  }
  return out;
}

/** Projection name of an n-qubit index, e.g. 7 -> "VV" for two qubits of the six-state scheme. */
export function settingLabel(index: number, qubitCount: number, labels: readonly string[] = SIX_STATE_LABELS): string {
  checkQubitCount(qubitCount);
  const size = labels.length ** qubitCount;
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    die(`index ${index} outside 0..${size - 1}`);
  }
  let rest = index;
  const parts: string[] = [];
  for (let q = 0; q < qubitCount; q += 1) {
    parts.unshift(labels[rest % labels.length]);
    rest = Math.floor(rest / labels.length);
  }
  return parts.join("");
}
