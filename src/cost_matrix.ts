import { type Matrix, type Setting, die } from "./util.js";

function componentColumns(settings: readonly Setting[]): Float64Array[] {
  const arity = settings[0].length;
  const columns: Float64Array[] = [];
  for (let k = 0; k < arity; k += 1) columns.push(new Float64Array(settings.length));
  settings.forEach((s, i) => {
    if (s.length !== arity) die(`setting ${i} has ${s.length} angles, expected ${arity}`);
    for (let k = 0; k < arity; k += 1) {
      const v = s[k];
      if (!Number.isFinite(v)) die(`setting ${i} has a non-finite angle at component ${k}`);
      columns[k][i] = v;
    }
  });
  return columns;
}

/**
 * Wave-plate distance between every pair of settings: the largest absolute
 * angle difference over all plates. Each row is computed against all later
 * rows one component column at a time; the lower triangle is a mirror.
 */
export function buildCostMatrix(settings: readonly Setting[]): Matrix {
  const n = settings.length;
  if (n === 0) return [];
  const columns = componentColumns(settings);
  const rows: Float64Array[] = [];
  for (let i = 0; i < n; i += 1) rows.push(new Float64Array(n));

  const rowMax = new Float64Array(n);
  for (let i = 0; i < n; i += 1) {
    rowMax.fill(0, i + 1);
    for (const col of columns) {
      const a = col[i];
      for (let j = i + 1; j < n; j += 1) {
        const d = Math.abs(a - col[j]);
        if (d > rowMax[j]) rowMax[j] = d;
      }
    }
    const row = rows[i];
    for (let j = i + 1; j < n; j += 1) {
      row[j] = rowMax[j];
      rows[j][i] = rowMax[j];
    }
  }
  return rows.map((r) => Array.from(r));
}
