import { type Matrix, ParseError, die, writeText } from "./util.js";

/** 22.5 degrees is the finest angle step, so doubling makes every cost an integer. */
export const DEFAULT_SCALE = 2;

function scaledEntry(value: number, scale: number, i: number, j: number): number {
  const scaled = value * scale;
  if (!Number.isFinite(scaled) || scaled < 0) {
    die(`cost[${i}][${j}] = ${value} is not a finite non-negative weight`);
  }
  if (!Number.isInteger(scaled)) {
    die(`cost[${i}][${j}] = ${value} is not an integer after scaling by ${scale}`);
  }
  return scaled;
}

/** Full-matrix TSPLIB text for an exact solver. Weights are multiplied by `scale`. */
export function formatProblem(matrix: Matrix, name: string, comment: string, scale = DEFAULT_SCALE): string {
  if (!Number.isInteger(scale) || scale < 1) die(`scale must be a positive integer, got ${scale}`);
  const n = matrix.length;
  const lines = [
    `NAME : ${name}`,
    "TYPE : TSP",
    `COMMENT : ${comment}`,
    `DIMENSION : ${n}`,
    "EDGE_WEIGHT_TYPE : EXPLICIT",
    "EDGE_WEIGHT_FORMAT : FULL_MATRIX",
    "EDGE_WEIGHT_SECTION",
  ];
  matrix.forEach((row, i) => {
    if (row.length !== n) die(`cost matrix row ${i} has ${row.length} entries, expected ${n}`);
    lines.push(row.map((v, j) => String(scaledEntry(v, scale, i, j))).join(" "));
  });
  lines.push("EOF");
  return lines.join("\n") + "\n";
}

export function writeProblem(destination: string, matrix: Matrix, name: string, comment: string, scale = DEFAULT_SCALE): void {
  writeText(destination, formatProblem(matrix, name, comment, scale));
}

function parseInteger(token: string, where: string): number {
  if (!/^[+-]?\d+$/.test(token)) throw new ParseError(`${where}: '${token}' is not an integer`);
  return Number(token);
}

/** Reads back the integer weight block of a full-matrix problem file. */
export function parseProblemMatrix(text: string): number[][] {
  const lines = text.split(/\r?\n/).map((l) => l.trim());
  const dimLine = lines.find((l) => /^DIMENSION\s*:/.test(l));
  if (!dimLine) throw new ParseError("problem file has no DIMENSION line");
  const n = parseInteger(dimLine.split(":")[1].trim(), "DIMENSION");

  const start = lines.indexOf("EDGE_WEIGHT_SECTION");
  if (start < 0) throw new ParseError("problem file has no EDGE_WEIGHT_SECTION");
  const end = lines.indexOf("EOF", start);
  const body = lines.slice(start + 1, end < 0 ? undefined : end).filter((l) => l.length > 0);
  if (body.length !== n) throw new ParseError(`weight section has ${body.length} rows, DIMENSION is ${n}`);

  return body.map((line, i) => {
    const row = line.split(/\s+/).map((t) => parseInteger(t, `row ${i}`));
    if (row.length !== n) throw new ParseError(`row ${i} has ${row.length} entries, DIMENSION is ${n}`);
    return row;
  });
}
