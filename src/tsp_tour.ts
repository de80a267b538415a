import { DimensionMismatchError, ParseError, type Tour, readText } from "./util.js";

const INTEGER = /^[+-]?\d+$/;

/**
 * Solver solution text: a dimension line, then the tour as whitespace
 * separated indices wrapped over any number of lines. With `expectedDimension`
 * the tour must also be a permutation of 0..N-1.
 */
export function parseTour(text: string, expectedDimension?: number): Tour {
  const lines = text.split(/\r?\n/);
  const header = lines[0].trim();
  if (!INTEGER.test(header)) {
    throw new ParseError(header.length === 0 ? "solution file has no dimension line" : `dimension line '${header}' is not an integer`);
  }
  const declared = Number(header);

  const tokens = lines
    .slice(1)
    .join(" ")
    .split(/\s+/)
    .filter((t) => t.length > 0);
  if (tokens.length === 0) throw new ParseError("solution file has no tour entries");
  const tour = tokens.map((t, k) => {
    if (!INTEGER.test(t)) throw new ParseError(`tour entry ${k} '${t}' is not an integer`);
    return Number(t);
  });

  if (declared !== tour.length) throw new DimensionMismatchError(declared, tour.length);
  if (expectedDimension !== undefined) {
    if (expectedDimension !== tour.length) throw new DimensionMismatchError(expectedDimension, tour.length);
    checkPermutation(tour, expectedDimension);
  }
  return tour;
}

function checkPermutation(tour: Tour, n: number): void {
  const seen = new Uint8Array(n);
  tour.forEach((idx, k) => {
    if (idx < 0 || idx >= n) throw new ParseError(`tour entry ${k} (${idx}) outside 0..${n - 1}`);
    if (seen[idx]) throw new ParseError(`tour visits ${idx} more than once`);
    seen[idx] = 1;
  });
}

export function readTour(source: string, expectedDimension?: number): Tour {
  return parseTour(readText(source), expectedDimension);
}
