import fs from "fs";

/** Wave-plate angles in degrees, (HWP, QWP) per qubit. */
export type Setting = readonly number[];

export type Matrix = number[][];

/** Visiting order of a Hamiltonian cycle; the last index connects back to the first. */
export type Tour = readonly number[];

export type ErrorKind =
  | "InvalidArgument"
  | "ParseError"
  | "DimensionMismatch"
  | "OutOfRange"
  | "DivisionByZero"
  | "ExternalToolFailure";

export class WaveplateError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends WaveplateError {
  constructor(message: string) {
    super("InvalidArgument", message);
  }
}

export class ParseError extends WaveplateError {
  constructor(message: string) {
    super("ParseError", message);
  }
}

export class DimensionMismatchError extends WaveplateError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, what = "tour") {
    super("DimensionMismatch", `${what} has ${actual} entries, expected ${expected}`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class OutOfRangeError extends WaveplateError {
  constructor(message: string) {
    super("OutOfRange", message);
  }
}

export class DivisionByZeroError extends WaveplateError {
  constructor(message: string) {
    super("DivisionByZero", message);
  }
}

export class ExternalToolError extends WaveplateError {
  constructor(message: string) {
    super("ExternalToolFailure", message);
  }
}

export function die(msg: string): never {
  throw new InvalidArgumentError(msg);
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}
