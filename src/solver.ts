import fs from "fs";
import path from "path";
import { spawnSync, type SpawnSyncOptions } from "child_process";
import { pathToFileURL } from "url";
import { ExternalToolError } from "./util.js";

export type SolverRun = {
  status: number | null;
  signal?: NodeJS.Signals | null;
  error?: Error;
};

export type SpawnFn = (command: string, args: readonly string[], options: SpawnSyncOptions) => SolverRun;

export type SolverOptions = {
  bin?: string;
  args?: readonly string[];
  timeoutMs?: number;
  spawn?: SpawnFn;
};

function defaultBin(): string {
  return process.env.CONCORDE_BIN && process.env.CONCORDE_BIN.trim().length > 0
    ? process.env.CONCORDE_BIN
    : "concorde";
}

export function solutionPathFor(problemPath: string): string {
  const ext = path.extname(problemPath);
  const stem = ext.length > 0 ? problemPath.slice(0, -ext.length) : problemPath;
  return `${stem}.sol`;
}

function buildArgs(problem: string, solution: string, extra: readonly string[]): string[] {
  return [...extra, "-o", solution, problem];
}

/** Runs the exact solver on a problem file and returns the path of the tour it wrote. */
export function runSolver(problemPath: string, options: SolverOptions = {}): string {
  const bin = options.bin ?? defaultBin();
  const spawn: SpawnFn = options.spawn ?? spawnSync;
  if (!fs.existsSync(problemPath)) {
    throw new ExternalToolError(`Problem file not found: ${problemPath}`);
  }
  const problem = path.resolve(problemPath);
  const solution = solutionPathFor(problem);
  fs.rmSync(solution, { force: true });

  const res = spawn(bin, buildArgs(problem, solution, options.args ?? ["-x"]), {
    cwd: path.dirname(problem),
    stdio: ["ignore", "ignore", "inherit"],
    timeout: options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : undefined,
  });

  if (res.error) {
    if ("code" in res.error && res.error.code === "ENOENT") {
      throw new ExternalToolError(`Solver not found ('${bin}'). Install Concorde or set CONCORDE_BIN to the executable path.`);
    }
    throw new ExternalToolError(`Failed to launch solver ('${bin}'): ${res.error.message}`);
  }
  if (res.signal) {
    throw new ExternalToolError(`Solver terminated by ${res.signal}`);
  }
  if (res.status !== 0) {
    throw new ExternalToolError(`Solver failed with exit code ${res.status}`);
  }
  if (!fs.existsSync(solution)) {
    throw new ExternalToolError(`Solver reported success but no solution was written: ${solution}`);
  }
  return solution;
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  try {
    process.stdout.write(`${runSolver(process.argv[2])}\n`);
  } catch (e: unknown) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}
