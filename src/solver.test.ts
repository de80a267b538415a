import fs from "fs";
import os from "os";
import path from "path";
import type { SpawnSyncOptions } from "child_process";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runSolver, solutionPathFor, type SolverRun } from "./solver.js";
import { ExternalToolError } from "./util.js";

function outputArg(args: readonly string[]): string {
  return args[args.indexOf("-o") + 1];
}

describe("external solver", () => {
  let dir: string;
  let problem: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "waveplate-solver-"));
    problem = path.join(dir, "tomo.tsp");
    fs.writeFileSync(problem, "NAME : tomo\nEOF\n", "utf8");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("derives the solution path from the problem name", () => {
    expect(solutionPathFor("/work/tomo_6s_2q.tsp")).toBe("/work/tomo_6s_2q.sol");
    expect(solutionPathFor("/work/tomo")).toBe("/work/tomo.sol");
  });

  it("runs the solver in the problem directory and returns the solution path", () => {
    const spawn = vi.fn((_cmd: string, args: readonly string[], _opts: SpawnSyncOptions): SolverRun => {
      fs.writeFileSync(outputArg(args), "1\n0\n", "utf8");
      return { status: 0 };
    });
    const solution = runSolver(problem, { bin: "solver-bin", spawn });
    expect(solution).toBe(path.join(dir, "tomo.sol"));
    expect(spawn).toHaveBeenCalledTimes(1);
    const [cmd, args, opts] = spawn.mock.calls[0];
    expect(cmd).toBe("solver-bin");
    expect(args).toEqual(["-x", "-o", solution, problem]);
    expect(opts.cwd).toBe(dir);
    expect(opts.timeout).toBeUndefined();
  });

  it("passes configured arguments and timeout", () => {
    const spawn = vi.fn((_cmd: string, args: readonly string[], _opts: SpawnSyncOptions): SolverRun => {
      fs.writeFileSync(outputArg(args), "1\n0\n", "utf8");
      return { status: 0 };
    });
    runSolver(problem, { bin: "solver-bin", args: ["-v"], timeoutMs: 5000, spawn });
    const [, args, opts] = spawn.mock.calls[0];
    expect(args[0]).toBe("-v");
    expect(opts.timeout).toBe(5000);
  });

  it("uses CONCORDE_BIN when no binary is configured", () => {
    vi.stubEnv("CONCORDE_BIN", "/opt/concorde/concorde");
    try {
      const spawn = vi.fn((_cmd: string, args: readonly string[], _opts: SpawnSyncOptions): SolverRun => {
        fs.writeFileSync(outputArg(args), "1\n0\n", "utf8");
        return { status: 0 };
      });
      runSolver(problem, { spawn });
      expect(spawn.mock.calls[0][0]).toBe("/opt/concorde/concorde");
    } finally {
      vi.unstubAllEnvs();
    }
  });

  it("removes a stale solution and fails when none is written", () => {
    fs.writeFileSync(path.join(dir, "tomo.sol"), "1\n0\n", "utf8");
    const spawn = (): SolverRun => ({ status: 0 });
    expect(() => runSolver(problem, { bin: "solver-bin", spawn })).toThrow(/no solution was written/);
    expect(fs.existsSync(path.join(dir, "tomo.sol"))).toBe(false);
  });

  it("reports a non-zero exit", () => {
    const spawn = (): SolverRun => ({ status: 3 });
    expect(() => runSolver(problem, { bin: "solver-bin", spawn })).toThrow("Solver failed with exit code 3");
  });

  it("reports a solver killed by a signal", () => {
    const spawn = (): SolverRun => ({ status: null, signal: "SIGTERM" });
    expect(() => runSolver(problem, { bin: "solver-bin", spawn })).toThrow("Solver terminated by SIGTERM");
  });

  it("reports a missing binary", () => {
    const spawn = (): SolverRun => ({
      status: null,
      error: Object.assign(new Error("spawn solver-bin ENOENT"), { code: "ENOENT" }),
    });
    expect(() => runSolver(problem, { bin: "solver-bin", spawn })).toThrow(ExternalToolError);
    expect(() => runSolver(problem, { bin: "solver-bin", spawn })).toThrow(/Solver not found \('solver-bin'\)/);
  });

  it("reports a missing problem file", () => {
    const spawn = vi.fn((): SolverRun => ({ status: 0 }));
    expect(() => runSolver(path.join(dir, "absent.tsp"), { spawn })).toThrow(ExternalToolError);
    expect(spawn).not.toHaveBeenCalled();
  });
});
