/**
 * Source staging helpers: shallow git fetches and local tree copies.
 */

import { cpSync, mkdirSync } from "node:fs";
import type { CommandResult, CommandSpec } from "../process/runner.js";

type Run = (step: string, spec: CommandSpec) => CommandResult;

/**
 * Shallow-clone a branch or tag into `dest`.
 */
export function cloneBranch(run: Run, remote: string, branch: string, dest: string): void {
  run("clone", {
    command: "git",
    args: ["clone", "--depth", "1", "--branch", branch, remote, dest],
  });
}

/**
 * Fetch a single commit by SHA into `dest` and check it out. Works for
 * commits that no branch or tag points at.
 */
export function fetchCommit(run: Run, remote: string, sha: string, dest: string): void {
  mkdirSync(dest, { recursive: true });
  const steps: string[][] = [
    ["init"],
    ["remote", "add", "origin", remote],
    ["fetch", "--depth", "1", "origin", sha],
    ["checkout", "FETCH_HEAD"],
  ];
  for (const args of steps) {
    run("fetch", { command: "git", args, cwd: dest });
  }
}

/**
 * Copy a local source tree to `dest`.
 */
export function copyTree(source: string, dest: string): void {
  cpSync(source, dest, { recursive: true });
}
