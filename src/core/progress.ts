import type { BuildState } from "./build.js";

// Matches waf-style step counters such as "[ 42/180]".
const STEP_COUNTER = /\[\D*(\d+)\D*\/\D*(\d+)\D*\]/g;

export type BuildProgress = {
  state: BuildState;
  percent: number;
};

export function computeProgress(state: BuildState, log: string | null): number {
  if (state === "SUCCESS") return 100;
  if (state !== "RUNNING") return 0;
  if (!log) return 0;

  let last: RegExpMatchArray | null = null;
  for (const match of log.matchAll(STEP_COUNTER)) {
    last = match;
  }
  if (!last) return 0;

  const completed = Number.parseInt(last[1], 10);
  const total = Number.parseInt(last[2], 10);
  if (!Number.isFinite(completed) || !Number.isFinite(total) || total <= 0) return 0;

  // Configure runs a handful of short steps before compilation starts; weight it lightly.
  if (total < 20) return 1;
  if (total < 200) return Math.floor((completed * 4) / total) + 1;
  return Math.min(100, Math.floor((completed * 95) / total) + 5);
}
