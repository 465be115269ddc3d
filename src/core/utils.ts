import fs from "node:fs";
import path from "node:path";
import fse from "fs-extra";

// Longest delay setTimeout honours; larger values fire immediately.
export const MAX_TIMER_MS = 2_147_483_647;

export function isoNow(): string {
  return new Date().toISOString();
}

// ISO timestamps compare lexicographically; never return a value before `floor`.
export function isoNowNotBefore(floor: string | undefined): string {
  const now = isoNow();
  if (floor && floor > now) return floor;
  return now;
}

export function timestampId(date: Date = new Date()): string {
  // YYYYMMDD-HHMMSS
  const yyyy = date.getUTCFullYear();
  const mm = String(date.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(date.getUTCDate()).padStart(2, "0");
  const hh = String(date.getUTCHours()).padStart(2, "0");
  const mi = String(date.getUTCMinutes()).padStart(2, "0");
  const ss = String(date.getUTCSeconds()).padStart(2, "0");
  return `${yyyy}${mm}${dd}-${hh}${mi}${ss}`;
}

export async function ensureDir(dir: string): Promise<void> {
  await fse.ensureDir(dir);
}

export async function pathExists(p: string): Promise<boolean> {
  return fse.pathExists(p);
}

export function isGitRepo(repoPath: string): boolean {
  return fs.existsSync(path.join(repoPath, ".git"));
}

export function capitalize(value: string): string {
  if (value.length === 0) return value;
  return value[0].toUpperCase() + value.slice(1);
}
