import { describe, expect, it } from "vitest";

import { computeProgress } from "./progress.js";

describe("computeProgress", () => {
  it("reports 100 for successful builds and 0 for anything not running", () => {
    expect(computeProgress("SUCCESS", null)).toBe(100);
    expect(computeProgress("PENDING", "[5/10]")).toBe(0);
    expect(computeProgress("FAILURE", "[900/1000]")).toBe(0);
    expect(computeProgress("CANCELLED", "[900/1000]")).toBe(0);
  });

  it("returns 0 while no step counter has been printed", () => {
    expect(computeProgress("RUNNING", null)).toBe(0);
    expect(computeProgress("RUNNING", "Setting vehicle to: Copter\nRunning configure\n")).toBe(0);
  });

  it("weights configure, library and firmware phases differently", () => {
    expect(computeProgress("RUNNING", "[ 3/12] Checking for program 'python'\n")).toBe(1);
    expect(computeProgress("RUNNING", "[ 60/120] Compiling libraries\n")).toBe(3);
    expect(computeProgress("RUNNING", "[ 200/1000] Compiling ArduCopter/Copter.cpp\n")).toBe(24);
    expect(computeProgress("RUNNING", "[1000/1000] Linking bin/arducopter\n")).toBe(100);
  });

  it("uses the last counter in the log", () => {
    const log = ["[ 1/10] configure", "[ 10/10] configure", "[ 500/1000] compile", ""].join("\n");

    expect(computeProgress("RUNNING", log)).toBe(52);
  });
});
