import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { captureOutput, createCliFixture, type CapturedOutput, type CliFixture } from "../__tests__/helpers/cli-fixture.js";
import { UserFacingError } from "../core/errors.js";

import { logsCommand } from "./logs.js";
import { statusCommand } from "./status.js";

let fixture: CliFixture;
let output: CapturedOutput;

beforeEach(async () => {
  fixture = await createCliFixture();
  output = captureOutput();
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fixture.cleanup();
});

describe("statusCommand", () => {
  it("prints a running build with its progress", async () => {
    await fixture.seed({
      id: "b-1",
      state: "RUNNING",
      request: { vehicle: "copter", board: "SPEDIXF405", version: "stable-4.5", features: ["HAL_MOUNT_ENABLED"] },
      log: "[ 1/10] configure\n[ 500/1000] Compiling ArduCopter/mode.cpp\n",
    });

    await statusCommand(fixture.ctx, "b-1");

    expect(output.lines).toContain("Build: b-1");
    expect(output.lines).toContain("State: RUNNING (52%)");
    expect(output.lines).toContain("Target: copter SPEDIXF405 stable-4.5");
    expect(output.lines).toContain("Features: HAL_MOUNT_ENABLED");
    expect(output.lines).toContain("Created: 2024-05-01 10:00:00Z");
    expect(output.lines).toContain("Workspace: 0");
  });

  it("prints the failure kind and log reference", async () => {
    await fixture.seed({ id: "b-2", state: "FAILURE", log: "error\n" });

    await statusCommand(fixture.ctx, "b-2");

    expect(output.lines).toContain("State: FAILURE");
    expect(output.lines).toContain("Features: (catalog defaults)");
    expect(output.lines).toContain("Error: NonZeroExit: Step build exited with 2.");
    expect(output.lines).toContain("Log: b-2/build.log");
  });

  it("emits the record with progress as JSON", async () => {
    await fixture.seed({ id: "b-3", state: "SUCCESS" });

    await statusCommand(fixture.ctx, "b-3", { json: true });

    expect(JSON.parse(output.lines.join("\n"))).toMatchObject({
      id: "b-3",
      state: "SUCCESS",
      artifact_ref: "b-3/arducopter.apj",
      progress: 100,
    });
  });

  it("reports unknown builds", async () => {
    const error = await statusCommand(fixture.ctx, "missing").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toMatchObject({
      title: "Status command failed.",
      message: "No build with id missing.",
      hint: "Run `fwbuild list` to see recorded builds.",
    });
  });
});

describe("logsCommand", () => {
  it("writes the stored log, optionally only its tail", async () => {
    await fixture.seed({ id: "b-1", state: "FAILURE", log: "one\ntwo\nthree\n" });

    await logsCommand(fixture.ctx, "b-1");
    await logsCommand(fixture.ctx, "b-1", { tail: 1 });

    expect(output.stdout).toEqual(["one\ntwo\nthree\n", "three\n"]);
  });

  it("says so when a build has no log yet", async () => {
    await fixture.seed({ id: "b-1", state: "PENDING" });

    await logsCommand(fixture.ctx, "b-1");

    expect(output.lines).toEqual(["No log recorded for build b-1 (state PENDING)."]);
  });
});
