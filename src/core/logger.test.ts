import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, MemoryLogger, eventWithTs, logOrchestratorEvent } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("JsonlLogger", () => {
  it("writes events with build metadata", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "nested", "events.jsonl");
    const logger = new JsonlLogger(logPath, { component: "scheduler" });

    logger.log({ type: "build.started", buildId: "b-1", payload: { slot: 0 } });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    expect(lines).toHaveLength(1);

    const event = JSON.parse(lines[0]) as Record<string, unknown>;
    expect(event.type).toBe("build.started");
    expect(event.component).toBe("scheduler");
    expect(event.build_id).toBe("b-1");
    expect(event.payload).toEqual({ slot: 0 });
    expect(new Date(String(event.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const first = new JsonlLogger(logPath);
    first.log({ type: "first", payload: { order: 1 } });
    first.close();

    const second = new JsonlLogger(logPath);
    second.log({ type: "second", payload: { order: 2 } });
    second.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    const events = lines.map((line) => JSON.parse(line) as Record<string, unknown>);

    expect(events.map((e) => e.type)).toEqual(["first", "second"]);
    expect(events.map((e) => e.payload)).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it("logs orchestrator helpers with top-level fields", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath);

    logOrchestratorEvent(logger, "build.finished", {
      buildId: "b-7",
      state: "SUCCESS",
      slot: 1,
    });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    const event = JSON.parse(lines[0]) as Record<string, unknown>;

    expect(event.type).toBe("build.finished");
    expect(event.build_id).toBe("b-7");
    expect(event.state).toBe("SUCCESS");
    expect(event.slot).toBe(1);
  });

  it("warns on write failures with formatted messages", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath);

    const writeError = new Error("disk full");
    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw writeError;
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "build.started" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    const message = warnSpy.mock.calls[0]?.[0];
    expect(message).toContain("Warning:");
    expect(message).toContain("write log event");
    expect(message).toContain(logPath);
    expect(message).toContain("disk full");
  });

  it("drops events logged after close", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath);

    logger.log({ type: "kept" });
    logger.close();
    logger.log({ type: "dropped" });

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    expect(lines).toHaveLength(1);
  });
});

describe("eventWithTs", () => {
  it("merges defaults and payload", () => {
    const event = eventWithTs(
      { type: "sample", payload: { key: "value" }, buildId: "b-2" },
      { component: "pool" },
    );

    expect(event.component).toBe("pool");
    expect(event.build_id).toBe("b-2");
    expect(event.type).toBe("sample");
    expect(event.payload).toEqual({ key: "value" });
  });

  it("keeps explicit timestamps and omits empty payloads", () => {
    const event = eventWithTs({
      type: "sample",
      ts: new Date("2024-05-01T10:00:00Z"),
      payload: {},
    });

    expect(event.ts).toBe("2024-05-01T10:00:00.000Z");
    expect(event).not.toHaveProperty("payload");
    expect(event).not.toHaveProperty("build_id");
  });
});

describe("MemoryLogger", () => {
  it("collects events by type", () => {
    const logger = new MemoryLogger();

    logOrchestratorEvent(logger, "a", { buildId: "x" });
    logOrchestratorEvent(logger, "b");
    logOrchestratorEvent(logger, "a", { buildId: "y" });

    expect(logger.ofType("a").map((event) => event.build_id)).toEqual(["x", "y"]);
  });
});
