import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  component?: string;
  build_id?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  buildId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  component?: string;
};

type LogFailureAction = "write" | "close";

// Minimal surface the orchestrator needs; tests may swap in an in-memory sink.
export interface EventLogger {
  log(event: LogEventInput): void;
  close(): void;
}

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

export class MemoryLogger implements EventLogger {
  readonly events: LogEvent[] = [];

  constructor(private readonly defaults: EventDefaults = {}) {}

  log(event: LogEventInput): void {
    this.events.push(eventWithTs(event, this.defaults));
  }

  close(): void {}

  ofType(type: string): LogEvent[] {
    return this.events.filter((event) => event.type === type);
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { buildId, payload, ts, type, ...rest } = event;

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ...rest,
    ts: normalizedTs,
    type,
  };

  if (defaults.component) {
    result.component = defaults.component;
  }
  if (buildId) {
    result.build_id = buildId;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logOrchestratorEvent(
  logger: EventLogger,
  type: string,
  fields: JsonObject & { buildId?: string; ts?: string | Date } = {},
): void {
  const { buildId, ts, ...rest } = fields;
  const event: LogEventInput = { type, ...rest };

  if (buildId !== undefined) {
    event.buildId = buildId;
  }
  if (ts !== undefined) {
    event.ts = ts;
  }

  logger.log(event);
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = resolveDebugStack(error);
  if (!stack) {
    return message;
  }

  return `${message}\n${stack}`;
}

function resolveDebugStack(error: unknown): string | undefined {
  const lines = formatErrorLines(error, { mode: "debug" });
  const stackLine = lines.find((line) => line.kind === "stack");
  return stackLine?.text;
}

function resolveLoggerDebugEnabled(): boolean {
  let debugFlag = false;

  for (const arg of process.argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}
