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
  run_id: string;
  project?: string;
  task?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  runId?: string;
  project?: string;
  task?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type JsonlLoggerOptions = {
  runId: string;
  debug?: boolean;
};

type LogFailureAction = "write" | "close";

/** Anything that accepts run events; the runner only needs this much. */
export type EventSink = {
  log(event: LogEventInput): void;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventSink {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly options: JsonlLoggerOptions,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = options.debug ?? false;
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.options.runId));
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

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaultRunId?: string): LogEvent {
  const runId = event.runId ?? defaultRunId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const ts = event.ts;
  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ts: normalizedTs,
    type: event.type,
    run_id: runId,
  };

  if (event.project) {
    result.project = event.project;
  }
  if (event.task) {
    result.task = event.task;
  }
  if (event.payload && Object.keys(event.payload).length > 0) {
    result.payload = event.payload;
  }

  return result;
}

export function logTaskEvent(
  sink: EventSink,
  type: string,
  fields: { project?: string; task?: string; payload?: JsonObject } = {},
): void {
  const event: LogEventInput = { type };

  if (fields.project !== undefined) event.project = fields.project;
  if (fields.task !== undefined) event.task = fields.task;
  if (fields.payload !== undefined) event.payload = fields.payload;

  sink.log(event);
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

  const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stack ? `${message}\n${stack.text}` : message;
}
