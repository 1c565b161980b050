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

export type LogEvent = {
  ts: string;
  type: string;
  target?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  target?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

/** Anything events can be written to. Passed down explicitly; there is no module-level logger. */
export interface EventLog {
  log(event: LogEventInput): void;
}

export type JsonlLoggerOptions = {
  /** Also write every event line to this stream (stdout for the service). */
  echo?: { write(chunk: string): unknown };
  debug?: boolean;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLog {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly options: JsonlLoggerOptions = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.options.debug));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    const line = `${JSON.stringify(event)}\n`;
    try {
      fs.writeSync(this.fileDescriptor, line);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.options.debug));
    }
    this.options.echo?.write(line);
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput): LogEvent {
  const { target, payload, ts, type } = event;

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = { ts: normalizedTs, type };

  if (target) {
    result.target = target;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logPatrolEvent(
  logger: EventLog,
  type: string,
  target: string | undefined,
  payload: JsonObject = {},
): void {
  const event: LogEventInput = { type, payload };
  if (target !== undefined) {
    event.target = target;
  }

  logger.log(event);
}

export function logCommandFailure(
  logger: EventLog,
  details: { target?: string; command: string; exitCode?: number; stdout: string; stderr: string },
): void {
  const payload: JsonObject = {
    command: details.command,
    stdout: details.stdout,
    stderr: details.stderr,
  };
  if (details.exitCode !== undefined) payload.exit_code = details.exitCode;

  logPatrolEvent(logger, "command.failed", details.target, payload);
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled = false,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stackLine ? `${message}\n${stackLine.text}` : message;
}
