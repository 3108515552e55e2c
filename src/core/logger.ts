import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
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
  op_id: string;
  ref?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  opId?: string;
  ref?: string;
  payload?: JsonObject;
  ts?: string;
};

type EventDefaults = {
  opId?: string;
  ref?: string;
};

export interface EventLog {
  log(event: LogEventInput): void;
  close(): void;
}

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLog {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
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
      console.warn(
        `Warning: failed to close event log ${this.filePath}: ${formatErrorMessage(err)}`,
      );
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
      // Never fail the operation over its event log.
      console.warn(
        `Warning: failed to append to event log ${this.filePath}: ${formatErrorMessage(err)}`,
      );
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { opId: providedOpId, ref, payload, ts, type, ...rest } = event;

  const opId = providedOpId ?? defaults.opId;
  if (!opId) {
    throw new Error("op_id is required for log events");
  }

  const resolvedRef = ref ?? defaults.ref;

  const result: LogEvent = {
    ...rest,
    ts: ts ?? isoNow(),
    type,
    op_id: opId,
  };

  if (resolvedRef) {
    result.ref = resolvedRef;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logBridgeEvent(
  logger: EventLog,
  type: string,
  fields: JsonObject & { ref?: string } = {},
): void {
  const { ref, ...rest } = fields;
  logger.log(ref === undefined ? { type, ...rest } : { type, ref, ...rest });
}
