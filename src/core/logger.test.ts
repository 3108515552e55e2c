import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, eventWithTs, logBridgeEvent } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("JsonlLogger", () => {
  it("writes events with operation and ref metadata", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "nested", "events.jsonl");
    const logger = new JsonlLogger(logPath, { opId: "op-1", ref: "aptrunk" });

    logger.log({ type: "switch.start", payload: { force: false } });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    expect(lines).toHaveLength(1);

    const event: Record<string, unknown> = JSON.parse(lines[0]);
    expect(event.type).toBe("switch.start");
    expect(event.op_id).toBe("op-1");
    expect(event.ref).toBe("aptrunk");
    expect(event.payload).toEqual({ force: false });
    expect(new Date(String(event.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const first = new JsonlLogger(logPath, { opId: "op-2" });
    first.log({ type: "first", payload: { order: 1 } });
    first.close();

    const second = new JsonlLogger(logPath, { opId: "op-3" });
    second.log({ type: "second", payload: { order: 2 } });
    second.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    const events: Array<Record<string, unknown>> = lines.map((line) => JSON.parse(line));

    expect(events.map((e) => e.type)).toEqual(["first", "second"]);
    expect(events.map((e) => e.op_id)).toEqual(["op-2", "op-3"]);
  });

  it("logs bridge helpers with top-level fields", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { opId: "op-4" });

    logBridgeEvent(logger, "switch.transition", {
      from: "RESOLVING",
      to: "CHECKED_OUT",
      ref: "trunk",
    });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    const event: Record<string, unknown> = JSON.parse(lines[0]);

    expect(event.type).toBe("switch.transition");
    expect(event.op_id).toBe("op-4");
    expect(event.ref).toBe("trunk");
    expect(event.from).toBe("RESOLVING");
    expect(event.to).toBe("CHECKED_OUT");
  });

  it("warns instead of failing when an event cannot be written", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { opId: "op-5" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "switch.start" });
    logger.close();

    expect(warnSpy.mock.calls).toEqual([
      [`Warning: failed to append to event log ${logPath}: disk full`],
    ]);
  });
});

describe("eventWithTs", () => {
  it("merges defaults and payload", () => {
    const event = eventWithTs(
      { type: "sample", payload: { key: "value" }, ref: "trunk" },
      { opId: "op-x" },
    );

    expect(event.op_id).toBe("op-x");
    expect(event.ref).toBe("trunk");
    expect(event.type).toBe("sample");
    expect(event.payload).toEqual({ key: "value" });
  });

  it("keeps a timestamp the caller provides", () => {
    const event = eventWithTs({ type: "sample", opId: "op-t", ts: "2026-01-01T00:00:00.000Z" });

    expect(event.ts).toBe("2026-01-01T00:00:00.000Z");
  });

  it("drops empty payloads", () => {
    const event = eventWithTs({ type: "sample", payload: {}, opId: "op-y" });

    expect("payload" in event).toBe(false);
  });

  it("throws when opId is missing", () => {
    expect(() => eventWithTs({ type: "missing-op" })).toThrow(/op_id is required/i);
  });
});
