import { afterEach, describe, expect, test } from "vitest";
import { mkdtempSync, readFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  emitProcessorEvent,
  formatCondensedForTest,
  formatPrettyForTest,
  initializeEventEmitter,
  resetEventEmitter,
  shouldPrintToTerminalForTest,
  truncateEventForTest,
} from "../pipeline/events.js";
import { Logger } from "../pipeline/logger.js";
import { runWithTelemetryContext } from "../pipeline/telemetry-context.js";
import type { ProcessorEvent } from "../pipeline/types.js";

function sampleEvent(overrides: Partial<ProcessorEvent> = {}): ProcessorEvent {
  return {
    ts: "2026-02-26T00:00:00.000Z",
    runId: "run-1",
    level: "info",
    stage: "process",
    eventType: "schema.resolved",
    message: "Resolved columns",
    ...overrides,
  };
}

afterEach(() => {
  resetEventEmitter();
});

describe("event truncation", () => {
  test("truncates long strings", () => {
    const truncated = truncateEventForTest(sampleEvent({ message: "x".repeat(500) }));
    expect(truncated.message).toBe(`${"x".repeat(240)}...[truncated]`);
  });

  test("truncates strings nested in arrays", () => {
    const truncated = truncateEventForTest(sampleEvent({ columns: ["short", "y".repeat(300)] }));
    expect(truncated.columns).toEqual(["short", `${"y".repeat(240)}...[truncated]`]);
  });
});

describe("event formatting", () => {
  test("pretty format includes stage, eventType, message and extras", () => {
    const line = formatPrettyForTest(
      sampleEvent({
        eventType: "diagnostic",
        message: "Unknown search engine: bandcamp",
        errorCode: "UNKNOWN_ENGINE",
      })
    );

    expect(line).toBe(
      '2026-02-26T00:00:00.000Z INFO [process] [diagnostic] Unknown search engine: bandcamp errorCode="UNKNOWN_ENGINE"'
    );
  });

  test("pretty format skips empty extras", () => {
    const line = formatPrettyForTest(sampleEvent({ path: "", bytes: undefined }));
    expect(line).toBe("2026-02-26T00:00:00.000Z INFO [process] [schema.resolved] Resolved columns");
  });

  test("condensed format is compact and includes key extras", () => {
    const line = formatCondensedForTest(
      sampleEvent({
        stage: "write",
        eventType: "stage.lifecycle",
        message: "Stage failed",
        phase: "fail",
        durationMs: 987,
        errorCode: "OUTPUT_ERROR",
        errorMessage: "disk full",
      })
    );

    expect(line).toBe('[00:00:00] write fail Stage failed durationMs=987 errorCode="OUTPUT_ERROR"');
  });
});

describe("terminal filtering", () => {
  test("non-verbose hides file and row noise", () => {
    expect(
      shouldPrintToTerminalForTest(sampleEvent({ eventType: "file.write", message: "Writing text file" }), false)
    ).toBe(false);
    expect(
      shouldPrintToTerminalForTest(sampleEvent({ eventType: "row.enriched", message: "Row enriched" }), false)
    ).toBe(false);
    expect(shouldPrintToTerminalForTest(sampleEvent({ level: "debug" }), false)).toBe(false);
  });

  test("non-verbose shows stage completion but not stage start", () => {
    expect(
      shouldPrintToTerminalForTest(
        sampleEvent({ eventType: "stage.lifecycle", phase: "start", message: "Stage started" }),
        false
      )
    ).toBe(false);
    expect(
      shouldPrintToTerminalForTest(
        sampleEvent({ eventType: "stage.lifecycle", phase: "end", message: "Stage completed" }),
        false
      )
    ).toBe(true);
  });

  test("non-verbose shows diagnostics and errors", () => {
    expect(
      shouldPrintToTerminalForTest(sampleEvent({ eventType: "diagnostic", level: "warn" }), false)
    ).toBe(true);
    expect(
      shouldPrintToTerminalForTest(sampleEvent({ eventType: "file.write", level: "error" }), false)
    ).toBe(true);
  });

  test("verbose mode prints everything", () => {
    expect(
      shouldPrintToTerminalForTest(sampleEvent({ eventType: "row.enriched", level: "debug" }), true)
    ).toBe(true);
  });
});

describe("event sinks", () => {
  test("writes pretty lines to the log file and JSON lines to the event file", async () => {
    const dir = mkdtempSync(join(tmpdir(), "collection-events-"));
    const logFilePath = join(dir, "run.log");
    const eventFilePath = join(dir, "events.ndjson");
    initializeEventEmitter({
      runId: "run-42",
      format: "pretty",
      verbose: false,
      consoleLogs: false,
      logFilePath,
      eventFilePath,
    });

    emitProcessorEvent({ level: "info", eventType: "config", message: "Loaded config file" });
    await runWithTelemetryContext({ stage: "load" }, async () => {
      new Logger().warn("Latin-1 input", { eventType: "input.decode" });
    });

    const logLines = readFileSync(logFilePath, "utf-8").trim().split("\n");
    expect(logLines).toHaveLength(2);
    expect(logLines[0]).toMatch(/^\S+ INFO \[system\] \[config\] Loaded config file$/);
    expect(logLines[1]).toMatch(/^\S+ WARN \[load\] \[input\.decode\] Latin-1 input$/);

    const events = readFileSync(eventFilePath, "utf-8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(events.map((event) => [event.runId, event.stage, event.eventType])).toEqual([
      ["run-42", "system", "config"],
      ["run-42", "load", "input.decode"],
    ]);
  });

  test("restarting the emitter truncates the log file", () => {
    const dir = mkdtempSync(join(tmpdir(), "collection-events-"));
    const logFilePath = join(dir, "run.log");
    const config = { runId: "run-1", format: "pretty" as const, verbose: false, consoleLogs: false, logFilePath };

    initializeEventEmitter(config);
    emitProcessorEvent({ level: "info", message: "first run" });
    initializeEventEmitter(config);

    expect(readFileSync(logFilePath, "utf-8")).toBe("");
  });

  test("drops events when no emitter is initialized", () => {
    expect(() => emitProcessorEvent({ level: "info", message: "ignored" })).not.toThrow();
  });
});
