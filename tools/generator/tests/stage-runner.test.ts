import { afterEach, describe, expect, test } from "vitest";
import { mkdtempSync, readFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { InputError, ProcessorError } from "../pipeline/errors.js";
import { initializeEventEmitter, resetEventEmitter } from "../pipeline/events.js";
import { Logger } from "../pipeline/logger.js";
import { normalizeStageError, runStage } from "../pipeline/stage-runner.js";

function startEmitter(): string {
  const dir = mkdtempSync(join(tmpdir(), "collection-stage-"));
  const eventFilePath = join(dir, "events.ndjson");
  initializeEventEmitter({
    runId: "test-run",
    format: "pretty",
    verbose: false,
    consoleLogs: false,
    eventFilePath,
  });
  return eventFilePath;
}

function readEvents(path: string): Array<Record<string, unknown>> {
  return readFileSync(path, "utf-8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
}

afterEach(() => {
  resetEventEmitter();
});

describe("runStage", () => {
  test("logs start and end around a successful stage", async () => {
    const eventFile = startEmitter();
    const logger = new Logger();

    const result = await runStage(
      {
        name: "process",
        run: async (context: { rows: number }) => {
          new Logger().info("Working", { eventType: "schema.resolved" });
          return context.rows * 2;
        },
      },
      { rows: 21 },
      logger
    );

    expect(result).toBe(42);
    const events = readEvents(eventFile);
    expect(events.map((event) => [event.stage, event.message, event.phase])).toEqual([
      ["process", "Stage started", "start"],
      ["process", "Working", undefined],
      ["process", "Stage completed", "end"],
    ]);
    expect(typeof events[2].durationMs).toBe("number");
  });

  test("wraps unexpected errors and logs the failure", async () => {
    const eventFile = startEmitter();

    const run = runStage(
      {
        name: "write",
        run: async () => {
          throw new Error("disk full");
        },
      },
      {},
      new Logger()
    );

    await expect(run).rejects.toMatchObject({ code: "STAGE_ERROR", message: "disk full" });
    const failure = readEvents(eventFile).at(-1);
    expect(failure).toMatchObject({
      stage: "write",
      level: "error",
      phase: "fail",
      errorCode: "STAGE_ERROR",
      errorMessage: "disk full",
    });
  });

  test("passes processor errors through unchanged", async () => {
    startEmitter();
    const inputError = new InputError("Input file not found: missing.csv");

    await expect(
      runStage(
        {
          name: "load",
          run: async () => {
            throw inputError;
          },
        },
        {},
        new Logger()
      )
    ).rejects.toBe(inputError);
  });
});

describe("normalizeStageError", () => {
  test("converts non-error values", () => {
    const error = normalizeStageError("plain failure");
    expect(error).toBeInstanceOf(ProcessorError);
    expect(error.code).toBe("STAGE_ERROR");
    expect(error.message).toBe("plain failure");
  });
});
