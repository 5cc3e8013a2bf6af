import { ProcessorError } from "./errors.js";
import { Logger } from "./logger.js";
import { runWithTelemetryContext } from "./telemetry-context.js";
import type { StageName } from "./types.js";

export interface StageDefinition<TContext, TResult> {
  name: StageName;
  run: (context: TContext) => Promise<TResult>;
}

export async function runStage<TContext, TResult>(
  stage: StageDefinition<TContext, TResult>,
  context: TContext,
  logger: Logger
): Promise<TResult> {
  const startedAt = Date.now();
  logger.info("Stage started", {
    stage: stage.name,
    eventType: "stage.lifecycle",
    phase: "start",
  });

  try {
    const result = await runWithTelemetryContext({ stage: stage.name }, () =>
      stage.run(context)
    );
    logger.info("Stage completed", {
      stage: stage.name,
      eventType: "stage.lifecycle",
      phase: "end",
      durationMs: Date.now() - startedAt,
    });
    return result;
  } catch (error) {
    const wrapped = normalizeStageError(error);
    logger.error("Stage failed", {
      stage: stage.name,
      eventType: "stage.lifecycle",
      phase: "fail",
      durationMs: Date.now() - startedAt,
      errorCode: wrapped.code,
      errorMessage: wrapped.message,
    });
    throw wrapped;
  }
}

export function normalizeStageError(error: unknown): ProcessorError {
  if (error instanceof ProcessorError) {
    return error;
  }

  if (error instanceof Error) {
    return new ProcessorError(error.message, {
      code: "STAGE_ERROR",
      cause: error,
    });
  }

  return new ProcessorError(String(error), {
    code: "STAGE_ERROR",
    cause: error,
  });
}
