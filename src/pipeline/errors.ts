/**
 * Pipeline errors.
 */

import type { StageId } from "../types/pipeline.js";

/**
 * The stage list, roles or tools do not fit together. Raised before any
 * stage runs.
 */
export class PipelineDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineDefinitionError";
  }
}

/**
 * A stage failed: the reasoning collaborator threw, returned something that
 * is not a stage output, or the artifact could not be written. The run
 * stops here; later stages never start.
 */
export class StageExecutionError extends Error {
  constructor(
    public readonly stageId: StageId,
    cause: unknown,
    message?: string
  ) {
    super(
      message ??
        `Stage "${stageId}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "StageExecutionError";
  }
}
