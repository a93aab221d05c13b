/**
 * Result shaping: stage results → ResearchOutput.
 *
 * Shaping failures never fail the run. Each field is shaped on its own; a
 * field that cannot be shaped is logged with the reason and becomes `{}`.
 * The log line tells "stage never produced a result" (missing) apart from
 * "result had an unexpected shape" (malformed); the returned object does not.
 */

import { z } from "zod";
import type { Logger } from "../logging/index.js";
import type { ResearchOutput, StageMapping } from "../research/schema.js";
import type { StageId, StageResult, StageResults } from "../types/pipeline.js";

export type ShapingFailureReason = "missing" | "malformed";

export class ResultShapingError extends Error {
  constructor(
    public readonly stageId: StageId,
    public readonly reason: ShapingFailureReason,
    message: string
  ) {
    super(message);
    this.name = "ResultShapingError";
  }
}

const MetadataSchema = z.record(z.unknown());

/**
 * Shape one stage result into a result field.
 *
 * @throws ResultShapingError if the result is absent or its metadata is not a plain object
 */
export function shapeStageResult(stageId: StageId, result: StageResult | undefined): StageMapping {
  if (result === undefined) {
    throw new ResultShapingError(stageId, "missing", `No result recorded for stage "${stageId}"`);
  }

  if (typeof result.text !== "string") {
    throw new ResultShapingError(stageId, "malformed", `Stage "${stageId}" text is not a string`);
  }

  let metadata: Record<string, unknown> = {};
  if (result.metadata !== undefined) {
    const parsed = MetadataSchema.safeParse(result.metadata);
    if (!parsed.success) {
      throw new ResultShapingError(
        stageId,
        "malformed",
        `Stage "${stageId}" metadata is not an object`
      );
    }
    metadata = parsed.data;
  }

  return {
    stage: stageId,
    content: result.text,
    artifactPath: result.artifactPath,
    metadata,
  };
}

/**
 * Map stage results onto the three ResearchOutput fields.
 */
export function shapeResearchOutput(results: StageResults, logger: Logger): ResearchOutput {
  const shape = (field: StageId): StageMapping => {
    try {
      return shapeStageResult(field, results.get(field));
    } catch (err) {
      if (!(err instanceof ResultShapingError)) throw err;
      logger.error("Failed to shape research result", {
        field,
        reason: err.reason,
        message: err.message,
      });
      return {};
    }
  };

  return Object.freeze({
    keyword_analysis: shape("keyword_analysis"),
    search_analysis: shape("search_analysis"),
    final_recommendations: shape("final_recommendations"),
  });
}
