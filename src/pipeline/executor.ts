/**
 * Pipeline executor.
 *
 * Runs stages strictly one after another. A stage's description already
 * says what to do; the executor adds the outputs of its upstream stages as
 * context, hands both to the stage runner, writes the artifact and records
 * the result. The first failure ends the run: there is no retry and no skip.
 */

import { z } from "zod";
import type { Logger } from "../logging/index.js";
import type {
  Role,
  Stage,
  StageId,
  StageOutput,
  StageResult,
  StageResults,
} from "../types/pipeline.js";
import type { Toolset } from "../agents/tools/toolset.js";
import type { ArtifactWriter } from "./artifacts.js";
import { PipelineDefinitionError, StageExecutionError } from "./errors.js";

export interface StageRunRequest {
  readonly stage: Stage;
  /** Upstream outputs, formatted; empty for the first stage */
  readonly context: string;
  readonly tools: Toolset;
}

/**
 * The reasoning/tool-use collaborator that turns a stage into output.
 */
export interface StageRunner {
  runStage(request: StageRunRequest): Promise<StageOutput>;
}

export interface PipelineExecutorOptions {
  runner: StageRunner;
  artifacts: ArtifactWriter;
  logger: Logger;
  now?: () => Date;
}

const StageOutputSchema = z.object({
  text: z.string(),
  metadata: z.unknown().optional(),
});

/**
 * Check the stage list before anything runs: roles must be among the run's
 * roles, ids unique, and each dependency an earlier stage.
 */
export function assertRunnable(stages: readonly Stage[], roles: readonly Role[]): void {
  const seen = new Set<StageId>();

  for (const stage of stages) {
    if (seen.has(stage.id)) {
      throw new PipelineDefinitionError(`Duplicate stage "${stage.id}"`);
    }
    if (!roles.includes(stage.role)) {
      throw new PipelineDefinitionError(
        `Stage "${stage.id}" is bound to role "${stage.role.id}", which is not part of this run`
      );
    }
    for (const upstream of stage.dependsOn) {
      if (!seen.has(upstream)) {
        throw new PipelineDefinitionError(
          `Stage "${stage.id}" depends on "${upstream}", which does not run before it`
        );
      }
    }
    seen.add(stage.id);
  }
}

/**
 * Concatenate the outputs of a stage's upstream stages, in dependsOn order.
 */
export function formatUpstreamContext(stage: Stage, results: StageResults): string {
  return stage.dependsOn
    .map((upstream) => {
      const result = results.get(upstream);
      if (!result) {
        throw new PipelineDefinitionError(
          `Stage "${stage.id}" needs the output of "${upstream}", which has not completed`
        );
      }
      return `## Output of ${upstream}\n\n${result.text.trim()}`;
    })
    .join("\n\n");
}

export class PipelineExecutor {
  private readonly runner: StageRunner;
  private readonly artifacts: ArtifactWriter;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: PipelineExecutorOptions) {
    this.runner = options.runner;
    this.artifacts = options.artifacts;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run every stage in order.
   *
   * @returns Results keyed by stage id, in execution order
   * @throws PipelineDefinitionError before the first stage if the list is inconsistent
   * @throws StageExecutionError for the first stage that fails
   */
  async execute(
    stages: readonly Stage[],
    roles: readonly Role[],
    tools: Toolset
  ): Promise<StageResults> {
    assertRunnable(stages, roles);

    const results = new Map<StageId, StageResult>();

    for (const [index, stage] of stages.entries()) {
      const context = formatUpstreamContext(stage, results);
      this.logger.info("Stage started", {
        stage: stage.id,
        position: `${index + 1}/${stages.length}`,
        role: stage.role.id,
        dependsOn: stage.dependsOn,
      });

      const output = await this.runStage(stage, context, tools);

      try {
        await this.artifacts.write(stage.artifactPath, output.text);
      } catch (err) {
        this.logger.error("Artifact write failed", { stage: stage.id, path: stage.artifactPath });
        throw new StageExecutionError(stage.id, err);
      }

      results.set(stage.id, {
        stageId: stage.id,
        text: output.text,
        metadata: output.metadata,
        artifactPath: stage.artifactPath,
        completedAt: this.now(),
      });

      this.logger.info("Stage completed", {
        stage: stage.id,
        artifact: stage.artifactPath,
        chars: output.text.length,
      });
    }

    return new Map(results);
  }

  private async runStage(stage: Stage, context: string, tools: Toolset): Promise<StageOutput> {
    let raw: unknown;
    try {
      raw = await this.runner.runStage({ stage, context, tools });
    } catch (err) {
      this.logger.error("Stage failed", {
        stage: stage.id,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new StageExecutionError(stage.id, err);
    }

    const parsed = StageOutputSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.error("Stage returned a malformed response", { stage: stage.id });
      throw new StageExecutionError(
        stage.id,
        parsed.error,
        `Stage "${stage.id}" returned a malformed response: ${parsed.error.issues
          .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
          .join("; ")}`
      );
    }
    return parsed.data;
  }
}
