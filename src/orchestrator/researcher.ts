/**
 * Run orchestration for one research request.
 */

import type { AgentDeployment, Credentials } from "../config/index.js";
import { requireOpenAiKey } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import type { RequestConfig, ResearchOutput } from "../research/schema.js";
import type { Stage } from "../types/pipeline.js";
import { PromptTemplateLoader } from "../prompts/index.js";
import {
  buildPipeline,
  buildRoles,
  listRoles,
  formatRunTimestamp,
  FileArtifactWriter,
  PipelineExecutor,
  DEFAULT_OUTPUT_DIR,
  type ArtifactWriter,
  type RoleSet,
  type StageRunner,
} from "../pipeline/index.js";
import { createToolset, type Toolset } from "../agents/tools/toolset.js";
import type { FetchLike } from "../agents/tools/web-search.js";
import { AiSdkStageRunner } from "../agents/stage-runner.js";
import { shapeResearchOutput } from "./shaping.js";

export interface ResearcherAgentOptions {
  deployment: Readonly<AgentDeployment>;
  credentials: Credentials;
  logger: Logger;
  /** Artifact directory, relative to baseDir (default: output-files) */
  outputDir?: string;
  /** Working directory for artifacts and the file tools (default: cwd) */
  baseDir?: string;
  /** Reasoning collaborator; defaults to the AI SDK runner */
  runner?: StageRunner;
  artifacts?: ArtifactWriter;
  templates?: PromptTemplateLoader;
  clock?: () => Date;
  fetch?: FetchLike;
}

interface PreparedRun {
  /** YYYYMMDD_HHMMSS shared by the run's artifact names */
  readonly timestamp: string;
  readonly toolset: Toolset;
  readonly roles: RoleSet;
  readonly stages: readonly Stage[];
}

export class ResearcherAgent {
  private readonly options: ResearcherAgentOptions;
  private readonly logger: Logger;
  private readonly baseDir: string;
  private readonly clock: () => Date;
  private templates?: PromptTemplateLoader;

  constructor(options: ResearcherAgentOptions) {
    this.options = options;
    this.logger = options.logger.child("researcher");
    this.baseDir = options.baseDir ?? process.cwd();
    this.clock = options.clock ?? (() => new Date());
    this.templates = options.templates;
  }

  /**
   * Build tools, roles and the three stages for a request without running
   * anything.
   */
  prepare(request: Readonly<RequestConfig>): PreparedRun {
    const toolset = createToolset({
      credentials: this.options.credentials,
      maxSources: request.max_sources,
      baseDir: this.baseDir,
      fetch: this.options.fetch,
    });
    const roles = buildRoles(this.options.deployment.agentConfig.llmConfig, toolset.capabilities);
    const timestamp = formatRunTimestamp(this.clock());
    const stages = buildPipeline({
      request,
      timestamp,
      roles,
      templates: this.loadTemplates(),
      outputDir: this.options.outputDir ?? DEFAULT_OUTPUT_DIR,
    });

    return { timestamp, toolset, roles, stages };
  }

  /**
   * Run the pipeline for a validated request.
   *
   * @throws StageExecutionError if any stage fails; no partial output is returned
   */
  async research(request: Readonly<RequestConfig>): Promise<ResearchOutput> {
    const { timestamp, toolset, roles, stages } = this.prepare(request);

    this.logger.info("Pipeline built", {
      stages: stages.map((s) => s.id),
      artifactTimestamp: timestamp,
      tools: toolset.capabilities,
      model: this.options.deployment.agentConfig.llmConfig.model,
    });

    const executor = new PipelineExecutor({
      runner: this.resolveRunner(),
      artifacts: this.options.artifacts ?? new FileArtifactWriter(this.baseDir),
      logger: this.options.logger.child("executor"),
      now: this.clock,
    });

    const results = await executor.execute(stages, listRoles(roles), toolset);
    return shapeResearchOutput(results, this.logger);
  }

  private loadTemplates(): PromptTemplateLoader {
    if (!this.templates) {
      this.templates = new PromptTemplateLoader();
    }
    return this.templates;
  }

  private resolveRunner(): StageRunner {
    if (this.options.runner) return this.options.runner;

    return new AiSdkStageRunner({
      apiKey: requireOpenAiKey(this.options.credentials),
      maxSteps: this.options.deployment.agentConfig.maxSteps,
      logger: this.options.logger.child("model", { deployment: this.options.deployment.name }),
    });
  }
}
