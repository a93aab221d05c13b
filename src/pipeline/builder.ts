/**
 * Task pipeline builder.
 *
 * Produces the fixed three-stage chain for one run:
 *
 *   keyword_analysis → search_analysis → final_recommendations
 *
 * Each stage after the first takes exactly the previous stage's output as
 * context. The builder is pure apart from reading (cached) templates.
 */

import type { RequestConfig } from "../research/schema.js";
import { STAGE_IDS, type RoleId, type Stage, type StageId } from "../types/pipeline.js";
import {
  buildOutputRequirements,
  buildPromptContext,
  renderPrompt,
  type PromptTemplateLoader,
} from "../prompts/index.js";
import { artifactPathFor, DEFAULT_OUTPUT_DIR } from "./artifacts.js";
import type { RoleSet } from "./roles.js";

interface StageDefinition {
  readonly template: string;
  readonly roleId: RoleId;
  readonly dependsOn: readonly StageId[];
  readonly expectedOutput: string;
}

/** Keyed by stage; run order is STAGE_IDS. */
export const STAGE_DEFINITIONS: Readonly<Record<StageId, StageDefinition>> = {
  keyword_analysis: {
    template: "keyword-analysis.md",
    roleId: "keyword_researcher",
    dependsOn: [],
    expectedOutput:
      "A concept breakdown with primary keywords, related terms, search intents " +
      "and at least 5 candidate search phrases.",
  },
  search_analysis: {
    template: "search-analysis.md",
    roleId: "search_analyst",
    dependsOn: ["keyword_analysis"],
    expectedOutput:
      "An evaluation of each keyword's search results with gaps and suggested refinements.",
  },
  final_recommendations: {
    template: "final-recommendations.md",
    roleId: "insights_compiler",
    dependsOn: ["search_analysis"],
    expectedOutput:
      "A prioritized, grouped list of recommended search terms with objective-specific advice.",
  },
};

export interface PipelineInput {
  request: Readonly<RequestConfig>;
  /** YYYYMMDD_HHMMSS, computed once per run */
  timestamp: string;
  roles: RoleSet;
  templates: PromptTemplateLoader;
  outputDir?: string;
}

/**
 * Build the ordered stage list for a run.
 *
 * @throws TemplateLoadError / TemplateParseError / PromptRenderError when a
 *         stage template is missing or does not fit the context
 */
export function buildPipeline(input: PipelineInput): readonly Stage[] {
  const { request, timestamp, roles, templates, outputDir = DEFAULT_OUTPUT_DIR } = input;

  const context = buildPromptContext({
    topic: request.research_topic,
    request,
    timestamp,
  });

  const stages = STAGE_IDS.map((id): Stage => {
    const definition = STAGE_DEFINITIONS[id];
    const description = renderPrompt(templates.load(definition.template), context, {
      requirements: buildOutputRequirements({ request, stageId: id }),
    });

    return Object.freeze({
      id,
      description,
      template: definition.template,
      expectedOutput: definition.expectedOutput,
      role: roles[definition.roleId],
      dependsOn: definition.dependsOn,
      artifactPath: artifactPathFor(outputDir, id, timestamp),
    });
  });

  return Object.freeze(stages);
}
