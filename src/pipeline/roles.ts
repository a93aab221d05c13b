/**
 * Role definitions for the three research personas.
 *
 * Roles are built once per run from the deployment's model configuration
 * and shared by reference with the stages that use them.
 */

import type { LlmConfig } from "../config/deployment/schema.js";
import type { Role, RoleId, ToolCapability } from "../types/pipeline.js";
import { PipelineDefinitionError } from "./errors.js";

type RoleDefinition = Omit<Role, "llm">;

const ROLE_DEFINITIONS: Readonly<Record<RoleId, RoleDefinition>> = {
  keyword_researcher: {
    id: "keyword_researcher",
    title: "Expert Keyword Research Specialist",
    goal: "Analyze topics and identify the most effective search terms and phrases",
    backstory:
      "Expert keyword research specialist with deep understanding of search behavior " +
      "and semantic analysis. Skilled at breaking down topics into relevant search terms.",
    tools: ["web_search"],
  },
  search_analyst: {
    id: "search_analyst",
    title: "Search Results Analyst",
    goal: "Evaluate and refine search queries based on initial results",
    backstory:
      "Analytical expert specializing in evaluating search results and identifying " +
      "patterns in successful queries.",
    tools: ["web_search"],
  },
  insights_compiler: {
    id: "insights_compiler",
    title: "Research Insights Compiler",
    goal: "Synthesize findings and create structured recommendations",
    backstory:
      "Research synthesis specialist who excels at organizing insights into clear, " +
      "actionable recommendations.",
    tools: ["web_search"],
  },
};

export type RoleSet = Readonly<Record<RoleId, Role>>;

/**
 * Build the three roles against one shared, frozen model configuration.
 *
 * @param availableTools - Capabilities initialized for this run
 * @throws PipelineDefinitionError if a role needs a tool that is not available
 */
export function buildRoles(
  llm: Readonly<LlmConfig>,
  availableTools: readonly ToolCapability[]
): RoleSet {
  const sharedLlm = Object.freeze({ ...llm });
  const available = new Set(availableTools);

  const build = (definition: RoleDefinition): Role => {
    const missing = definition.tools.filter((t) => !available.has(t));
    if (missing.length > 0) {
      throw new PipelineDefinitionError(
        `Role "${definition.id}" requires unavailable tool(s): ${missing.join(", ")}`
      );
    }
    return Object.freeze({
      ...definition,
      tools: Object.freeze([...definition.tools]),
      llm: sharedLlm,
    });
  };

  return Object.freeze({
    keyword_researcher: build(ROLE_DEFINITIONS.keyword_researcher),
    search_analyst: build(ROLE_DEFINITIONS.search_analyst),
    insights_compiler: build(ROLE_DEFINITIONS.insights_compiler),
  });
}

/** Roles as a list, in stage order. */
export function listRoles(roles: RoleSet): readonly Role[] {
  return [roles.keyword_researcher, roles.search_analyst, roles.insights_compiler];
}
