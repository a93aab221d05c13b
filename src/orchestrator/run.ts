/**
 * Entry point for one research run.
 */

import type { AgentDeployment } from "../config/index.js";
import { validateRequest } from "../research/validate.js";
import type { ResearchOutput } from "../research/schema.js";
import { ResearcherAgent, type ResearcherAgentOptions } from "./researcher.js";

/**
 * A run request: the caller's payload plus the deployment it runs under.
 */
export interface AgentRunInput {
  /** Raw request record; validated before anything else happens */
  inputs: unknown;
  deployment: Readonly<AgentDeployment>;
  consumerId?: string;
}

export type RunOptions = Omit<ResearcherAgentOptions, "deployment">;

/**
 * Validate the request, then run the three-stage pipeline.
 *
 * @throws ValidationError     if the request is invalid; no stage runs
 * @throws StageExecutionError if a stage fails
 */
export async function run(moduleRun: AgentRunInput, options: RunOptions): Promise<ResearchOutput> {
  const request = validateRequest(moduleRun.inputs);

  options.logger.info("Research run started", {
    topic: request.research_topic.topic,
    depth: request.research_topic.depth,
    maxSources: request.max_sources,
    includeCitations: request.include_citations,
    deployment: moduleRun.deployment.name,
    consumerId: moduleRun.consumerId,
  });

  const researcher = new ResearcherAgent({ ...options, deployment: moduleRun.deployment });
  const output = await researcher.research(request);

  options.logger.info("Research run finished");
  return output;
}
