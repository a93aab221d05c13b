/**
 * Default agent deployment, used when no descriptor file is available.
 */

import type { AgentDeployment } from "./schema.js";

export const DEFAULT_AGENT_DEPLOYMENT: AgentDeployment = {
  name: "keyword_research_default",
  module: "keyword-research-crew",
  agentConfig: {
    llmConfig: {
      configName: "openai",
      client: "openai",
      model: "gpt-4o",
      temperature: 0.7,
    },
    maxSteps: 5,
  },
};
