/**
 * Agent deployment configuration module.
 *
 * Usage:
 *   import { loadAgentDeployments, selectDeployment } from "./config/deployment/index.js";
 *
 *   const deployments = loadAgentDeployments("configs/agent_deployments.json");
 *   const deployment = selectDeployment(deployments, "keyword_research_mini");
 */

// Schema types
export type {
  AgentDeployment,
  AgentConfig,
  LlmConfig,
} from "./schema.js";

// Schema objects
export {
  AgentDeploymentSchema,
  AgentDeploymentListSchema,
  AgentConfigSchema,
  LlmConfigSchema,
} from "./schema.js";

// Loader and validation
export {
  parseAgentDeployments,
  loadAgentDeployments,
  selectDeployment,
  DeploymentConfigError,
} from "./loader.js";

// Defaults
export { DEFAULT_AGENT_DEPLOYMENT } from "./defaults.js";
