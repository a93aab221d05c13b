export { run, type AgentRunInput, type RunOptions } from "./run.js";
export { ResearcherAgent, type ResearcherAgentOptions } from "./researcher.js";
export {
  shapeResearchOutput,
  shapeStageResult,
  ResultShapingError,
  type ShapingFailureReason,
} from "./shaping.js";
