/**
 * Research request/result domain.
 */

export {
  ResearchDepth,
  ResearchTopicSchema,
  InputSchema,
  type ResearchTopic,
  type RequestConfig,
  type ResearchOutput,
  type StageMapping,
} from "./schema.js";

export {
  validateRequest,
  ValidationError,
} from "./validate.js";
