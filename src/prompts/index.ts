/**
 * Stage prompt templates.
 *
 * ```typescript
 * const templates = new PromptTemplateLoader();
 * const description = renderPrompt(
 *   templates.load("keyword-analysis.md"),
 *   buildPromptContext({ topic: request.research_topic, request, timestamp }),
 *   { requirements: buildOutputRequirements({ request, stageId: "keyword_analysis" }) }
 * );
 * ```
 */

export {
  buildPromptContext,
  isPromptVariable,
  listPromptVariables,
  isUnset,
  type PromptContext,
  type PromptContextMap,
  type PromptContextInput,
  type PromptVariable,
} from "./context.js";

export {
  parseTemplate,
  extractVariables,
  TemplateParseError,
  type ParsedTemplate,
} from "./template.js";

export {
  parseConditionalBlocks,
  evaluateCondition,
  resolveConditionals,
  getEnumValues,
  ConditionalParseError,
  type Condition,
  type ConditionalBlock,
} from "./conditional.js";

export { renderPrompt, PromptRenderError, type RenderOptions } from "./renderer.js";

export {
  buildOutputRequirements,
  formatOutputRequirements,
  type OutputRequirements,
  type RequirementRule,
  type RequirementInput,
} from "./constraints.js";

export { PromptTemplateLoader, TemplateLoadError, DEFAULT_PROMPTS_DIR } from "./loader.js";
