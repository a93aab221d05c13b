/**
 * Keyword research crew.
 *
 * Three personas run in sequence over one research topic: a keyword
 * researcher proposes search phrases, a search analyst tests them, an
 * insights compiler turns the findings into recommendations.
 *
 * ```typescript
 * import { run, loadAppConfig, DEFAULT_AGENT_DEPLOYMENT, createLogger } from "keyword-research-crew";
 *
 * const config = loadAppConfig();
 * const output = await run(
 *   { inputs: { research_topic: { topic: "home espresso grinders" } }, deployment: DEFAULT_AGENT_DEPLOYMENT },
 *   { credentials: config.credentials, logger: createLogger() }
 * );
 * ```
 */

export * from "./config/index.js";
export * from "./research/index.js";
export * from "./types/index.js";
export {
  createLogger,
  initRunId,
  getRunId,
  type Logger,
  type LogLevel,
  type LoggerOptions,
  type LogSink,
  type LogEntry,
  type LogContext,
} from "./logging/index.js";
export {
  PromptTemplateLoader,
  TemplateLoadError,
  TemplateParseError,
  ConditionalParseError,
  PromptRenderError,
} from "./prompts/index.js";
export * from "./pipeline/index.js";
export { AiSdkStageRunner, type AiSdkStageRunnerOptions } from "./agents/stage-runner.js";
export { createToolset, type Toolset } from "./agents/tools/toolset.js";
export { WebSearchError, type SearchResult } from "./agents/tools/web-search.js";
export { FileToolError } from "./agents/tools/file-tools.js";
export * from "./orchestrator/index.js";
