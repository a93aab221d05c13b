/**
 * Prompt context: the variables a stage template may reference.
 *
 *   topic.subject            research_topic.topic
 *   topic.context            research_topic.context
 *   topic.depth              research_topic.depth
 *   topic.objective          research_topic.research_objective
 *   topic.focus              research_topic.specific_focus
 *   request.maxSources       max_sources
 *   request.includeCitations include_citations ("true" | "false")
 *   run.timestamp            artifact timestamp shared by the run's stages
 *
 * A topic field the caller left out renders as "", so an `{{#if}}` around
 * it drops the whole line. A group whose source was never handed in (no
 * request, no timestamp) holds the UNSET marker instead and fails the render
 * if a template prints it.
 */

import type { RequestConfig, ResearchTopic } from "../research/schema.js";

export interface PromptContextMap {
  "topic.subject": string;
  "topic.context": string;
  "topic.depth": string;
  "topic.objective": string;
  "topic.focus": string;
  "request.maxSources": string;
  "request.includeCitations": string;
  "run.timestamp": string;
}

export type PromptVariable = keyof PromptContextMap;

export type PromptContext = Readonly<PromptContextMap>;

// Record keyed by PromptVariable: adding a key to the map without listing it here fails to compile.
const VARIABLES: Record<PromptVariable, true> = {
  "topic.subject": true,
  "topic.context": true,
  "topic.depth": true,
  "topic.objective": true,
  "topic.focus": true,
  "request.maxSources": true,
  "request.includeCitations": true,
  "run.timestamp": true,
};

export function isPromptVariable(name: string): name is PromptVariable {
  return Object.prototype.hasOwnProperty.call(VARIABLES, name);
}

/** Every variable name, sorted. */
export function listPromptVariables(): PromptVariable[] {
  return Object.keys(VARIABLES).filter(isPromptVariable).sort();
}

const UNSET = "__UNSET__";

export function isUnset(value: string): boolean {
  return value === UNSET;
}

export interface PromptContextInput {
  topic: Readonly<ResearchTopic>;
  request?: Readonly<RequestConfig>;
  /** YYYYMMDD_HHMMSS */
  timestamp?: string;
}

export function buildPromptContext({ topic, request, timestamp }: PromptContextInput): PromptContext {
  return Object.freeze({
    "topic.subject": topic.topic,
    "topic.context": topic.context ?? "",
    "topic.depth": topic.depth,
    "topic.objective": topic.research_objective ?? "",
    "topic.focus": topic.specific_focus ?? "",
    "request.maxSources": request === undefined ? UNSET : String(request.max_sources),
    "request.includeCitations": request === undefined ? UNSET : String(request.include_citations),
    "run.timestamp": timestamp ?? UNSET,
  });
}
