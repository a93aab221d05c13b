/**
 * Pipeline, stage and role definitions.
 * A run is a fixed chain of three stages, each bound to one role.
 */

import type { LlmConfig } from "../config/deployment/schema.js";

export const STAGE_IDS = [
  "keyword_analysis",
  "search_analysis",
  "final_recommendations",
] as const;

export type StageId = (typeof STAGE_IDS)[number];

export type RoleId = "keyword_researcher" | "search_analyst" | "insights_compiler";

/** External capabilities a role may be allowed to use. */
export type ToolCapability = "web_search" | "file_read" | "file_write";

/**
 * A persona shared by reference across the stages that use it.
 */
export interface Role {
  readonly id: RoleId;
  readonly title: string;
  readonly goal: string;
  readonly backstory: string;
  readonly tools: readonly ToolCapability[];
  readonly llm: Readonly<LlmConfig>;
}

export interface Stage {
  readonly id: StageId;
  /** Rendered instructions for this stage */
  readonly description: string;
  /** Template file the description was rendered from */
  readonly template: string;
  /** One-line description of the deliverable */
  readonly expectedOutput: string;
  readonly role: Role;
  /** Upstream stages whose outputs are passed in as context, in order */
  readonly dependsOn: readonly StageId[];
  /** Where the stage output is written, e.g. output-files/keyword_analysis_20240115_090507.md */
  readonly artifactPath: string;
}

/**
 * What the reasoning collaborator hands back for one stage.
 * `metadata` is expected to be a plain object but is not trusted.
 */
export interface StageOutput {
  readonly text: string;
  readonly metadata?: unknown;
}

export interface StageResult extends StageOutput {
  readonly stageId: StageId;
  readonly artifactPath: string;
  readonly completedAt: Date;
}

/** Completed stage results; iteration order is execution order. */
export type StageResults = ReadonlyMap<StageId, StageResult>;
