/**
 * Output requirements appended to every stage description.
 *
 * The source budget and the citation policy come from the request, not
 * from template text, so every stage states them in the same words and an
 * edit to a template cannot drop them. Stage-specific rules sit beside them
 * in a second group.
 */

import type { RequestConfig } from "../research/schema.js";
import type { StageId } from "../types/pipeline.js";

export interface RequirementRule {
  category: "sources" | "citations" | "format";
  /** The rule text, written as a directive. */
  text: string;
}

export interface OutputRequirements {
  /** Rules that apply to every stage of the run. */
  universal: readonly RequirementRule[];
  /** Rules for this stage only. */
  stage: readonly RequirementRule[];
}

export interface RequirementInput {
  request: Readonly<RequestConfig>;
  stageId: StageId;
}

const STAGE_RULES: Record<StageId, readonly RequirementRule[]> = {
  keyword_analysis: [
    {
      category: "format",
      text: "Present the candidate search phrases as a numbered list.",
    },
  ],
  search_analysis: [
    {
      category: "format",
      text: "For each keyword tested, state the query used and a relevance verdict.",
    },
  ],
  final_recommendations: [
    {
      category: "format",
      text: "Order recommendations from highest to lowest priority.",
    },
  ],
};

/**
 * Build the requirements for one stage. Same input, same rules, same order.
 */
export function buildOutputRequirements(input: RequirementInput): OutputRequirements {
  const { request, stageId } = input;
  const sourceNoun = request.max_sources === 1 ? "source" : "sources";

  const universal: RequirementRule[] = [
    {
      category: "sources",
      text: `Consult no more than ${request.max_sources} distinct ${sourceNoun}.`,
    },
    request.include_citations
      ? {
          category: "citations",
          text: "Cite the URL of every search result you rely on.",
        }
      : {
          category: "citations",
          text: "Do not include citations or source URLs.",
        },
  ];

  return Object.freeze({
    universal: Object.freeze(universal),
    stage: STAGE_RULES[stageId],
  });
}

const REQUIREMENTS_HEADING = "## Output Requirements";

/**
 * Format requirements as a Markdown section. The only serializer, so the
 * wording is identical across stages and runs.
 */
export function formatOutputRequirements(requirements: OutputRequirements): string {
  const rules = [...requirements.universal, ...requirements.stage];
  const lines = [REQUIREMENTS_HEADING, ""];

  for (const rule of rules) {
    lines.push(`- [${rule.category}] ${rule.text}`);
  }

  return lines.join("\n");
}
