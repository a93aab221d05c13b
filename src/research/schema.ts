/**
 * Research request and result schemas.
 *
 * The request arrives as an arbitrary record (JSON from a file, CLI flags,
 * a caller's object) and is coerced here into a RequestConfig. Unknown
 * fields are stripped, `null` on an optional field means "absent", and
 * blank optional text is treated as absent so templates never see it.
 */

import { z } from "zod";

export const ResearchDepth = z.enum(["brief", "moderate", "comprehensive"]);
export type ResearchDepth = z.infer<typeof ResearchDepth>;

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);

function nullToUndefined(value: unknown): unknown {
  return value === null ? undefined : value;
}

function blankToUndefined(value: unknown): unknown {
  if (value === null) return undefined;
  if (typeof value === "string" && value.trim() === "") return undefined;
  return value;
}

/**
 * Accepts booleans, 1/0 and the strings true/false/1/0/yes/no
 * (case-insensitive). Anything else is passed through for z.boolean()
 * to reject.
 */
function coerceBoolean(value: unknown): unknown {
  if (value === null) return undefined;
  if (value === 1) return true;
  if (value === 0) return false;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
  }
  return value;
}

/** Digit-only strings become numbers; the integer checks still apply. */
function coerceInteger(value: unknown): unknown {
  if (value === null) return undefined;
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) return Number(value);
  return value;
}

const OptionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

export const ResearchTopicSchema = z.object({
  /** The main topic to research */
  topic: z
    .string({ required_error: "topic is required" })
    .trim()
    .min(1, "topic must not be empty"),

  /** Additional context or aspects to focus on */
  context: OptionalText,

  /** Desired depth of research */
  depth: z.preprocess(nullToUndefined, ResearchDepth.default("comprehensive")),

  /** The main objective of the research */
  research_objective: OptionalText,

  /** Specific focus areas or constraints */
  specific_focus: OptionalText,
});

export type ResearchTopic = z.infer<typeof ResearchTopicSchema>;

/**
 * Full request for one run.
 */
export const InputSchema = z.object({
  research_topic: ResearchTopicSchema,

  /** Maximum number of sources to consult */
  max_sources: z.preprocess(
    coerceInteger,
    z
      .number({ invalid_type_error: "max_sources must be a positive integer" })
      .int("max_sources must be a positive integer")
      .positive("max_sources must be a positive integer")
      .default(5)
  ),

  /** Whether to include citations in the research */
  include_citations: z.preprocess(
    coerceBoolean,
    z
      .boolean({ invalid_type_error: "include_citations must be a boolean" })
      .default(true)
  ),
});

export type RequestConfig = z.infer<typeof InputSchema>;

/** A result field: the shaped output of one stage. */
export type StageMapping = Record<string, unknown>;

/**
 * The only artifact returned to the caller. All three fields are always
 * present; a field whose stage output could not be shaped is `{}`.
 */
export interface ResearchOutput {
  /** Initial keyword analysis and search phrases */
  readonly keyword_analysis: StageMapping;
  /** Evaluation of search results and refinements */
  readonly search_analysis: StageMapping;
  /** Synthesized findings and search strategy */
  readonly final_recommendations: StageMapping;
}
