/**
 * `{{#if …}}` blocks in stage templates.
 *
 *   {{#if topic.objective}}…{{/if}}          kept when the value is non-empty
 *   {{#if topic.depth == "brief"}}…{{/if}}   kept on an exact match
 *   {{#if topic.depth != "brief"}}…{{/if}}   kept on anything else
 *
 * Blocks do not nest and have no else branch. A comparison against an
 * enumerated variable must name one of its values.
 */

import { ResearchDepth } from "../research/schema.js";
import {
  isPromptVariable,
  isUnset,
  type PromptContext,
  type PromptVariable,
} from "./context.js";

export type Condition =
  | { readonly kind: "present"; readonly variable: PromptVariable }
  | {
      readonly kind: "equals" | "differs";
      readonly variable: PromptVariable;
      readonly value: string;
    };

export interface ConditionalBlock {
  readonly condition: Condition;
  readonly body: string;
  /** Offset of the opening tag */
  readonly start: number;
  /** Offset just past the closing tag */
  readonly end: number;
}

export class ConditionalParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly issues: readonly string[]
  ) {
    super(`Template "${templateName}" has invalid conditional(s):\n  - ${issues.join("\n  - ")}`);
    this.name = "ConditionalParseError";
  }
}

const ENUMERATED: Partial<Record<PromptVariable, readonly string[]>> = {
  "topic.depth": ResearchDepth.options,
  "request.includeCitations": ["false", "true"],
};

/** The values an enumerated variable can take. */
export function getEnumValues(variable: PromptVariable): readonly string[] | undefined {
  return ENUMERATED[variable];
}

const OPEN_TAG = /\{\{#if\s+([^}]*?)\s*\}\}/g;
const CLOSE_TAG = "{{/if}}";
const EXPRESSION = /^([a-zA-Z][\w.]*)(?:\s*(==|!=)\s*"([^"]*)")?$/;

function parseCondition(expression: string, issues: string[]): Condition | undefined {
  const match = EXPRESSION.exec(expression);
  if (!match) {
    issues.push(`Cannot parse condition "${expression}"`);
    return undefined;
  }

  const [, variable, operator, value] = match;
  if (!isPromptVariable(variable)) {
    issues.push(`Unknown variable "${variable}" in conditional`);
    return undefined;
  }
  if (operator === undefined) {
    return { kind: "present", variable };
  }

  const allowed = ENUMERATED[variable];
  if (allowed && !allowed.includes(value)) {
    issues.push(
      `Invalid value "${value}" for "${variable}" (allowed: ${[...allowed].sort().join(", ")})`
    );
    return undefined;
  }
  return { kind: operator === "==" ? "equals" : "differs", variable, value };
}

/**
 * Find every block in a template, in source order.
 *
 * @throws ConditionalParseError listing every problem found
 */
export function parseConditionalBlocks(
  source: string,
  templateName = "(anonymous)"
): ConditionalBlock[] {
  const blocks: ConditionalBlock[] = [];
  const issues: string[] = [];
  let openings = 0;
  let cursor = 0;

  for (const open of source.matchAll(OPEN_TAG)) {
    openings++;
    const start = open.index ?? 0;
    const expression = open[1];

    if (start < cursor) {
      issues.push(`Nested conditionals are not supported: {{#if ${expression}}}`);
      continue;
    }

    const bodyStart = start + open[0].length;
    const close = source.indexOf(CLOSE_TAG, bodyStart);
    if (close === -1) {
      issues.push(`Unclosed {{#if ${expression}}}`);
      break;
    }

    cursor = close + CLOSE_TAG.length;
    const condition = parseCondition(expression, issues);
    if (condition) {
      blocks.push({ condition, body: source.slice(bodyStart, close), start, end: cursor });
    }
  }

  const closings = source.split(CLOSE_TAG).length - 1;
  if (issues.length === 0 && closings !== openings) {
    issues.push(`Mismatched conditional tags: ${openings} {{#if}}, ${closings} {{/if}}`);
  }

  if (issues.length > 0) {
    throw new ConditionalParseError(templateName, issues);
  }
  return blocks;
}

/**
 * UNSET values fail "present" and "equals" and pass "differs".
 */
export function evaluateCondition(condition: Condition, context: PromptContext): boolean {
  const value = context[condition.variable];
  if (isUnset(value)) {
    return condition.kind === "differs";
  }

  switch (condition.kind) {
    case "present":
      return value !== "";
    case "equals":
      return value === condition.value;
    case "differs":
      return value !== condition.value;
  }
}

/**
 * Replace each block with its body or with nothing.
 */
export function resolveConditionals(
  source: string,
  blocks: readonly ConditionalBlock[],
  context: PromptContext
): string {
  let resolved = "";
  let cursor = 0;

  for (const block of blocks) {
    resolved += source.slice(cursor, block.start);
    if (evaluateCondition(block.condition, context)) {
      resolved += block.body;
    }
    cursor = block.end;
  }

  return resolved + source.slice(cursor);
}
