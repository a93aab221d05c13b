/**
 * Stage template parsing.
 *
 * A template is Markdown with `{{variable}}` placeholders (inner whitespace
 * allowed) and `{{#if …}}…{{/if}}` blocks. Every name is checked against the
 * prompt context when the template is parsed, so a typo fails at load time
 * and never reaches a model.
 */

import { isPromptVariable, type PromptVariable } from "./context.js";
import { parseConditionalBlocks, type ConditionalBlock } from "./conditional.js";

export const PLACEHOLDER = /\{\{\s*([a-zA-Z][\w.]*)\s*\}\}/g;

export interface ParsedTemplate {
  readonly name: string;
  readonly source: string;
  /** Variables printed by placeholders, sorted */
  readonly variables: readonly PromptVariable[];
  readonly conditionals: readonly ConditionalBlock[];
}

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: readonly string[]
  ) {
    super(
      `Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`
    );
    this.name = "TemplateParseError";
  }
}

/** Placeholder names in a string, deduplicated and sorted. */
export function extractVariables(source: string): string[] {
  const names = new Set<string>();
  for (const [, name] of source.matchAll(PLACEHOLDER)) {
    names.add(name);
  }
  return [...names].sort();
}

/**
 * @throws TemplateParseError    for an unknown placeholder
 * @throws ConditionalParseError for a malformed block
 */
export function parseTemplate(source: string, name = "(anonymous)"): ParsedTemplate {
  const conditionals = parseConditionalBlocks(source, name);

  const names = extractVariables(source);
  const unknown = names.filter((n) => !isPromptVariable(n));
  if (unknown.length > 0) {
    throw new TemplateParseError(name, unknown);
  }

  return Object.freeze({
    name,
    source,
    variables: Object.freeze(names.filter(isPromptVariable)),
    conditionals: Object.freeze(conditionals),
  });
}
