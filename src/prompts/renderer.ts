/**
 * Renders a parsed template into a stage description.
 *
 * Blocks are resolved first, so a placeholder inside a dropped block needs
 * no value. Blank-line runs left by dropped blocks collapse to one empty
 * line. Output requirements, when given, are appended after the template
 * text, where the template cannot reword them.
 */

import { isPromptVariable, isUnset, type PromptContext } from "./context.js";
import { resolveConditionals } from "./conditional.js";
import { extractVariables, PLACEHOLDER, type ParsedTemplate } from "./template.js";
import { formatOutputRequirements, type OutputRequirements } from "./constraints.js";

export class PromptRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: readonly string[]
  ) {
    super(
      `Cannot render template "${templateName}": no value for ${missingVariables.join(", ")}`
    );
    this.name = "PromptRenderError";
  }
}

export interface RenderOptions {
  requirements?: OutputRequirements;
}

/**
 * @throws PromptRenderError if a placeholder that survives the blocks is UNSET
 */
export function renderPrompt(
  template: ParsedTemplate,
  context: PromptContext,
  options: RenderOptions = {}
): string {
  const resolved = resolveConditionals(template.source, template.conditionals, context);

  const missing = extractVariables(resolved).filter(
    (name) => !isPromptVariable(name) || isUnset(context[name])
  );
  if (missing.length > 0) {
    throw new PromptRenderError(template.name, missing);
  }

  const text = resolved
    .replace(PLACEHOLDER, (_placeholder, name: string) =>
      isPromptVariable(name) ? context[name] : ""
    )
    .replace(/\n{3,}/g, "\n\n")
    .trim();

  if (options.requirements === undefined) {
    return text;
  }
  return `${text}\n\n${formatOutputRequirements(options.requirements)}`;
}
