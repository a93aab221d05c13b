/**
 * Request validation.
 */

import { fromZodIssues, IssueListError, type ValidationIssue } from "../types/issues.js";
import { InputSchema, type RequestConfig } from "./schema.js";

/** The request does not describe a valid run. Nothing has executed. */
export class ValidationError extends IssueListError {
  constructor(issues: readonly ValidationIssue[]) {
    const summary = issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    super(`Invalid research request: ${summary}`, "Research request validation failed:", issues);
    this.name = "ValidationError";
  }
}

/**
 * Coerces an arbitrary record into a frozen RequestConfig.
 *
 * @throws ValidationError listing every invalid field
 */
export function validateRequest(input: unknown): Readonly<RequestConfig> {
  const result = InputSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(fromZodIssues(result.error.issues));
  }

  const { research_topic, ...rest } = result.data;
  return Object.freeze({ ...rest, research_topic: Object.freeze(research_topic) });
}
