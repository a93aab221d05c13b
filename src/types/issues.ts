/**
 * Field-level problems reported by schema validation, and the error that
 * carries a list of them.
 */

import type { ZodIssue } from "zod";

export interface ValidationIssue {
  /** Path to the offending field; empty for the value itself */
  path: (string | number)[];
  message: string;
  /** Zod issue code, e.g. "too_small" */
  code: string;
}

export function fromZodIssues(issues: readonly ZodIssue[]): ValidationIssue[] {
  return issues.map(({ path, message, code }) => ({ path: [...path], message, code }));
}

export class IssueListError extends Error {
  constructor(
    message: string,
    /** First line of format() */
    private readonly heading: string,
    public readonly issues: readonly ValidationIssue[] = []
  ) {
    super(message);
    this.name = "IssueListError";
  }

  /** The heading, then one indented line per issue. */
  format(): string {
    const body = this.issues.map(
      (issue) => `  - ${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
    );
    return [this.heading, ...body].join("\n");
  }
}
