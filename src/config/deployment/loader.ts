/**
 * Reads agent deployment descriptors from JSON, validates them and freezes
 * the result so every role can share one deployment by reference.
 */

import { existsSync, readFileSync } from "node:fs";
import { fromZodIssues, IssueListError, type ValidationIssue } from "../../types/issues.js";
import { AgentDeploymentListSchema, type AgentDeployment } from "./schema.js";

export class DeploymentConfigError extends IssueListError {
  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message, "Agent deployment validation failed:", issues);
    this.name = "DeploymentConfigError";
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Reflect.ownKeys(value)) {
    const nested: unknown = Reflect.get(value, key);
    if (typeof nested === "object" && nested !== null) deepFreeze(nested);
  }
  return Object.freeze(value);
}

/**
 * Validates a parsed descriptor list (a non-empty array).
 *
 * @returns the deployments in file order, deeply frozen
 * @throws DeploymentConfigError with one issue per invalid field
 */
export function parseAgentDeployments(input: unknown): readonly Readonly<AgentDeployment>[] {
  const result = AgentDeploymentListSchema.safeParse(input);
  if (!result.success) {
    const issues = fromZodIssues(result.error.issues);
    throw new DeploymentConfigError(
      `Invalid agent deployments: ${issues.length} validation error(s)`,
      issues
    );
  }
  return deepFreeze(result.data);
}

/**
 * Load deployment descriptors from a JSON file.
 *
 * @throws DeploymentConfigError if the file is missing, not JSON, or invalid
 */
export function loadAgentDeployments(filePath: string): readonly Readonly<AgentDeployment>[] {
  if (!existsSync(filePath)) {
    throw new DeploymentConfigError(`Deployment file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new DeploymentConfigError(
      `Failed to parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseAgentDeployments(raw);
}

/**
 * Pick a deployment by name, or the first one when no name is given.
 *
 * @throws DeploymentConfigError if the named deployment does not exist
 */
export function selectDeployment(
  deployments: readonly Readonly<AgentDeployment>[],
  name?: string
): Readonly<AgentDeployment> {
  if (name === undefined) {
    const first = deployments[0];
    if (first === undefined) {
      throw new DeploymentConfigError("No agent deployments configured");
    }
    return first;
  }

  const match = deployments.find((d) => d.name === name);
  if (!match) {
    const available = deployments.map((d) => d.name).join(", ");
    throw new DeploymentConfigError(
      `Unknown deployment "${name}" (available: ${available})`
    );
  }
  return match;
}
