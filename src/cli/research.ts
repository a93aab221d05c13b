#!/usr/bin/env node
/**
 * CLI for running the keyword research pipeline.
 *
 * Usage:
 *   npm run research -- --topic "home espresso grinders" --objective "Find buying guides"
 *   npm run research -- --input request.json --deployment keyword_research_mini
 *   npm run preview -- --topic "home espresso grinders" --depth brief
 *
 * Options:
 *   --topic <text>          Topic to research (required unless in --input)
 *   --context <text>        Additional context
 *   --depth <level>         brief | moderate | comprehensive (default: comprehensive)
 *   --objective <text>      Research objective
 *   --focus <text>          Specific focus
 *   --max-sources <n>       Maximum sources to consult (default: 5)
 *   --no-citations          Ask for output without citations
 *   --input <path>          JSON request file; flags above override its fields
 *   --deployments <path>    Deployment descriptors (default: AGENT_DEPLOYMENTS_PATH)
 *   --deployment <name>     Deployment to use (default: first in the file)
 *   --dry-run               Print the rendered stage descriptions; no model calls
 *   --json                  Print machine-readable JSON only
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Invalid request, configuration error, or failed stage
 */

import { existsSync, readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import {
  loadAppConfig,
  validateAppConfig,
  describeCredentials,
  loadAgentDeployments,
  selectDeployment,
  ConfigError,
  DeploymentConfigError,
  DEFAULT_AGENT_DEPLOYMENT,
  type AgentDeployment,
  type AppConfig,
} from "../config/index.js";
import {
  createLogger,
  initRunId,
  isLogLevel,
  type Logger,
  type LoggerOptions,
} from "../logging/index.js";
import { validateRequest, ValidationError } from "../research/index.js";
import { run, ResearcherAgent } from "../orchestrator/index.js";
import { PipelineDefinitionError, StageExecutionError } from "../pipeline/index.js";

// ============================================================
// CLI Parsing
// ============================================================

const CLI_OPTIONS = {
  topic: { type: "string" },
  context: { type: "string" },
  depth: { type: "string" },
  objective: { type: "string" },
  focus: { type: "string" },
  "max-sources": { type: "string" },
  "no-citations": { type: "boolean", default: false },
  input: { type: "string" },
  deployments: { type: "string" },
  deployment: { type: "string" },
  "dry-run": { type: "boolean", default: false },
  json: { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

export interface CliValues {
  topic?: string;
  context?: string;
  depth?: string;
  objective?: string;
  focus?: string;
  "max-sources"?: string;
  "no-citations"?: boolean;
  input?: string;
  deployments?: string;
  deployment?: string;
  "dry-run"?: boolean;
  json?: boolean;
  help?: boolean;
}

export function parseCliArgs(args: string[]): CliValues {
  const { values } = parseArgs({ args, options: CLI_OPTIONS, strict: true });
  return values;
}

const HELP_TEXT = `
Usage: research [options]

Options:
  --topic <text>          Topic to research (required unless in --input)
  --context <text>        Additional context
  --depth <level>         brief | moderate | comprehensive (default: comprehensive)
  --objective <text>      Research objective
  --focus <text>          Specific focus
  --max-sources <n>       Maximum sources to consult (default: 5)
  --no-citations          Ask for output without citations
  --input <path>          JSON request file; flags override its fields
  --deployments <path>    Deployment descriptors file
  --deployment <name>     Deployment to use (default: first in the file)
  --dry-run               Print the rendered stage descriptions; no model calls
  --json                  Print machine-readable JSON only
  -h, --help              Show this help message
`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge CLI flags over an optional base record (from --input) into a raw
 * request record. Validation happens later, in one place.
 */
export function buildRequestRecord(values: CliValues, base: unknown = {}): Record<string, unknown> {
  const baseRecord = isRecord(base) ? base : {};
  const topic: Record<string, unknown> = isRecord(baseRecord.research_topic)
    ? { ...baseRecord.research_topic }
    : {};

  const topicFlags: Array<[keyof CliValues, string]> = [
    ["topic", "topic"],
    ["context", "context"],
    ["depth", "depth"],
    ["objective", "research_objective"],
    ["focus", "specific_focus"],
  ];
  for (const [flag, field] of topicFlags) {
    const value = values[flag];
    if (value !== undefined) {
      topic[field] = value;
    }
  }

  const record: Record<string, unknown> = { ...baseRecord, research_topic: topic };
  if (values["max-sources"] !== undefined) {
    record.max_sources = values["max-sources"];
  }
  if (values["no-citations"]) {
    record.include_citations = false;
  }
  return record;
}

function readInputFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigError(`Input file not found: ${path}`);
  }
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(
      `Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * DEBUG forces the debug level. APP_NAME becomes the root scope, so every
 * line names the application it came from.
 */
export function loggerOptionsFor(config: AppConfig, json: boolean): LoggerOptions {
  const level = config.debug ? "debug" : isLogLevel(config.logLevel) ? config.logLevel : "info";
  return {
    level,
    logDir: config.logDir,
    console: !json,
    scope: config.appName,
  };
}

function resolveDeployment(
  values: CliValues,
  config: AppConfig,
  logger: Logger
): Readonly<AgentDeployment> {
  const path = values.deployments ?? config.deploymentsPath;
  if (!existsSync(path)) {
    if (values.deployments !== undefined || values.deployment !== undefined) {
      throw new DeploymentConfigError(`Deployment file not found: ${path}`);
    }
    logger.warn("No deployment file, using built-in default", { path });
    return DEFAULT_AGENT_DEPLOYMENT;
  }
  return selectDeployment(loadAgentDeployments(path), values.deployment);
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const values = parseCliArgs(process.argv.slice(2));
  if (values.help) {
    console.log(HELP_TEXT);
    return;
  }

  initRunId();
  const config = loadAppConfig();
  validateAppConfig(config);

  const logger = createLogger(loggerOptionsFor(config, values.json ?? false));
  logger.info("Credentials loaded", describeCredentials(config.credentials));

  const deployment = resolveDeployment(values, config, logger);
  const base = values.input !== undefined ? readInputFile(values.input) : {};
  const record = buildRequestRecord(values, base);

  if (values["dry-run"]) {
    const researcher = new ResearcherAgent({
      deployment,
      credentials: config.credentials,
      logger,
      outputDir: config.outputDir,
    });
    const { stages } = researcher.prepare(validateRequest(record));

    if (values.json) {
      console.log(JSON.stringify(
        stages.map((s) => ({
          id: s.id,
          role: s.role.id,
          dependsOn: s.dependsOn,
          artifactPath: s.artifactPath,
          description: s.description,
        })),
        null,
        2
      ));
    } else {
      for (const stage of stages) {
        console.log(`\n=== ${stage.id} (${stage.role.title}) → ${stage.artifactPath}\n`);
        console.log(stage.description);
      }
    }
    return;
  }

  const output = await run(
    { inputs: record, deployment },
    { credentials: config.credentials, logger, outputDir: config.outputDir }
  );
  console.log(JSON.stringify(output, null, 2));
}

function describeError(err: unknown): string {
  if (err instanceof ValidationError || err instanceof DeploymentConfigError) {
    return err.issues.length > 0 ? err.format() : err.message;
  }
  if (
    err instanceof ConfigError ||
    err instanceof PipelineDefinitionError ||
    err instanceof StageExecutionError
  ) {
    return err.message;
  }
  return err instanceof Error ? err.stack ?? err.message : String(err);
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("research.ts") || process.argv[1].endsWith("research.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    console.error(`Error: ${describeError(err)}`);
    process.exit(1);
  });
}
