/**
 * Application configuration.
 *
 * Read once at startup and passed down explicitly; nothing below the entry
 * point looks at process.env.
 */

import {
  ConfigError,
  maybeEnv,
  optionalEnv,
  optionalEnvBool,
  type EnvSource,
} from "./env.js";

export { ConfigError, type EnvSource } from "./env.js";

// Re-export deployment configuration module
export * from "./deployment/index.js";

const ENVIRONMENTS: readonly string[] = ["development", "production", "test"];
const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "error"];

/** API credentials for the hosted collaborators. */
export interface Credentials {
  /** Chat-completion API key (OPENAI_API_KEY) */
  readonly openaiApiKey?: string;
  /** Web-search API key (SERPER_API_KEY) */
  readonly serperApiKey?: string;
}

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Forces debug-level logging regardless of logLevel */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name; the root scope of every log line */
  readonly appName: string;
  /** Directory that receives the per-stage artifacts */
  readonly outputDir: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Path of the agent deployment descriptors */
  readonly deploymentsPath: string;
  readonly credentials: Credentials;
}

/**
 * Load application configuration from an environment source.
 */
export function loadAppConfig(source: EnvSource = process.env): AppConfig {
  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development", source),
    debug: optionalEnvBool("DEBUG", false, source),
    logLevel: optionalEnv("LOG_LEVEL", "info", source),
    appName: optionalEnv("APP_NAME", "keyword-research-crew", source),
    outputDir: optionalEnv("OUTPUT_DIR", "output-files", source),
    logDir: optionalEnv("LOG_DIR", "output/logs", source),
    deploymentsPath: optionalEnv(
      "AGENT_DEPLOYMENTS_PATH",
      "configs/agent_deployments.json",
      source
    ),
    credentials: Object.freeze({
      openaiApiKey: maybeEnv("OPENAI_API_KEY", source),
      serperApiKey: maybeEnv("SERPER_API_KEY", source),
    }),
  });
}

/**
 * Validate the loaded configuration. Call at startup to fail fast.
 */
export function validateAppConfig(config: AppConfig): void {
  if (!ENVIRONMENTS.includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}

/**
 * Which credentials are present, for logging. Never carries the values.
 */
export function describeCredentials(credentials: Credentials): {
  openaiKeyLoaded: boolean;
  serperKeyLoaded: boolean;
} {
  return {
    openaiKeyLoaded: credentials.openaiApiKey !== undefined,
    serperKeyLoaded: credentials.serperApiKey !== undefined,
  };
}

/**
 * Return the chat-completion key or fail with a ConfigError naming the variable.
 */
export function requireOpenAiKey(credentials: Credentials): string {
  if (credentials.openaiApiKey === undefined) {
    throw new ConfigError("Missing required environment variable: OPENAI_API_KEY");
  }
  return credentials.openaiApiKey;
}
