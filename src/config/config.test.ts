/**
 * Configuration tests.
 *
 * Run: node --import tsx src/config/config.test.ts
 *
 * Tests cover:
 *   1. Environment readers and AppConfig loading
 *   2. AppConfig validation and credential helpers
 *   3. Deployment descriptor validation, loading and selection
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";

import { ConfigError, maybeEnv, optionalEnv, optionalEnvBool } from "./env.js";
import {
  loadAppConfig,
  validateAppConfig,
  describeCredentials,
  requireOpenAiKey,
  parseAgentDeployments,
  loadAgentDeployments,
  selectDeployment,
  DeploymentConfigError,
  DEFAULT_AGENT_DEPLOYMENT,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function expectDeploymentError(fn: () => unknown): DeploymentConfigError {
  try {
    fn();
  } catch (err) {
    assert.ok(err instanceof DeploymentConfigError, `Expected DeploymentConfigError, got ${err}`);
    return err;
  }
  assert.fail("Expected DeploymentConfigError to be thrown");
}

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const REPO_DEPLOYMENTS = fileURLToPath(
  new URL("../../configs/agent_deployments.json", import.meta.url)
);

function makeDeployment(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: "test_deployment",
    module: "keyword-research-crew",
    agentConfig: {
      llmConfig: {
        configName: "test",
        client: "openai",
        model: "test-model",
        temperature: 0.2,
      },
      maxSteps: 2,
    },
    ...overrides,
  };
}

const tempDir = mkdtempSync(join(tmpdir(), "config-test-"));

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════

section("Environment readers");

test("optionalEnv returns the value when set", () => {
  assert.equal(optionalEnv("APP_NAME", "fallback", { APP_NAME: "crew" }), "crew");
});

test("optionalEnv treats an empty value as unset", () => {
  assert.equal(optionalEnv("APP_NAME", "fallback", { APP_NAME: "" }), "fallback");
});

test("maybeEnv returns undefined for missing and empty values", () => {
  assert.equal(maybeEnv("OPENAI_API_KEY", {}), undefined);
  assert.equal(maybeEnv("OPENAI_API_KEY", { OPENAI_API_KEY: "" }), undefined);
  assert.equal(maybeEnv("OPENAI_API_KEY", { OPENAI_API_KEY: "test-secret" }), "test-secret");
});

test("optionalEnvBool accepts yes/no and 1/0 in any case", () => {
  assert.equal(optionalEnvBool("DEBUG", false, { DEBUG: "YES" }), true);
  assert.equal(optionalEnvBool("DEBUG", true, { DEBUG: "0" }), false);
  assert.equal(optionalEnvBool("DEBUG", true, {}), true);
});

test("optionalEnvBool rejects other strings", () => {
  assert.throws(
    () => optionalEnvBool("DEBUG", false, { DEBUG: "maybe" }),
    (err: unknown) =>
      err instanceof ConfigError &&
      err.message === 'DEBUG must be one of true/1/yes/false/0/no, got "maybe"'
  );
});

section("AppConfig");

test("defaults apply for an empty environment", () => {
  const config = loadAppConfig({});
  assert.equal(config.env, "development");
  assert.equal(config.debug, false);
  assert.equal(config.logLevel, "info");
  assert.equal(config.appName, "keyword-research-crew");
  assert.equal(config.outputDir, "output-files");
  assert.equal(config.logDir, "output/logs");
  assert.equal(config.deploymentsPath, "configs/agent_deployments.json");
  assert.deepEqual(config.credentials, { openaiApiKey: undefined, serperApiKey: undefined });
});

test("credentials are read from the given source", () => {
  const config = loadAppConfig({ OPENAI_API_KEY: "test-secret", SERPER_API_KEY: "" });
  assert.equal(config.credentials.openaiApiKey, "test-secret");
  assert.equal(config.credentials.serperApiKey, undefined);
});

test("loaded config is frozen", () => {
  const config = loadAppConfig({});
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.credentials));
});

test("validateAppConfig accepts the defaults", () => {
  validateAppConfig(loadAppConfig({}));
});

test("validateAppConfig rejects an unknown NODE_ENV", () => {
  assert.throws(
    () => validateAppConfig(loadAppConfig({ NODE_ENV: "staging" })),
    (err: unknown) => err instanceof ConfigError && err.message.startsWith("Invalid NODE_ENV: staging")
  );
});

test("validateAppConfig rejects an unknown LOG_LEVEL", () => {
  assert.throws(
    () => validateAppConfig(loadAppConfig({ LOG_LEVEL: "verbose" })),
    (err: unknown) => err instanceof ConfigError && err.message.startsWith("Invalid LOG_LEVEL: verbose")
  );
});

test("describeCredentials reports presence only", () => {
  const described = describeCredentials({ openaiApiKey: "test-secret" });
  assert.deepEqual(described, { openaiKeyLoaded: true, serperKeyLoaded: false });
  assert.ok(!JSON.stringify(described).includes("test-secret"));
});

test("requireOpenAiKey names the missing variable", () => {
  assert.equal(requireOpenAiKey({ openaiApiKey: "test-secret" }), "test-secret");
  assert.throws(
    () => requireOpenAiKey({}),
    (err: unknown) =>
      err instanceof ConfigError &&
      err.message === "Missing required environment variable: OPENAI_API_KEY"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// DEPLOYMENTS
// ═══════════════════════════════════════════════════════════════════════════

section("Deployment validation");

test("valid descriptor list parses", () => {
  const [deployment] = parseAgentDeployments([makeDeployment()]);
  assert.equal(deployment.name, "test_deployment");
  assert.equal(deployment.agentConfig.llmConfig.model, "test-model");
  assert.equal(deployment.agentConfig.maxSteps, 2);
});

test("maxSteps defaults to 5", () => {
  const [deployment] = parseAgentDeployments([
    makeDeployment({
      agentConfig: {
        llmConfig: { configName: "test", client: "openai", model: "test-model", temperature: 0 },
      },
    }),
  ]);
  assert.equal(deployment.agentConfig.maxSteps, 5);
});

test("parsed deployments are deeply frozen", () => {
  const [deployment] = parseAgentDeployments([makeDeployment()]);
  assert.ok(Object.isFrozen(deployment));
  assert.ok(Object.isFrozen(deployment.agentConfig));
  assert.ok(Object.isFrozen(deployment.agentConfig.llmConfig));
});

test("temperature outside 0..2 is rejected with its path", () => {
  const err = expectDeploymentError(() =>
    parseAgentDeployments([
      makeDeployment({
        agentConfig: {
          llmConfig: { configName: "test", client: "openai", model: "test-model", temperature: 3 },
        },
      }),
    ])
  );
  assert.equal(err.issues.length, 1);
  assert.equal(err.issues[0].path.join("."), "0.agentConfig.llmConfig.temperature");
  assert.ok(err.format().startsWith("Agent deployment validation failed:\n  - 0.agentConfig.llmConfig.temperature: "));
});

test("unsupported client is rejected", () => {
  const err = expectDeploymentError(() =>
    parseAgentDeployments([
      makeDeployment({
        agentConfig: {
          llmConfig: { configName: "test", client: "other", model: "test-model", temperature: 1 },
        },
      }),
    ])
  );
  assert.equal(err.issues[0].path.join("."), "0.agentConfig.llmConfig.client");
});

test("unknown keys are rejected", () => {
  const err = expectDeploymentError(() =>
    parseAgentDeployments([makeDeployment({ extra: true })])
  );
  assert.equal(err.issues[0].code, "unrecognized_keys");
});

test("an empty list is rejected", () => {
  const err = expectDeploymentError(() => parseAgentDeployments([]));
  assert.equal(err.issues[0].code, "too_small");
});

section("Deployment loading");

test("bundled descriptor file loads in file order", () => {
  const deployments = loadAgentDeployments(REPO_DEPLOYMENTS);
  assert.deepEqual(
    deployments.map((d) => d.name),
    ["keyword_research_deployment", "keyword_research_mini"]
  );
  assert.equal(deployments[0].agentConfig.llmConfig.maxTokens, 2000);
});

test("missing file fails with its path", () => {
  const path = join(tempDir, "missing.json");
  const err = expectDeploymentError(() => loadAgentDeployments(path));
  assert.equal(err.message, `Deployment file not found: ${path}`);
  assert.equal(err.issues.length, 0);
});

test("invalid JSON fails before validation", () => {
  const path = join(tempDir, "broken.json");
  writeFileSync(path, "[{ not json", "utf-8");
  const err = expectDeploymentError(() => loadAgentDeployments(path));
  assert.ok(err.message.startsWith(`Failed to parse ${path}: `));
});

section("Deployment selection");

test("no name selects the first deployment", () => {
  const deployments = loadAgentDeployments(REPO_DEPLOYMENTS);
  assert.equal(selectDeployment(deployments).name, "keyword_research_deployment");
});

test("a name selects that deployment", () => {
  const deployments = loadAgentDeployments(REPO_DEPLOYMENTS);
  const selected = selectDeployment(deployments, "keyword_research_mini");
  assert.equal(selected.agentConfig.llmConfig.model, "gpt-4o-mini");
  assert.equal(selected.agentConfig.maxSteps, 3);
});

test("an unknown name lists the available deployments", () => {
  const deployments = loadAgentDeployments(REPO_DEPLOYMENTS);
  const err = expectDeploymentError(() => selectDeployment(deployments, "nope"));
  assert.equal(
    err.message,
    'Unknown deployment "nope" (available: keyword_research_deployment, keyword_research_mini)'
  );
});

test("built-in default is gpt-4o at temperature 0.7", () => {
  const [parsed] = parseAgentDeployments([DEFAULT_AGENT_DEPLOYMENT]);
  assert.equal(parsed.agentConfig.llmConfig.model, "gpt-4o");
  assert.equal(parsed.agentConfig.llmConfig.temperature, 0.7);
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(tempDir, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
