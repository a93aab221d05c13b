/**
 * Stage runner prompt composition and tool tests.
 *
 * Run: node --import tsx src/agents/agents.test.ts
 *
 * No network: web search runs against a fake fetch, file tools against a
 * temp directory.
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { composeStagePrompt, composeSystemPrompt } from "./stage-runner.js";
import { createToolset, selectTools } from "./tools/toolset.js";
import {
  searchWeb,
  WebSearchError,
  SERPER_SEARCH_URL,
  type FetchLike,
} from "./tools/web-search.js";
import { FileToolError, readTextFile, resolveWithin, writeTextFile } from "./tools/file-tools.js";
import { buildRoles } from "../pipeline/roles.js";
import type { Stage } from "../types/pipeline.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
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

interface FetchCall {
  url: string;
  init: RequestInit;
}

function fakeFetch(status: number, body: unknown, calls: FetchCall[] = []): FetchLike {
  return async (url, init) => {
    calls.push({ url, init });
    return new Response(JSON.stringify(body), {
      status,
      headers: { "Content-Type": "application/json" },
    });
  };
}

async function expectSearchError(promise: Promise<unknown>): Promise<WebSearchError> {
  try {
    await promise;
  } catch (err) {
    assert.ok(err instanceof WebSearchError, `Expected WebSearchError, got ${err}`);
    return err;
  }
  assert.fail("Expected WebSearchError to be thrown");
}

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const roles = buildRoles(
  { configName: "test", client: "openai", model: "test-model", temperature: 0 },
  ["web_search"]
);

const STAGE: Stage = {
  id: "search_analysis",
  description: "Evaluate the keywords.",
  template: "search-analysis.md",
  expectedOutput: "An evaluation of each keyword.",
  role: roles.search_analyst,
  dependsOn: ["keyword_analysis"],
  artifactPath: "output-files/search_analysis_20240115_090507.md",
};

const ORGANIC = [
  { title: "Tide pool guide", link: "https://example.com/guide", snippet: "Species list", position: 1 },
  { title: "Rock pools", link: "https://example.com/rock" },
  { title: "Third", link: "https://example.com/third", snippet: "x", position: 3 },
];

const tempDir = mkdtempSync(join(tmpdir(), "agents-test-"));

// ═══════════════════════════════════════════════════════════════════════════
// PROMPT COMPOSITION
// ═══════════════════════════════════════════════════════════════════════════

section("Prompt composition");

await test("system prompt states title, goal and backstory", () => {
  assert.equal(
    composeSystemPrompt(roles.search_analyst),
    "You are the Search Results Analyst.\n\n" +
      "Your goal: Evaluate and refine search queries based on initial results\n\n" +
      "Analytical expert specializing in evaluating search results and identifying " +
      "patterns in successful queries."
  );
});

await test("stage prompt without context has no context section", () => {
  assert.equal(
    composeStagePrompt(STAGE, ""),
    "Evaluate the keywords.\n\n# Expected output\n\nAn evaluation of each keyword."
  );
});

await test("stage prompt places upstream context before the deliverable", () => {
  assert.equal(
    composeStagePrompt(STAGE, "## Output of keyword_analysis\n\ntide pool animals"),
    "Evaluate the keywords.\n\n" +
      "# Context from previous stages\n\n## Output of keyword_analysis\n\ntide pool animals\n\n" +
      "# Expected output\n\nAn evaluation of each keyword."
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// WEB SEARCH
// ═══════════════════════════════════════════════════════════════════════════

section("Web search");

await test("posts the query with the API key and result cap", async () => {
  const calls: FetchCall[] = [];
  await searchWeb("tide pool animals", {
    apiKey: "test-secret",
    maxResults: 2,
    fetch: fakeFetch(200, { organic: ORGANIC }, calls),
  });

  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, SERPER_SEARCH_URL);
  assert.equal(calls[0].init.method, "POST");
  assert.deepEqual(calls[0].init.headers, {
    "X-API-KEY": "test-secret",
    "Content-Type": "application/json",
  });
  assert.deepEqual(JSON.parse(String(calls[0].init.body)), { q: "tide pool animals", num: 2 });
});

await test("returns at most maxResults normalized results", async () => {
  const results = await searchWeb("tide pool animals", {
    apiKey: "test-secret",
    maxResults: 2,
    fetch: fakeFetch(200, { organic: ORGANIC }),
  });
  assert.deepEqual(results, [
    { position: 1, title: "Tide pool guide", link: "https://example.com/guide", snippet: "Species list" },
    { position: 2, title: "Rock pools", link: "https://example.com/rock", snippet: "" },
  ]);
});

await test("a response without organic results is empty", async () => {
  const results = await searchWeb("q", { apiKey: "test-secret", maxResults: 5, fetch: fakeFetch(200, {}) });
  assert.deepEqual(results, []);
});

await test("non-2xx status is a WebSearchError", async () => {
  const err = await expectSearchError(
    searchWeb("q", { apiKey: "test-secret", maxResults: 5, fetch: fakeFetch(401, { message: "no" }) })
  );
  assert.equal(err.status, 401);
  assert.equal(err.query, "q");
  assert.equal(err.message, "Search API returned HTTP 401");
});

await test("transport failure is a WebSearchError without status", async () => {
  const offline: FetchLike = async () => {
    throw new Error("offline");
  };
  const err = await expectSearchError(
    searchWeb("q", { apiKey: "test-secret", maxResults: 5, fetch: offline })
  );
  assert.equal(err.status, undefined);
  assert.equal(err.message, "Search request failed: offline");
});

await test("an unrecognized body is a WebSearchError", async () => {
  const err = await expectSearchError(
    searchWeb("q", { apiKey: "test-secret", maxResults: 5, fetch: fakeFetch(200, { organic: "none" }) })
  );
  assert.equal(err.message, "Unrecognized search API response");
});

await test("a body that is not JSON is a WebSearchError", async () => {
  const htmlFetch: FetchLike = async () => new Response("<html>gateway error</html>", { status: 200 });
  const err = await expectSearchError(
    searchWeb("q", { apiKey: "test-secret", maxResults: 5, fetch: htmlFetch })
  );
  assert.equal(err.message, "Unrecognized search API response");
  assert.equal(err.status, 200);
});

// ═══════════════════════════════════════════════════════════════════════════
// FILE TOOLS
// ═══════════════════════════════════════════════════════════════════════════

section("File tools");

await test("resolveWithin accepts nested relative paths", () => {
  assert.equal(resolveWithin(tempDir, "a/b.md"), join(tempDir, "a", "b.md"));
});

await test("resolveWithin rejects escapes, absolute paths and the root itself", () => {
  for (const path of ["../outside.md", "a/../../outside.md", "/etc/hosts", "", "."]) {
    assert.throws(
      () => resolveWithin(tempDir, path),
      (err: unknown) => err instanceof FileToolError && err.filePath === path,
      `path ${JSON.stringify(path)}`
    );
  }
});

await test("writeTextFile creates directories and returns the absolute path", async () => {
  const written = await writeTextFile(tempDir, "deep/dir/note.md", "hello");
  assert.equal(written, join(tempDir, "deep", "dir", "note.md"));
  assert.equal(readFileSync(written, "utf-8"), "hello");
  assert.equal(await readTextFile(tempDir, "deep/dir/note.md"), "hello");
});

await test("readTextFile wraps a missing file in FileToolError", async () => {
  await assert.rejects(
    readTextFile(tempDir, "missing.md"),
    (err: unknown) => err instanceof FileToolError && err.message.startsWith("Cannot read missing.md: ")
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// TOOLSET
// ═══════════════════════════════════════════════════════════════════════════

section("Toolset");

await test("web search is only available with a search key", () => {
  const without = createToolset({ credentials: {}, maxSources: 5, baseDir: tempDir });
  assert.deepEqual(without.capabilities, ["file_read", "file_write"]);
  assert.deepEqual(Object.keys(without.tools), ["file_read", "file_write"]);

  const withKey = createToolset({
    credentials: { serperApiKey: "test-secret" },
    maxSources: 5,
    baseDir: tempDir,
  });
  assert.deepEqual(withKey.capabilities, ["web_search", "file_read", "file_write"]);
});

await test("selectTools returns only the allowed, available tools", () => {
  const toolset = createToolset({
    credentials: { serperApiKey: "test-secret" },
    maxSources: 5,
    baseDir: tempDir,
  });
  assert.deepEqual(Object.keys(selectTools(toolset, ["web_search"])), ["web_search"]);

  const noSearch = createToolset({ credentials: {}, maxSources: 5, baseDir: tempDir });
  assert.deepEqual(Object.keys(selectTools(noSearch, ["web_search", "file_read"])), ["file_read"]);
});

await test("the toolset is frozen", () => {
  const toolset = createToolset({ credentials: {}, maxSources: 5, baseDir: tempDir });
  assert.ok(Object.isFrozen(toolset));
  assert.ok(Object.isFrozen(toolset.tools));
  assert.ok(Object.isFrozen(toolset.capabilities));
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
