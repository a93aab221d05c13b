/**
 * Per-run tool initialization.
 */

import type { ToolSet } from "ai";
import type { Credentials } from "../../config/index.js";
import type { ToolCapability } from "../../types/pipeline.js";
import { createFileReadTool, createFileWriteTool } from "./file-tools.js";
import { createWebSearchTool, type FetchLike } from "./web-search.js";

export interface Toolset {
  /** Capabilities that were initialized, in a stable order */
  readonly capabilities: readonly ToolCapability[];
  /** AI SDK tools keyed by capability name */
  readonly tools: Readonly<ToolSet>;
}

export interface ToolsetOptions {
  credentials: Credentials;
  /** Result cap for web searches */
  maxSources: number;
  /** Root for the file tools */
  baseDir: string;
  fetch?: FetchLike;
}

/**
 * Build the tools for one run. Web search is only available when the
 * search key is present; file tools always are. No network calls are made.
 */
export function createToolset(options: ToolsetOptions): Toolset {
  const { credentials, maxSources, baseDir } = options;
  const tools: ToolSet = {};
  const capabilities: ToolCapability[] = [];

  if (credentials.serperApiKey !== undefined) {
    tools.web_search = createWebSearchTool({
      apiKey: credentials.serperApiKey,
      maxResults: maxSources,
      fetch: options.fetch,
    });
    capabilities.push("web_search");
  }

  tools.file_read = createFileReadTool(baseDir);
  tools.file_write = createFileWriteTool(baseDir);
  capabilities.push("file_read", "file_write");

  return Object.freeze({
    capabilities: Object.freeze(capabilities),
    tools: Object.freeze(tools),
  });
}

/**
 * The subset of tools a role may use.
 */
export function selectTools(toolset: Toolset, allowed: readonly ToolCapability[]): ToolSet {
  const selected: ToolSet = {};
  for (const capability of allowed) {
    const candidate = toolset.tools[capability];
    if (candidate !== undefined) {
      selected[capability] = candidate;
    }
  }
  return selected;
}
