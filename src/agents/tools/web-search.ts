/**
 * Web search through the Serper API.
 */

import { tool } from "ai";
import { z } from "zod";

export const SERPER_SEARCH_URL = "https://google.serper.dev/search";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class WebSearchError extends Error {
  constructor(
    public readonly query: string,
    public readonly status: number | undefined,
    message: string
  ) {
    super(message);
    this.name = "WebSearchError";
  }
}

export interface SearchResult {
  position: number;
  title: string;
  link: string;
  snippet: string;
}

export interface WebSearchOptions {
  apiKey: string;
  /** Upper bound on results returned per query (the request's max_sources) */
  maxResults: number;
  endpoint?: string;
  fetch?: FetchLike;
}

const SerperResponseSchema = z.object({
  organic: z
    .array(
      z.object({
        title: z.string(),
        link: z.string(),
        snippet: z.string().optional(),
        position: z.number().optional(),
      })
    )
    .default([]),
});

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

/**
 * Run one search query and return at most `maxResults` organic results.
 *
 * @throws WebSearchError on transport failure, non-2xx status or an
 *         unrecognized response body
 */
export async function searchWeb(query: string, options: WebSearchOptions): Promise<SearchResult[]> {
  const { apiKey, maxResults, endpoint = SERPER_SEARCH_URL, fetch: fetchImpl = defaultFetch } = options;

  let response: Response;
  try {
    response = await fetchImpl(endpoint, {
      method: "POST",
      headers: { "X-API-KEY": apiKey, "Content-Type": "application/json" },
      body: JSON.stringify({ q: query, num: maxResults }),
    });
  } catch (err) {
    throw new WebSearchError(
      query,
      undefined,
      `Search request failed: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (!response.ok) {
    throw new WebSearchError(query, response.status, `Search API returned HTTP ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch {
    throw new WebSearchError(query, response.status, "Unrecognized search API response");
  }

  const parsed = SerperResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new WebSearchError(query, response.status, "Unrecognized search API response");
  }

  return parsed.data.organic.slice(0, maxResults).map((item, index) => ({
    position: item.position ?? index + 1,
    title: item.title,
    link: item.link,
    snippet: item.snippet ?? "",
  }));
}

export function createWebSearchTool(options: WebSearchOptions) {
  return tool({
    description:
      "Search the web and return the top organic results (title, link, snippet). " +
      "Use it to test how a keyword or phrase performs.",
    inputSchema: z.object({
      query: z.string().min(1).describe("Search query"),
    }),
    execute: async ({ query }) => ({ query, results: await searchWeb(query, options) }),
  });
}
