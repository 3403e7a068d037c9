import { z } from "zod";
import type { Executor } from "../types/executors.js";

/**
 * Tavily web search.
 * Env (read by loadConfig):
 *  - TAVILY_API_KEY (required)
 *  - TAVILY_BASE_URL (optional, default: https://api.tavily.com/search)
 */
export interface WebSearchOptions {
  apiKey?: string;
  baseUrl?: string;
  maxResults?: number;
}

export interface SearchItem {
  url: string;
  title?: string;
  snippet?: string;
}

const responseSchema = z.object({
  results: z.array(z.object({
    url: z.string().optional(),
    title: z.string().nullish(),
    content: z.string().nullish()
  })).default([])
});

export const DEFAULT_TAVILY_URL = "https://api.tavily.com/search";

export async function webSearch(query: string, opts: WebSearchOptions & { apiKey: string }, signal?: AbortSignal): Promise<SearchItem[]> {
  const res = await fetch(opts.baseUrl || DEFAULT_TAVILY_URL, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ api_key: opts.apiKey, query, max_results: opts.maxResults ?? 5 }),
    signal
  });
  if (!res.ok) throw new Error(`search HTTP ${res.status}`);
  const data = responseSchema.parse(await res.json());
  const items: SearchItem[] = [];
  for (const r of data.results) {
    if (!r.url) continue;
    items.push({ url: r.url, title: r.title ?? undefined, snippet: r.content ?? undefined });
  }
  return items;
}

export function formatResults(items: SearchItem[]): string {
  return items
    .map((r, i) => `${i + 1}. ${r.title ?? r.url} — ${r.url}${r.snippet ? `\n   ${r.snippet}` : ""}`)
    .join("\n");
}

export function webExecutor(opts: WebSearchOptions): Executor {
  return {
    name: "web",
    async execute(task, _context, signal) {
      const query = task.trim();
      if (!query) return { ok: false, error: "missing query" };
      if (!opts.apiKey) return { ok: false, error: "TAVILY_API_KEY not set" };
      const items = await webSearch(query, { ...opts, apiKey: opts.apiKey }, signal);
      if (items.length === 0) return { ok: true, output: `No results for "${query}".` };
      return { ok: true, output: formatResults(items) };
    }
  };
}
