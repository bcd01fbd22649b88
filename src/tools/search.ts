import { z } from "zod";

export interface SearchResult {
  title: string;
  url: string;
  content: string;
  score: number;
}

export interface SearchOptions {
  depth?: "basic" | "advanced";
  maxResults?: number;
  includeDomains?: readonly string[];
  excludeDomains?: readonly string[];
  signal?: AbortSignal;
}

export interface SearchClient {
  search(query: string, options?: SearchOptions): Promise<SearchResult[]>;
}

/** Sites that tend to carry fixes for production errors. */
export const TECHNICAL_DOMAINS = [
  "stackoverflow.com",
  "github.com",
  "docs.python.org",
  "developer.mozilla.org",
  "kubernetes.io",
  "docs.docker.com",
  "nodejs.org",
  "learn.microsoft.com",
  "cloud.google.com",
  "docs.aws.amazon.com"
] as const;

export type SearchErrorCode = "MISSING_API_KEY" | "HTTP_ERROR" | "INVALID_RESPONSE";

export class SearchError extends Error {
  constructor(
    message: string,
    readonly code: SearchErrorCode
  ) {
    super(message);
    this.name = "SearchError";
  }
}

const tavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(""),
        url: z.string().default(""),
        content: z.string().default(""),
        score: z.number().default(0)
      })
    )
    .default([])
});

export interface TavilySearchClientOptions {
  apiKey: string | null;
  endpoint?: string;
  fetch?: typeof fetch;
}

export class TavilySearchClient implements SearchClient {
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TavilySearchClientOptions) {
    this.endpoint = options.endpoint ?? "https://api.tavily.com/search";
    this.fetchImpl = options.fetch ?? fetch;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    if (!this.options.apiKey) {
      throw new SearchError("TAVILY_API_KEY is not configured", "MISSING_API_KEY");
    }

    const response = await this.fetchImpl(this.endpoint, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.options.apiKey}`
      },
      body: JSON.stringify({
        query,
        search_depth: options.depth ?? "basic",
        max_results: options.maxResults ?? 5,
        ...(options.includeDomains ? { include_domains: options.includeDomains } : {}),
        ...(options.excludeDomains ? { exclude_domains: options.excludeDomains } : {})
      }),
      ...(options.signal ? { signal: options.signal } : {})
    });
    if (!response.ok) {
      throw new SearchError(`Search request failed with HTTP ${response.status}`, "HTTP_ERROR");
    }

    const parsed = tavilyResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SearchError(`Unexpected search response: ${parsed.error.message}`, "INVALID_RESPONSE");
    }
    return parsed.data.results;
  }
}

/** Deep search restricted to technical documentation and Q&A sites. */
export function searchTechnical(
  client: SearchClient,
  query: string,
  options: { maxResults?: number; signal?: AbortSignal } = {}
): Promise<SearchResult[]> {
  return client.search(query, {
    depth: "advanced",
    maxResults: options.maxResults ?? 5,
    includeDomains: TECHNICAL_DOMAINS,
    ...(options.signal ? { signal: options.signal } : {})
  });
}

export function formatSearchResults(results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return "No search results found.";
  }
  return results
    .map((result, index) => {
      const content = result.content.length > 500 ? `${result.content.slice(0, 500)}...` : result.content;
      return `### Result ${index + 1}: ${result.title}\nURL: ${result.url}\n${content}`;
    })
    .join("\n\n");
}
