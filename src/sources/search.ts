import { z } from "zod";

const EXA_SEARCH_URL = "https://api.exa.ai/search";

export interface SearchHit {
  url: string;
  title?: string;
}

export interface SearchOptions {
  numResults: number;
  signal?: AbortSignal;
}

export interface SearchProvider {
  search(query: string, options: SearchOptions): Promise<SearchHit[]>;
}

const ExaResponseSchema = z.object({
  results: z.array(
    z.object({
      url: z.string(),
      title: z.string().nullish(),
    })
  ),
});

export class ExaSearchProvider implements SearchProvider {
  constructor(
    private readonly apiKey: string,
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  async search(query: string, options: SearchOptions): Promise<SearchHit[]> {
    const response = await this.fetchFn(EXA_SEARCH_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
      },
      body: JSON.stringify({ query, numResults: options.numResults }),
      signal: options.signal ?? AbortSignal.timeout(15000),
    });
    if (!response.ok) {
      throw new Error(`Exa search returned ${response.status}`);
    }

    const parsed = ExaResponseSchema.parse(await response.json());
    return parsed.results.map((r) => ({
      url: r.url,
      title: r.title ?? undefined,
    }));
  }
}
