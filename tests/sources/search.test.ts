import { describe, it, expect, vi } from "vitest";
import { ExaSearchProvider } from "../../src/sources/search.js";

describe("ExaSearchProvider", () => {
  it("posts the query and maps the results", async () => {
    const fetchFn = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response(
          JSON.stringify({
            results: [
              { url: "https://en.wikivoyage.org/wiki/Porto", title: "Porto" },
              { url: "https://www.timeout.com/porto", title: null },
            ],
          }),
          { status: 200 }
        )
    );
    const provider = new ExaSearchProvider("test-key", fetchFn);

    const hits = await provider.search("best food in Porto", { numResults: 5 });

    expect(hits).toEqual([
      { url: "https://en.wikivoyage.org/wiki/Porto", title: "Porto" },
      { url: "https://www.timeout.com/porto", title: undefined },
    ]);

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://api.exa.ai/search");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({ "x-api-key": "test-key" });
    expect(JSON.parse(String(init?.body))).toEqual({
      query: "best food in Porto",
      numResults: 5,
    });
  });

  it("throws on HTTP errors", async () => {
    const fetchFn = vi.fn(async () => new Response("busy", { status: 429 }));
    const provider = new ExaSearchProvider("test-key", fetchFn);

    await expect(
      provider.search("anything", { numResults: 5 })
    ).rejects.toThrow("Exa search returned 429");
  });

  it("throws on unexpected response shapes", async () => {
    const fetchFn = vi.fn(
      async () => new Response(JSON.stringify({ hits: [] }), { status: 200 })
    );
    const provider = new ExaSearchProvider("test-key", fetchFn);

    await expect(
      provider.search("anything", { numResults: 5 })
    ).rejects.toThrow();
  });
});
