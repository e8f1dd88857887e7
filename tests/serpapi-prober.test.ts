import { afterEach, describe, expect, test, vi } from "vitest";
import { ConfigurationError } from "../src/domain/errors.js";
import { SerpApiProber, parseTotalResults } from "../src/services/serpapi-prober.js";

afterEach(() => {
  vi.unstubAllGlobals();
});

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn(async (_input: string | URL | Request) =>
    new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } }),
  );
  vi.stubGlobal("fetch", fetchMock as unknown as typeof fetch);
  return fetchMock;
}

function makeProber() {
  return new SerpApiProber({ apiKey: "test-secret", baseUrl: "https://serp.example.test", timeoutMs: 1000 });
}

describe("SerpApiProber", () => {
  test("requires an api key", () => {
    expect(() => new SerpApiProber({ apiKey: " " })).toThrow(ConfigurationError);
  });

  test("sends the keyword and search parameters", async () => {
    const fetchMock = stubFetch({ organic_results: [] });

    await makeProber().search("proxy ip", { engine: "google", gl: "us", hl: "" });

    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.origin + url.pathname).toBe("https://serp.example.test/search.json");
    expect(url.searchParams.get("q")).toBe("proxy ip");
    expect(url.searchParams.get("api_key")).toBe("test-secret");
    expect(url.searchParams.get("engine")).toBe("google");
    expect(url.searchParams.get("gl")).toBe("us");
    expect(url.searchParams.has("hl")).toBe(false);
  });

  test("maps organic results and result count", async () => {
    stubFetch({
      search_information: { total_results: "1,230,000", time_taken_displayed: 0.4 },
      organic_results: [
        { position: 1, link: "https://a.example/", title: "A", snippet: "first", displayed_link: "a.example" },
        { position: 2, link: "https://b.example/" },
      ],
    });

    const response = await makeProber().search("k", {});

    expect(response).toEqual({
      organicResults: [
        { position: 1, link: "https://a.example/", title: "A", snippet: "first" },
        { position: 2, link: "https://b.example/", title: undefined, snippet: undefined },
      ],
      meta: { totalResults: 1230000 },
    });
  });

  test("a response without organic results keeps the section absent", async () => {
    stubFetch({ error: "Google hasn't returned any results for this query." });

    const response = await makeProber().search("k", {});

    expect(response).toEqual({ meta: { totalResults: null } });
  });

  test("http errors resolve to null", async () => {
    stubFetch({ error: "Invalid API key." }, 401);

    await expect(makeProber().search("k", {})).resolves.toBeNull();
  });

  test("malformed bodies resolve to null", async () => {
    stubFetch({ organic_results: "not-a-list" });

    await expect(makeProber().search("k", {})).resolves.toBeNull();
  });

  test("network failures resolve to null", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }) as unknown as typeof fetch,
    );

    await expect(makeProber().search("k", {})).resolves.toBeNull();
  });
});

describe("parseTotalResults", () => {
  test("accepts numbers and formatted strings", () => {
    expect(parseTotalResults(512)).toBe(512);
    expect(parseTotalResults("About 4,560 results")).toBe(4560);
    expect(parseTotalResults("none")).toBeNull();
    expect(parseTotalResults(undefined)).toBeNull();
  });
});
