import { describe, expect, test } from "vitest";
import { RankChecker } from "../src/services/rank-checker.js";
import { StubProber, resultsOf } from "./stubs.js";

const NOW = Date.parse("2026-03-01T08:00:00.000Z");

function makeChecker(prober: StubProber) {
  const checker = new RankChecker({ prober, nowFn: () => NOW });
  checker.configure({ engine: "google", gl: "us" });
  return checker;
}

describe("RankChecker", () => {
  test("matches the domain as a raw substring of the result link", async () => {
    const prober = new StubProber(() =>
      resultsOf([
        { position: 1, link: "https://other.example.org/" },
        {
          position: 2,
          link: "https://shop.example.com/dataget.ai/page",
          title: "Shop page",
          snippet: "mentions the domain in its path",
        },
      ]),
    );

    const observation = await makeChecker(prober).checkDomainRanking("proxy ip", "dataget.ai");

    expect(observation).toEqual({
      keyword: "proxy ip",
      domain: "dataget.ai",
      timestamp: "2026-03-01T08:00:00.000Z",
      found: true,
      position: 2,
      link: "https://shop.example.com/dataget.ai/page",
      title: "Shop page",
      snippet: "mentions the domain in its path",
      totalResults: 1000,
      searchParams: { engine: "google", gl: "us" },
    });
    expect(prober.calls).toEqual([{ keyword: "proxy ip", params: { engine: "google", gl: "us" } }]);
  });

  test("first matching result wins", async () => {
    const prober = new StubProber(() =>
      resultsOf([
        { position: 4, link: "https://dataget.ai/a" },
        { position: 6, link: "https://dataget.ai/b" },
      ]),
    );

    const observation = await makeChecker(prober).checkDomainRanking("k", "dataget.ai");

    expect(observation.position).toBe(4);
    expect(observation.link).toBe("https://dataget.ai/a");
  });

  test("matching is case-sensitive", async () => {
    const prober = new StubProber(() => resultsOf([{ position: 1, link: "https://DataGet.ai/" }]));

    const observation = await makeChecker(prober).checkDomainRanking("k", "dataget.ai");

    expect(observation.found).toBe(false);
    expect(observation.totalResults).toBe(1000);
  });

  test("falls back to the list index when the provider omits the position", async () => {
    const prober = new StubProber(() =>
      resultsOf([{ link: "https://a.example/" }, { link: "https://target.example/x" }]),
    );

    const observation = await makeChecker(prober).checkDomainRanking("k", "target.example");

    expect(observation.found).toBe(true);
    expect(observation.position).toBe(2);
    expect(observation.title).toBeNull();
  });

  test("zero organic results yields not-found with the reported total", async () => {
    const prober = new StubProber(() => resultsOf([], 42));

    const observation = await makeChecker(prober).checkDomainRanking("k", "d.com");

    expect(observation).toMatchObject({
      found: false,
      position: null,
      link: null,
      title: null,
      snippet: null,
      totalResults: 42,
    });
  });

  test("missing organic section keeps partial metadata", async () => {
    const prober = new StubProber(() => ({ meta: { totalResults: 7 } }));

    const observation = await makeChecker(prober).checkDomainRanking("k", "d.com");

    expect(observation.found).toBe(false);
    expect(observation.totalResults).toBe(7);
  });

  test("failed probe degrades to not-found with null total", async () => {
    const prober = new StubProber(() => null);

    const observation = await makeChecker(prober).checkDomainRanking("k", "d.com");

    expect(observation.found).toBe(false);
    expect(observation.totalResults).toBeNull();
  });

  test("a throwing prober never propagates", async () => {
    const prober = new StubProber(() => {
      throw new Error("provider exploded");
    });

    const observation = await makeChecker(prober).checkDomainRanking("k", "d.com");

    expect(observation.found).toBe(false);
    expect(observation.position).toBeNull();
    expect(observation.searchParams).toEqual({ engine: "google", gl: "us" });
  });
});
