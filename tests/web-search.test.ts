import { beforeEach, describe, expect, it, vi } from "vitest";
import { HttpError, SourceUnavailable } from "../src/errors.js";
import {
  WebSearchSource,
  buildSearchPhrase,
  pickItems,
} from "../src/providers/web-search.js";
import type { SearchHit } from "../src/services/duckduckgo.js";
import { RateLimiter } from "../src/utils/rate-limiter.js";
import { PARIS_QUERY } from "./fixtures.js";

const HITS: SearchHit[] = [
  { title: "A", url: "https://a.test/hotels" },
  { title: "B", url: "https://b.test/hotels" },
  { title: "C", url: "https://c.test/hotels" },
];

const LONG_PAGE = "Hotels in Paris. ".repeat(10);

function fakes() {
  const web = {
    search: vi.fn(async (_phrase: string, _max: number): Promise<SearchHit[]> => HITS),
    fetchPageText: vi.fn(async (url: string, _max: number): Promise<string> => {
      if (url.startsWith("https://a.test")) return LONG_PAGE;
      if (url.startsWith("https://b.test")) return "Too short";
      throw new Error("fetch failed");
    }),
  };
  const extractor = {
    isAvailable: vi.fn(() => true),
    extractStructured: vi.fn(async (_text: string, _hint: string): Promise<unknown> => ({
      hotels: [{ name: "Hotel A", url: "https://own.example/a" }, { name: "Hotel B" }, "junk"],
    })),
  };
  return { web, extractor };
}

function source(f: ReturnType<typeof fakes>, max_records?: number) {
  return new WebSearchSource(f.web, f.extractor, {
    max_records,
    retry: { max_retries: 0, sleep: async () => {} },
    limiter: new RateLimiter(10, 10),
  });
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("buildSearchPhrase", () => {
  it("words hotel searches by budget", () => {
    expect(buildSearchPhrase("hotel", PARIS_QUERY)).toBe(
      "mid-range moderate hotels in Paris 2025-06-15 to 2025-06-22"
    );
    expect(
      buildSearchPhrase("hotel", { ...PARIS_QUERY, budget_level: "budget", accommodation_type: "Hostel" })
    ).toBe("affordable cheap budget hostels in Paris 2025-06-15 to 2025-06-22");
    expect(buildSearchPhrase("hotel", { ...PARIS_QUERY, budget_level: "luxury" })).toBe(
      "luxury 5 star hotels in Paris 2025-06-15 to 2025-06-22"
    );
  });

  it("words activity and flight searches", () => {
    expect(buildSearchPhrase("activity", PARIS_QUERY)).toBe("top things to do in Paris");
    expect(buildSearchPhrase("flight", PARIS_QUERY)).toBe("flights from New York to Paris 2025-06-15");
  });
});

describe("pickItems", () => {
  it("keeps plain objects under the key or in a bare array", () => {
    expect(pickItems({ hotels: [{ name: "A" }, 2, null, [1]] }, "hotels")).toEqual([{ name: "A" }]);
    expect(pickItems([{ name: "B" }], "hotels")).toEqual([{ name: "B" }]);
  });

  it("returns nothing for other shapes", () => {
    expect(pickItems({ activities: [{ name: "A" }] }, "hotels")).toEqual([]);
    expect(pickItems(null, "hotels")).toEqual([]);
    expect(pickItems("hotels", "hotels")).toEqual([]);
  });
});

describe("WebSearchSource", () => {
  it("extracts records from readable pages and skips the rest", async () => {
    const f = fakes();
    const records = await source(f).search("hotel", PARIS_QUERY);

    expect(records).toEqual([
      { source: "web_search", category: "hotel", fields: { name: "Hotel A", url: "https://own.example/a" } },
      { source: "web_search", category: "hotel", fields: { name: "Hotel B", url: "https://a.test/hotels" } },
    ]);
    expect(f.web.search).toHaveBeenCalledWith(
      "mid-range moderate hotels in Paris 2025-06-15 to 2025-06-22",
      3
    );
    expect(f.web.fetchPageText).toHaveBeenCalledTimes(3);
    expect(f.extractor.extractStructured).toHaveBeenCalledTimes(1);
    expect(f.extractor.extractStructured.mock.calls[0][0]).toBe(LONG_PAGE);
  });

  it("stops reading pages once it has enough records", async () => {
    const f = fakes();
    const records = await source(f, 1).search("hotel", PARIS_QUERY);

    expect(records).toHaveLength(1);
    expect(f.web.fetchPageText).toHaveBeenCalledTimes(1);
  });

  it("skips flights without an origin", async () => {
    const f = fakes();
    await expect(source(f).search("flight", { ...PARIS_QUERY, origin_city: undefined })).resolves.toEqual([]);
    expect(f.web.search).not.toHaveBeenCalled();
  });

  it("reports a failing search engine as SourceUnavailable", async () => {
    const f = fakes();
    f.web.search.mockRejectedValue(new Error("blocked"));

    const err = await source(f).search("activity", PARIS_QUERY).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceUnavailable);
    expect(err).toHaveProperty("message", "web_search unavailable: blocked");
  });

  describe("when extraction fails", () => {
    function twoReadablePages() {
      const f = fakes();
      f.web.fetchPageText.mockImplementation(async (url: string) => {
        if (url.startsWith("https://c.test")) throw new Error("fetch failed");
        return LONG_PAGE;
      });
      return f;
    }

    it("gives up on a rejected API key at the first page", async () => {
      const f = twoReadablePages();
      f.extractor.extractStructured.mockRejectedValue(
        new HttpError("OpenAI API error", 401, "Incorrect API key")
      );

      const err = await source(f).search("hotel", PARIS_QUERY).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(SourceUnavailable);
      expect(err).toHaveProperty("message", "web_search unavailable: OpenAI API error: 401 Incorrect API key");
      expect(f.extractor.extractStructured).toHaveBeenCalledTimes(1);
    });

    it("is unavailable when no page gets through extraction", async () => {
      const f = twoReadablePages();
      f.extractor.extractStructured.mockRejectedValue(new Error("model overloaded"));

      const err = await source(f).search("hotel", PARIS_QUERY).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(SourceUnavailable);
      expect(err).toHaveProperty("message", "web_search unavailable: model overloaded");
      expect(f.extractor.extractStructured).toHaveBeenCalledTimes(2);
    });

    it("keeps the records of pages that did get through", async () => {
      const f = twoReadablePages();
      f.extractor.extractStructured
        .mockRejectedValueOnce(new Error("model overloaded"))
        .mockResolvedValueOnce({ hotels: [{ name: "Hotel B" }] });

      const records = await source(f).search("hotel", PARIS_QUERY);
      expect(records).toEqual([
        { source: "web_search", category: "hotel", fields: { name: "Hotel B", url: "https://b.test/hotels" } },
      ]);
    });

    it("retries a transient failure before moving on", async () => {
      const f = twoReadablePages();
      f.extractor.extractStructured
        .mockRejectedValueOnce(new HttpError("OpenAI API error", 503))
        .mockResolvedValue({ hotels: [{ name: "Hotel A" }] });
      const retrying = new WebSearchSource(f.web, f.extractor, {
        max_records: 1,
        retry: { max_retries: 1, sleep: async () => {} },
        limiter: new RateLimiter(10, 10),
      });

      const records = await retrying.search("hotel", PARIS_QUERY);
      expect(records).toEqual([
        { source: "web_search", category: "hotel", fields: { name: "Hotel A", url: "https://a.test/hotels" } },
      ]);
      expect(f.extractor.extractStructured).toHaveBeenCalledTimes(2);
    });
  });

  it("is available when the extractor is", () => {
    const f = fakes();
    f.extractor.isAvailable.mockReturnValue(false);
    expect(source(f).isAvailable()).toBe(false);
  });
});
