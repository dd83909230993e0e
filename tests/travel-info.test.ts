import { beforeEach, describe, expect, it, vi } from "vitest";
import { HttpError, SourceUnavailable } from "../src/errors.js";
import {
  WebTravelInfoSource,
  toTravelInfo,
  travelInfoPhrases,
} from "../src/providers/travel-info.js";
import type { SearchHit } from "../src/services/duckduckgo.js";
import { RateLimiter } from "../src/utils/rate-limiter.js";
import { PARIS_QUERY } from "./fixtures.js";

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("toTravelInfo", () => {
  it("cleans up partial extractions", () => {
    const info = toTravelInfo(
      {
        visa: { requirement: " Visa not required ", description: "Stays up to 90 days." },
        advisories: [
          { source: "", level: "Level 1: Exercise normal precautions", summary: "" },
          { source: "Somebody", level: "", summary: "" },
          "junk",
        ],
        health: { summary: "", vaccinations: [" Hepatitis A ", "  "] },
      },
      "web_search"
    );

    expect(info).toEqual({
      visa: { requirement: "Visa not required", description: "Stays up to 90 days." },
      advisories: [{ source: "Unknown", level: "Level 1: Exercise normal precautions", summary: "" }],
      health: { summary: "", vaccinations: ["Hepatitis A"] },
      source: "web_search",
    });
  });

  it("fills an unknown visa requirement when only health advice was found", () => {
    expect(toTravelInfo({ health: { summary: "Drink bottled water." } }, "web_search")).toEqual({
      visa: { requirement: "Unknown", description: "" },
      advisories: [],
      health: { summary: "Drink bottled water.", vaccinations: [] },
      source: "web_search",
    });
  });

  it("returns null when nothing useful was extracted", () => {
    expect(toTravelInfo({}, "web_search")).toBeNull();
    expect(toTravelInfo(null, "web_search")).toBeNull();
    expect(toTravelInfo({ visa: { requirement: "  " }, advisories: [] }, "web_search")).toBeNull();
  });
});

describe("WebTravelInfoSource", () => {
  function fakes(max_retries = 0) {
    const web = {
      search: vi.fn(async (phrase: string, _max: number): Promise<SearchHit[]> => {
        if (phrase.includes("visa")) return [{ title: "Visa", url: "https://gov.test/visa" }];
        if (phrase.includes("advisory")) return [];
        throw new Error("blocked");
      }),
      fetchPageText: vi.fn(async (url: string, _max: number) => `Page for ${url}`),
    };
    const extractor = {
      isAvailable: () => true,
      extractStructured: vi.fn(async (_text: string, _hint: string): Promise<unknown> => ({
        visa: { requirement: "eVisa", description: "" },
      })),
    };
    const source = new WebTravelInfoSource(web, extractor, {
      retry: { max_retries, sleep: async () => {} },
      limiter: new RateLimiter(10, 10),
    });
    return { web, extractor, source };
  }

  it("searches one phrase per topic", () => {
    expect(travelInfoPhrases("Canada", "Japan")).toEqual([
      "Japan visa requirements for Canada citizens",
      "Japan travel advisory",
      "Japan travel health vaccinations",
    ]);
  });

  it("reads the pages it found in one extraction", async () => {
    const { web, extractor, source } = fakes();

    const info = await source.lookup({ ...PARIS_QUERY, destination_country: "France" });

    expect(web.search.mock.calls.map(([phrase]) => phrase)).toEqual([
      "France visa requirements for United States citizens",
      "France travel advisory",
      "France travel health vaccinations",
    ]);
    expect(extractor.extractStructured).toHaveBeenCalledTimes(1);
    expect(extractor.extractStructured.mock.calls[0][0]).toBe(
      "SOURCE: https://gov.test/visa\nPage for https://gov.test/visa"
    );
    expect(info).toEqual({
      visa: { requirement: "eVisa", description: "" },
      advisories: [],
      health: { summary: "", vaccinations: [] },
      source: "web_search",
    });
  });

  it("returns null without calling the extractor when nothing was found", async () => {
    const { web, extractor, source } = fakes();
    web.search.mockResolvedValue([]);

    await expect(source.lookup(PARIS_QUERY)).resolves.toBeNull();
    expect(extractor.extractStructured).not.toHaveBeenCalled();
    expect(web.search.mock.calls[0][0]).toBe("Paris visa requirements for United States citizens");
  });

  it("retries a failed extraction", async () => {
    const { extractor, source } = fakes(1);
    extractor.extractStructured.mockRejectedValueOnce(new HttpError("OpenAI API error", 429));

    const info = await source.lookup(PARIS_QUERY);

    expect(extractor.extractStructured).toHaveBeenCalledTimes(2);
    expect(info?.visa.requirement).toBe("eVisa");
  });

  it("rejects when the extractor refuses the API key", async () => {
    const { extractor, source } = fakes(3);
    extractor.extractStructured.mockRejectedValue(
      new HttpError("OpenAI API error", 401, "Incorrect API key")
    );

    const err = await source.lookup(PARIS_QUERY).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceUnavailable);
    expect(err).toHaveProperty("source", "travel_info");
    expect(extractor.extractStructured).toHaveBeenCalledTimes(1);
  });
});
