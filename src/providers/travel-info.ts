import { z } from "zod";
import type { ITravelInfoSource, TravelInfo, TripQuery } from "./provider.js";
import type { Extractor } from "../services/extractor.js";
import type { WebSearch } from "../services/duckduckgo.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import { Retrier, type RetrierOptions } from "../utils/retrier.js";

const SCHEMA_HINT = `{"visa": {"requirement": "Visa required | Visa not required | eVisa | Visa on arrival",
  "description": "1-2 sentences"},
  "advisories": [{"source": "US State Department", "level": "Level 2: Exercise increased caution",
  "summary": "1-2 sentences"}],
  "health": {"summary": "1-2 sentences", "vaccinations": ["Hepatitis A"]}}`;

const text = z.string().trim().catch("");

const extractedSchema = z.object({
  visa: z
    .object({ requirement: text, description: text })
    .catch({ requirement: "", description: "" }),
  advisories: z
    .array(
      z.object({ source: text, level: text, summary: text }).nullable().catch(null)
    )
    .catch([]),
  health: z
    .object({
      summary: text,
      vaccinations: z.array(z.string()).catch([]),
    })
    .catch({ summary: "", vaccinations: [] }),
});

export interface WebTravelInfoOptions {
  max_page_chars?: number;
  retry?: Omit<RetrierOptions, "limiter">;
  limiter?: RateLimiter;
}

/**
 * Visa rules, government advisories and health advice for the destination,
 * gathered from the first result of one search per topic and read in a
 * single extraction pass.
 */
export class WebTravelInfoSource implements ITravelInfoSource {
  readonly name = "web_search";
  private readonly web: WebSearch;
  private readonly extractor: Extractor;
  private readonly limiter: RateLimiter;
  private readonly retrier: Retrier;
  private readonly max_page_chars: number;

  constructor(web: WebSearch, extractor: Extractor, options: WebTravelInfoOptions = {}) {
    this.web = web;
    this.extractor = extractor;
    this.limiter = options.limiter ?? RateLimiter.fromMinInterval(2000);
    this.retrier = new Retrier("travel_info", { ...options.retry, limiter: this.limiter });
    this.max_page_chars = options.max_page_chars ?? 6000;
  }

  isAvailable(): boolean {
    return this.extractor.isAvailable();
  }

  async lookup(query: TripQuery): Promise<TravelInfo | null> {
    const from = query.origin_country ?? "United States";
    const to = query.destination_country ?? query.destination_city;

    const sections: string[] = [];
    for (const phrase of travelInfoPhrases(from, to)) {
      try {
        const hits = await this.retrier.call(() => this.web.search(phrase, 1));
        if (hits.length === 0) continue;
        await this.limiter.acquire();
        const page = await this.web.fetchPageText(hits[0].url, this.max_page_chars);
        sections.push(`SOURCE: ${hits[0].url}\n${page}`);
      } catch (err) {
        console.error(
          `[travel_info] "${phrase}" failed: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
    if (sections.length === 0) return null;

    const text = sections.join("\n\n---\n\n");
    const extracted = await this.retrier.call(() =>
      this.extractor.extractStructured(text, SCHEMA_HINT)
    );
    return toTravelInfo(extracted, this.name);
  }
}

export function travelInfoPhrases(from: string, to: string): string[] {
  return [
    `${to} visa requirements for ${from} citizens`,
    `${to} travel advisory`,
    `${to} travel health vaccinations`,
  ];
}

/** Null when the extraction found none of the three sections. */
export function toTravelInfo(data: unknown, source: string): TravelInfo | null {
  const parsed = extractedSchema.safeParse(data);
  if (!parsed.success) return null;
  const { visa, health } = parsed.data;
  const advisories = parsed.data.advisories.filter(
    (a): a is NonNullable<typeof a> => a !== null && (a.level !== "" || a.summary !== "")
  );

  const hasVisa = visa.requirement !== "" || visa.description !== "";
  const hasHealth = health.summary !== "" || health.vaccinations.length > 0;
  if (!hasVisa && advisories.length === 0 && !hasHealth) return null;

  return {
    visa: { requirement: visa.requirement || "Unknown", description: visa.description },
    advisories: advisories.map((a) => ({
      source: a.source || "Unknown",
      level: a.level || "Unknown",
      summary: a.summary,
    })),
    health: {
      summary: health.summary,
      vaccinations: health.vaccinations.map((v) => v.trim()).filter((v) => v !== ""),
    },
    source,
  };
}
