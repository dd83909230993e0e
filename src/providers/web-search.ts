import type {
  Category,
  ISourceAdapter,
  RawRecord,
  TripQuery,
} from "./provider.js";
import type { Extractor } from "../services/extractor.js";
import type { WebSearch } from "../services/duckduckgo.js";
import { SourceUnavailable, isPermanentFailure } from "../errors.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import { Retrier, type RetrierOptions } from "../utils/retrier.js";

const SCHEMA_HINTS: Record<Category, { key: string; hint: string }> = {
  hotel: {
    key: "hotels",
    hint: `{"hotels": [{"name": "Hotel name", "location": "Full address", "stars": "1-5",
  "price_range": "€100-150 per night", "amenities": ["WiFi", "Pool"],
  "description": "1-2 sentences", "guest_rating": "8.5/10",
  "type": "hotel | hostel | apartment | guesthouse | ..."}]}`,
  },
  activity: {
    key: "activities",
    hint: `{"activities": [{"name": "Activity name", "description": "1-2 sentences",
  "location": "Where it is", "type": "museum | tour | outdoor | food | ...",
  "price_range": "€20 per person", "rating": "4.6/5"}]}`,
  },
  flight: {
    key: "flights",
    hint: `{"flights": [{"price": "USD 420.00", "airline": "Airline name", "cabin_class": "economy",
  "segments": [{"departure_airport": "JFK", "arrival_airport": "CDG",
  "departure_time": "2025-06-15T18:30", "arrival_time": "2025-06-16T07:45",
  "flight_number": "AF7"}]}]}`,
  },
};

const MIN_PAGE_CHARS = 100;

export interface WebSearchSourceOptions {
  max_pages?: number;
  max_records?: number;
  max_page_chars?: number;
  retry?: Omit<RetrierOptions, "limiter">;
  limiter?: RateLimiter;
}

/**
 * Search engine + LLM extraction: search, read the top pages, and let the
 * extractor turn each page into records. Unreadable pages are skipped; when
 * no page gets through extraction the source is unavailable.
 */
export class WebSearchSource implements ISourceAdapter {
  readonly name = "web_search" as const;
  readonly categories = ["hotel", "activity", "flight"] as const;
  private readonly web: WebSearch;
  private readonly extractor: Extractor;
  private readonly limiter: RateLimiter;
  private readonly retrier: Retrier;
  private readonly max_pages: number;
  private readonly max_records: number;
  private readonly max_page_chars: number;

  constructor(web: WebSearch, extractor: Extractor, options: WebSearchSourceOptions = {}) {
    this.web = web;
    this.extractor = extractor;
    this.limiter = options.limiter ?? RateLimiter.fromMinInterval(2000);
    this.retrier = new Retrier(this.name, { ...options.retry, limiter: this.limiter });
    this.max_pages = options.max_pages ?? 3;
    this.max_records = options.max_records ?? 10;
    this.max_page_chars = options.max_page_chars ?? 15_000;
  }

  isAvailable(): boolean {
    return this.extractor.isAvailable();
  }

  async search(category: Category, query: TripQuery): Promise<RawRecord[]> {
    if (category === "flight" && !query.origin_city) return [];

    const phrase = buildSearchPhrase(category, query);
    const hits = await this.retrier.call(() => this.web.search(phrase, this.max_pages));
    if (hits.length === 0) {
      console.error(`[web_search] no search results for "${phrase}"`);
      return [];
    }

    const { key, hint } = SCHEMA_HINTS[category];
    const records: RawRecord[] = [];

    let extracted = 0;
    let extractionError: unknown;

    for (const hit of hits) {
      if (records.length >= this.max_records) break;

      let text: string;
      try {
        await this.limiter.acquire();
        text = await this.web.fetchPageText(hit.url, this.max_page_chars);
      } catch (err) {
        console.error(
          `[web_search] skipping ${hit.url}: ${err instanceof Error ? err.message : String(err)}`
        );
        continue;
      }
      if (text.length < MIN_PAGE_CHARS) continue;

      let data: unknown;
      try {
        data = await this.retrier.call(() => this.extractor.extractStructured(text, hint));
      } catch (err) {
        if (err instanceof SourceUnavailable && isPermanentFailure(err.cause)) throw err;
        console.error(
          `[web_search] extraction failed for ${hit.url}: ${err instanceof Error ? err.message : String(err)}`
        );
        extractionError = err;
        continue;
      }
      extracted++;

      const items = pickItems(data, key);
      for (const item of items.slice(0, this.max_records - records.length)) {
        records.push({
          source: this.name,
          category,
          fields: { ...item, url: typeof item.url === "string" ? item.url : hit.url },
        });
      }
    }

    if (extracted === 0 && extractionError !== undefined) {
      throw extractionError instanceof SourceUnavailable
        ? extractionError
        : new SourceUnavailable(this.name, extractionError);
    }

    console.error(`[web_search] ${records.length} ${category} records for "${phrase}"`);
    return records;
  }
}

export function buildSearchPhrase(category: Category, query: TripQuery): string {
  const city = query.destination_city;

  if (category === "flight") {
    return `flights from ${query.origin_city ?? ""} to ${city} ${query.departure_date}`.trim();
  }

  if (category === "activity") {
    return `top things to do in ${city}`;
  }

  const kind = query.accommodation_type ? pluralize(query.accommodation_type) : "hotels";
  let phrase: string;
  switch (query.budget_level) {
    case "budget":
      phrase = `affordable cheap budget ${kind} in ${city}`;
      break;
    case "luxury":
      phrase = `luxury 5 star ${kind} in ${city}`;
      break;
    default:
      phrase = `mid-range moderate ${kind} in ${city}`;
  }
  if (query.departure_date && query.return_date) {
    phrase += ` ${query.departure_date} to ${query.return_date}`;
  }
  return phrase;
}

/** Items under `key` (or a bare array) that are plain objects. */
export function pickItems(data: unknown, key: string): Record<string, unknown>[] {
  let list: unknown = data;
  if (isObject(data)) list = data[key];
  if (!Array.isArray(list)) return [];
  return list.filter(isObject);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pluralize(word: string): string {
  const w = word.trim().toLowerCase();
  return w.endsWith("s") ? w : `${w}s`;
}
