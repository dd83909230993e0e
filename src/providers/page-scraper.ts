import type {
  Category,
  ISourceAdapter,
  RawRecord,
  TripQuery,
} from "./provider.js";
import type { PageSource } from "../config.js";
import { HttpError } from "../errors.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import { Retrier, type RetrierOptions } from "../utils/retrier.js";

const HOTEL_TYPES = new Set([
  "Hotel",
  "LodgingBusiness",
  "Hostel",
  "Motel",
  "Resort",
  "BedAndBreakfast",
  "VacationRental",
  "Apartment",
]);

const ACTIVITY_TYPES = new Set([
  "TouristAttraction",
  "TouristDestination",
  "Event",
  "Museum",
  "LandmarksOrHistoricalBuildings",
  "Park",
  "Product",
  "Trip",
]);

export interface PageScraperOptions {
  retry?: Omit<RetrierOptions, "limiter">;
  limiter?: RateLimiter;
}

/**
 * Listing pages of booking and review sites, read through the schema.org
 * JSON-LD they embed. A page without usable structured data contributes
 * nothing.
 */
export class PageScraperSource implements ISourceAdapter {
  readonly name = "page_scraper" as const;
  readonly categories = ["hotel", "activity"] as const;
  private readonly pages: readonly PageSource[];
  private readonly retrier: Retrier;

  constructor(pages: readonly PageSource[], options: PageScraperOptions = {}) {
    this.pages = pages;
    this.retrier = new Retrier(this.name, {
      max_retries: 1,
      ...options.retry,
      limiter: options.limiter ?? RateLimiter.fromMinInterval(1500),
    });
  }

  isAvailable(): boolean {
    return this.pages.length > 0;
  }

  async search(category: Category, query: TripQuery): Promise<RawRecord[]> {
    const records: RawRecord[] = [];

    for (const page of this.pages) {
      if (page.category !== category) continue;
      const url = fillTemplate(page.url, query);

      let html: string;
      try {
        html = await this.retrier.call(() => fetchHtml(url));
      } catch (err) {
        console.error(
          `[page_scraper] ${page.name} failed: ${err instanceof Error ? err.message : String(err)}`
        );
        continue;
      }

      const found = extractJsonLd(html).filter((node) => matchesCategory(node, category));
      console.error(`[page_scraper] ${page.name}: ${found.length} ${category} records`);
      for (const node of found) {
        records.push({ source: this.name, category, fields: node });
      }
    }
    return records;
  }
}

async function fetchHtml(url: string): Promise<string> {
  const resp = await fetch(url, {
    headers: {
      "User-Agent":
        "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36",
      Accept: "text/html",
    },
    signal: AbortSignal.timeout(15_000),
  });
  if (resp.status === 404) return "";
  if (!resp.ok) throw await HttpError.fromResponse(`Fetch ${url}`, resp);
  return resp.text();
}

export function fillTemplate(template: string, query: TripQuery): string {
  const city = query.destination_city.trim();
  const values: Record<string, string> = {
    city: encodeURIComponent(city),
    city_slug: encodeURIComponent(city.toLowerCase().replace(/\s+/g, "-")),
    checkin: encodeURIComponent(query.departure_date),
    checkout: encodeURIComponent(query.return_date),
    guests: String(query.travelers),
  };
  return template.replace(/\{(\w+)\}/g, (whole, name: string) => values[name] ?? whole);
}

/**
 * Every JSON-LD node on the page, with @graph containers and ItemList
 * entries flattened out.
 */
export function extractJsonLd(html: string): Record<string, unknown>[] {
  const nodes: Record<string, unknown>[] = [];
  const block =
    /<script[^>]*type=["']application\/ld\+json["'][^>]*>([\s\S]*?)<\/script>/gi;

  for (const match of html.matchAll(block)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(match[1].trim());
    } catch {
      continue;
    }
    collect(parsed, nodes);
  }
  return nodes;
}

function collect(value: unknown, out: Record<string, unknown>[]): void {
  if (Array.isArray(value)) {
    for (const v of value) collect(v, out);
    return;
  }
  if (typeof value !== "object" || value === null) return;
  const node: Record<string, unknown> = { ...value };

  if (Array.isArray(node["@graph"])) {
    collect(node["@graph"], out);
    return;
  }
  if (typesOf(node).includes("ItemList") && Array.isArray(node.itemListElement)) {
    for (const entry of node.itemListElement) {
      if (typeof entry === "object" && entry !== null && "item" in entry) {
        collect(entry.item, out);
      } else {
        collect(entry, out);
      }
    }
    return;
  }
  out.push(node);
}

function typesOf(node: Record<string, unknown>): string[] {
  const t = node["@type"];
  if (typeof t === "string") return [t];
  if (Array.isArray(t)) return t.filter((x): x is string => typeof x === "string");
  return [];
}

function matchesCategory(node: Record<string, unknown>, category: Category): boolean {
  const types = typesOf(node);
  const wanted = category === "hotel" ? HOTEL_TYPES : ACTIVITY_TYPES;
  return types.some((t) => wanted.has(t));
}
