import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  PageScraperSource,
  extractJsonLd,
  fillTemplate,
} from "../src/providers/page-scraper.js";
import { RateLimiter } from "../src/utils/rate-limiter.js";
import { PARIS_QUERY } from "./fixtures.js";

const ld = (body: unknown) =>
  `<script type="application/ld+json">${JSON.stringify(body)}</script>`;

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("fillTemplate", () => {
  it("substitutes known placeholders and leaves the rest", () => {
    const url = fillTemplate(
      "https://x.test/{city_slug}/?q={city}&from={checkin}&to={checkout}&n={guests}&{other}",
      { ...PARIS_QUERY, destination_city: " New York " }
    );
    expect(url).toBe(
      "https://x.test/new-york/?q=New%20York&from=2025-06-15&to=2025-06-22&n=2&{other}"
    );
  });
});

describe("extractJsonLd", () => {
  it("flattens graphs and item lists and skips broken blocks", () => {
    const html = [
      ld({
        "@context": "https://schema.org",
        "@graph": [
          { "@type": "Hotel", name: "Hotel A" },
          { "@type": "WebPage", name: "Page" },
        ],
      }),
      '<script type="application/ld+json">{ broken</script>',
      ld({
        "@type": "ItemList",
        itemListElement: [
          { "@type": "ListItem", position: 1, item: { "@type": "TouristAttraction", name: "Louvre" } },
          { "@type": "Museum", name: "Orsay" },
        ],
      }),
    ].join("\n");

    expect(extractJsonLd(html)).toEqual([
      { "@type": "Hotel", name: "Hotel A" },
      { "@type": "WebPage", name: "Page" },
      { "@type": "TouristAttraction", name: "Louvre" },
      { "@type": "Museum", name: "Orsay" },
    ]);
  });

  it("returns nothing for a page without JSON-LD", () => {
    expect(extractJsonLd("<html><body><h1>Hotels</h1></body></html>")).toEqual([]);
  });
});

describe("PageScraperSource", () => {
  const pages = [
    { name: "site-a", category: "hotel" as const, url: "https://a.test/{city}" },
    { name: "site-b", category: "hotel" as const, url: "https://b.test/{city}" },
    { name: "site-c", category: "activity" as const, url: "https://c.test/{city}" },
  ];

  function scraper(list = pages) {
    return new PageScraperSource(list, {
      retry: { max_retries: 0, sleep: async () => {} },
      limiter: new RateLimiter(10, 10),
    });
  }

  it("is available only with configured pages", () => {
    expect(scraper().isAvailable()).toBe(true);
    expect(scraper([]).isAvailable()).toBe(false);
  });

  it("keeps matching nodes and skips failing sites", async () => {
    const fetchMock = vi.fn(async (url: string) => {
      if (url.startsWith("https://a.test/")) {
        return new Response(
          ld([
            { "@type": "Hotel", name: "Hotel A" },
            { "@type": "Organization", name: "Booking Co" },
          ]),
          { status: 200 }
        );
      }
      return new Response("down", { status: 500 });
    });
    vi.stubGlobal("fetch", fetchMock);

    const records = await scraper().search("hotel", PARIS_QUERY);

    expect(records).toEqual([
      { source: "page_scraper", category: "hotel", fields: { "@type": "Hotel", name: "Hotel A" } },
    ]);
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      "https://a.test/Paris",
      "https://b.test/Paris",
    ]);
  });

  it("treats a missing page as empty", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("not found", { status: 404 })));
    await expect(scraper().search("activity", PARIS_QUERY)).resolves.toEqual([]);
  });

  it("matches activity types for activity searches", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        new Response(
          ld({ "@type": ["TouristAttraction", "Place"], name: "Eiffel Tower" }),
          { status: 200 }
        )
      )
    );

    const records = await scraper().search("activity", PARIS_QUERY);
    expect(records).toEqual([
      {
        source: "page_scraper",
        category: "activity",
        fields: { "@type": ["TouristAttraction", "Place"], name: "Eiffel Tower" },
      },
    ]);
  });
});
