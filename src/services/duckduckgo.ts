import TurndownService from "turndown";
import { HttpError, RateLimitedError } from "../errors.js";

const SEARCH_URL = "https://html.duckduckgo.com/html/";

const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
];

export interface SearchHit {
  title: string;
  url: string;
}

export interface WebSearch {
  search(phrase: string, max_results: number): Promise<SearchHit[]>;
  fetchPageText(url: string, max_chars: number): Promise<string>;
}

const turndown = new TurndownService();
turndown.remove(["script", "style", "noscript", "nav", "footer", "header"]);

export class DuckDuckGoSearch implements WebSearch {
  async search(phrase: string, max_results: number): Promise<SearchHit[]> {
    const resp = await fetch(`${SEARCH_URL}?${new URLSearchParams({ q: phrase })}`, {
      headers: { "User-Agent": randomUserAgent() },
      signal: AbortSignal.timeout(10_000),
    });

    // DuckDuckGo answers throttled clients with 202 and an empty page.
    if (resp.status === 202) {
      throw new RateLimitedError("DuckDuckGo throttled the search");
    }
    if (!resp.ok) {
      throw await HttpError.fromResponse("DuckDuckGo search error", resp);
    }

    return parseDuckDuckGoResults(await resp.text()).slice(0, max_results);
  }

  async fetchPageText(url: string, max_chars: number): Promise<string> {
    const resp = await fetch(url, {
      headers: { "User-Agent": randomUserAgent() },
      signal: AbortSignal.timeout(15_000),
    });
    if (!resp.ok) {
      throw await HttpError.fromResponse(`Fetch ${url}`, resp);
    }
    return htmlToText(await resp.text(), max_chars);
  }
}

export function htmlToText(html: string, max_chars: number): string {
  const markdown = turndown
    .turndown(html)
    .replace(/!\[[^\]]*\]\([^)]*\)/g, "") // images
    .replace(/\n{3,}/g, "\n\n")
    .trim();
  return markdown.length > max_chars
    ? `${markdown.slice(0, max_chars)}...`
    : markdown;
}

/** Result links from the HTML endpoint, unwrapped from the /l/?uddg= redirect. */
export function parseDuckDuckGoResults(html: string): SearchHit[] {
  const hits: SearchHit[] = [];
  const seen = new Set<string>();
  const anchor =
    /<a[^>]*class="[^"]*result__a[^"]*"[^>]*href="([^"]+)"[^>]*>([\s\S]*?)<\/a>/gi;

  for (const match of html.matchAll(anchor)) {
    const url = unwrapRedirect(decodeEntities(match[1]));
    if (!url || seen.has(url) || url.includes("duckduckgo.com/y.js")) continue;
    seen.add(url);
    hits.push({
      title: decodeEntities(match[2].replace(/<[^>]+>/g, "")).trim(),
      url,
    });
  }
  return hits;
}

function unwrapRedirect(href: string): string | null {
  const absolute = href.startsWith("//") ? `https:${href}` : href;
  let parsed: URL;
  try {
    parsed = new URL(absolute, "https://duckduckgo.com");
  } catch {
    return null;
  }
  const target = parsed.searchParams.get("uddg");
  if (target) return target;
  return parsed.protocol === "http:" || parsed.protocol === "https:"
    ? parsed.toString()
    : null;
}

function decodeEntities(s: string): string {
  return s
    .replace(/&amp;/g, "&")
    .replace(/&quot;/g, '"')
    .replace(/&#x27;|&#39;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">");
}

function randomUserAgent(): string {
  return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}
