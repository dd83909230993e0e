import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  SOURCE_NAMES,
  type Category,
  type SourceName,
} from "./providers/provider.js";

const sourceList = (fallback: SourceName[]) =>
  z
    .string()
    .optional()
    .transform((value, ctx): SourceName[] => {
      if (!value || value.trim() === "") return fallback;
      const names: SourceName[] = [];
      for (const part of value.split(",")) {
        const parsed = z.enum(SOURCE_NAMES).safeParse(part.trim());
        if (!parsed.success) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unknown source "${part.trim()}"`,
          });
          return z.NEVER;
        }
        names.push(parsed.data);
      }
      return names;
    });

const envSchema = z.object({
  AMADEUS_CLIENT_ID: z.string().default(""),
  AMADEUS_CLIENT_SECRET: z.string().default(""),
  AMADEUS_BASE_URL: z.string().url().default("https://test.api.amadeus.com"),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  TARGET_COUNT: z.coerce.number().int().positive().default(5),
  MAX_RESULTS: z.coerce.number().int().positive().optional(),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  CATEGORY_DEADLINE_MS: z.coerce.number().int().positive().optional(),
  SEARCH_MAX_PAGES: z.coerce.number().int().positive().default(3),
  UNRATED_PLACEMENT: z.enum(["zero", "last"]).default("zero"),
  // Cheap sources first, rate-limited ones as fallback.
  FLIGHT_PRIORITY: sourceList(["amadeus", "web_search"]),
  HOTEL_PRIORITY: sourceList(["web_search", "amadeus", "page_scraper"]),
  ACTIVITY_PRIORITY: sourceList(["web_search", "page_scraper"]),
});

export const pageSourceSchema = z.object({
  name: z.string(),
  category: z.enum(["hotel", "activity"]),
  url: z.string(),
});

export type PageSource = z.infer<typeof pageSourceSchema>;

export interface Config {
  readonly amadeus: {
    readonly client_id: string;
    readonly client_secret: string;
    readonly base_url: string;
  };
  readonly openai: { readonly api_key: string; readonly model: string };
  readonly retry: { readonly max_retries: number; readonly base_delay_ms: number };
  readonly orchestration: {
    readonly target_count: number;
    readonly max_results?: number;
    readonly deadline_ms?: number;
    readonly unrated: "zero" | "last";
    readonly priorities: Readonly<Record<Category, readonly SourceName[]>>;
  };
  readonly search: { readonly max_pages: number };
  readonly page_sources: readonly PageSource[];
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  page_sources: PageSource[] = loadPageSources()
): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return Object.freeze({
    amadeus: {
      client_id: e.AMADEUS_CLIENT_ID,
      client_secret: e.AMADEUS_CLIENT_SECRET,
      base_url: e.AMADEUS_BASE_URL,
    },
    openai: { api_key: e.OPENAI_API_KEY, model: e.OPENAI_MODEL },
    retry: { max_retries: e.MAX_RETRIES, base_delay_ms: e.RETRY_BASE_DELAY_MS },
    orchestration: {
      target_count: e.TARGET_COUNT,
      max_results: e.MAX_RESULTS,
      deadline_ms: e.CATEGORY_DEADLINE_MS,
      unrated: e.UNRATED_PLACEMENT,
      priorities: {
        flight: e.FLIGHT_PRIORITY,
        hotel: e.HOTEL_PRIORITY,
        activity: e.ACTIVITY_PRIORITY,
      },
    },
    search: { max_pages: e.SEARCH_MAX_PAGES },
    page_sources,
  });
}

export function loadPageSources(
  path = fileURLToPath(new URL("../config/page-sources.json", import.meta.url))
): PageSource[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return z.array(pageSourceSchema).parse(raw);
}
