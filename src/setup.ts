import type { Config } from "./config.js";
import type { ISourceAdapter, ITravelInfoSource } from "./providers/provider.js";
import { AmadeusSource } from "./providers/amadeus.js";
import { PageScraperSource } from "./providers/page-scraper.js";
import { WebTravelInfoSource } from "./providers/travel-info.js";
import { WebSearchSource } from "./providers/web-search.js";
import { DuckDuckGoSearch } from "./services/duckduckgo.js";
import { OpenAIExtractor } from "./services/extractor.js";
import { FallbackOrchestrator } from "./services/orchestrator.js";
import { TripAggregator } from "./services/trip-aggregator.js";
import { RateLimiter } from "./utils/rate-limiter.js";

export interface Services {
  adapters: ISourceAdapter[];
  travel_info: ITravelInfoSource;
  aggregator: TripAggregator;
}

export function createServices(config: Config): Services {
  const retry = config.retry;
  const web = new DuckDuckGoSearch();
  const extractor = new OpenAIExtractor(config.openai.api_key, config.openai.model);
  // Web search and the travel-info lookup hit the same search engine.
  const searchLimiter = RateLimiter.fromMinInterval(2000);

  const adapters: ISourceAdapter[] = [
    new AmadeusSource({ ...config.amadeus, retry }),
    new WebSearchSource(web, extractor, {
      max_pages: config.search.max_pages,
      retry,
      limiter: searchLimiter,
    }),
    new PageScraperSource(config.page_sources, { retry }),
  ];
  const travel_info = new WebTravelInfoSource(web, extractor, { retry, limiter: searchLimiter });

  const orchestrator = new FallbackOrchestrator(adapters, {
    priorities: config.orchestration.priorities,
    target_count: config.orchestration.target_count,
    max_results: config.orchestration.max_results,
    deadline_ms: config.orchestration.deadline_ms,
    unrated: config.orchestration.unrated,
  });

  return {
    adapters,
    travel_info,
    aggregator: new TripAggregator({ orchestrator, travel_info }),
  };
}
