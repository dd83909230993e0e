import type {
  Category,
  ISourceAdapter,
  OrchestrationState,
  RankedResultSet,
  RawRecord,
  RecordByCategory,
  SourceAttempt,
  SourceName,
  TripQuery,
} from "../providers/provider.js";
import { dedupeKey } from "./dedupe.js";
import { matchesPreferences } from "./filters.js";
import { normalizeAll } from "./normalizer.js";
import { rank, type UnratedPlacement } from "./ranker.js";

export const CATEGORY_PLURAL: Record<Category, string> = {
  flight: "flights",
  hotel: "hotels",
  activity: "activities",
};

export interface OrchestratorOptions {
  /** Source order per category. Sources not listed are never asked. */
  priorities: Readonly<Record<Category, readonly SourceName[]>>;
  target_count?: number;
  /** Per-category budget, checked between source attempts. */
  deadline_ms?: number;
  /** Cap on ranked records per category; a run may ask for fewer or more. */
  max_results?: number;
  unrated?: UnratedPlacement;
  now?: () => number;
}

export interface RunOptions {
  max_results?: number;
}

/**
 * Tries a category's sources one at a time in priority order and stops as
 * soon as enough distinct records have been collected.
 */
export class FallbackOrchestrator {
  private readonly adapters: Map<SourceName, ISourceAdapter>;
  private readonly options: OrchestratorOptions;
  private readonly now: () => number;

  constructor(adapters: ISourceAdapter[], options: OrchestratorOptions) {
    this.adapters = new Map(adapters.map((a) => [a.name, a]));
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  async run<C extends Category>(
    category: C,
    query: TripQuery,
    options: RunOptions = {}
  ): Promise<RankedResultSet<C>> {
    const target = this.options.target_count ?? 5;
    const deadline = this.options.deadline_ms;
    const started = this.now();
    const order = this.options.priorities[category];

    const accumulated: RecordByCategory[C][] = [];
    const seen = new Set<string>();
    const attempts: SourceAttempt[] = [];
    let state: OrchestrationState = "not_started";
    let tried = 0;

    for (const name of order) {
      if (state === "sufficient" || state === "timed_out") {
        attempts.push(skipped(name, state === "timed_out" ? "deadline exceeded" : undefined));
        continue;
      }

      const adapter = this.adapters.get(name);
      if (!adapter || !adapter.categories.includes(category) || !adapter.isAvailable()) {
        attempts.push(skipped(name, adapter ? undefined : "not configured"));
        continue;
      }

      if (deadline !== undefined && tried > 0 && this.now() - started >= deadline) {
        console.error(`[orchestrator] ${category}: deadline of ${deadline}ms reached`);
        state = "timed_out";
        attempts.push(skipped(name, "deadline exceeded"));
        continue;
      }

      state = "trying_source";
      tried++;
      const attempt = await this.attempt(adapter, category, query, accumulated, seen);
      attempts.push(attempt);
      console.error(
        `[orchestrator] ${category}: ${name} ${attempt.status} ` +
          `(raw ${attempt.raw_count}, +${attempt.added_count}, dropped ${attempt.dropped_count}` +
          `${attempt.filtered_count ? `, filtered ${attempt.filtered_count}` : ""}), ` +
          `${accumulated.length}/${target}`
      );

      if (accumulated.length >= target) state = "sufficient";
    }

    if (state === "not_started" || state === "trying_source") {
      state = accumulated.length > 0 ? "completed" : "exhausted";
    }

    let records = rank(category, accumulated, { unrated: this.options.unrated });
    const max_results = options.max_results ?? this.options.max_results;
    if (max_results !== undefined) records = records.slice(0, max_results);

    const suggestions: string[] = [];
    if (records.length === 0) {
      suggestions.push(
        state === "timed_out"
          ? timedOutSuggestion(category, query)
          : exhaustedSuggestion(category, query)
      );
    }

    return {
      category,
      records,
      contributing_sources: order.filter((s) => records.some((r) => r.source === s)),
      suggestions,
      state,
      attempts,
    };
  }

  /** One source, fenced off: whatever it throws becomes an "unavailable" attempt. */
  private async attempt<C extends Category>(
    adapter: ISourceAdapter,
    category: C,
    query: TripQuery,
    accumulated: RecordByCategory[C][],
    seen: Set<string>
  ): Promise<SourceAttempt> {
    let raws: RawRecord[];
    try {
      raws = await adapter.search(category, query);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[orchestrator] ${category}: ${adapter.name} failed: ${message}`);
      return {
        source: adapter.name,
        status: "unavailable",
        raw_count: 0,
        added_count: 0,
        dropped_count: 0,
        error: message,
      };
    }

    const { records, dropped } = normalizeAll(category, raws);
    const wanted = records.filter((r) => matchesPreferences(r, query));
    const filtered = records.length - wanted.length;
    let added = 0;
    for (const record of wanted) {
      const key = dedupeKey(record);
      if (seen.has(key)) continue;
      seen.add(key);
      accumulated.push(record);
      added++;
    }

    return {
      source: adapter.name,
      status: wanted.length > 0 ? "ok" : "empty",
      raw_count: raws.length,
      added_count: added,
      dropped_count: dropped,
      ...(filtered > 0 ? { filtered_count: filtered } : {}),
    };
  }
}

/** A result set with nothing in it, for a category that never ran or failed outright. */
export function emptyResultSet<C extends Category>(
  category: C,
  state: OrchestrationState,
  suggestions: string[]
): RankedResultSet<C> {
  return { category, records: [], contributing_sources: [], suggestions, state, attempts: [] };
}

export function exhaustedSuggestion(category: Category, query: TripQuery): string {
  const where =
    category === "flight" && query.origin_city
      ? `from ${query.origin_city} to ${query.destination_city}`
      : `in ${query.destination_city}`;
  return (
    `No ${CATEGORY_PLURAL[category]} found ${where} for ${query.departure_date} to ` +
    `${query.return_date}. Try different dates or a nearby destination.`
  );
}

function timedOutSuggestion(category: Category, query: TripQuery): string {
  return (
    `The search for ${CATEGORY_PLURAL[category]} in ${query.destination_city} ran out of time ` +
    `before any source answered. Try again in a moment.`
  );
}

function skipped(source: SourceName, error?: string): SourceAttempt {
  return {
    source,
    status: "skipped",
    raw_count: 0,
    added_count: 0,
    dropped_count: 0,
    ...(error ? { error } : {}),
  };
}
