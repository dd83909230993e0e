import { z } from "zod";
import type {
  Category,
  ITravelInfoSource,
  RankedResultSet,
  TravelInfo,
  TripPlan,
  TripQuery,
} from "../providers/provider.js";
import { InvalidQuery } from "../errors.js";
import { TTLCache } from "./cache.js";
import {
  CATEGORY_PLURAL,
  emptyResultSet,
  exhaustedSuggestion,
  type FallbackOrchestrator,
  type RunOptions,
} from "./orchestrator.js";
import { buildSummary } from "./summary.js";

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .refine((d) => !Number.isNaN(Date.parse(`${d}T00:00:00Z`)), "not a calendar date");

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

export const tripQuerySchema = z.object({
  origin_city: optionalText,
  destination_city: z.string().trim().min(1, "destination city is required"),
  departure_date: isoDate,
  return_date: isoDate,
  travelers: z.number().int().min(1, "at least one traveler is required").default(1),
  budget_level: z.enum(["budget", "moderate", "luxury"]).default("moderate"),
  accommodation_type: optionalText,
  flight_class: z.enum(["economy", "premium_economy", "business", "first"]).optional(),
  origin_country: optionalText,
  destination_country: optionalText,
});

export type TripQueryInput = z.input<typeof tripQuerySchema>;

export interface PlanOptions {
  include_activities?: boolean;
  /** Overrides the configured cap on records per category. */
  max_results?: number;
}

export interface TripAggregatorDeps {
  orchestrator: FallbackOrchestrator;
  travel_info?: ITravelInfoSource;
  cache?: TTLCache<TripPlan>;
  now?: () => Date;
}

export function validateTripQuery(input: TripQueryInput): TripQuery {
  const parsed = tripQuerySchema.safeParse(input);
  if (!parsed.success) throw InvalidQuery.fromZod(parsed.error.issues);
  return parsed.data;
}

/**
 * Builds a whole trip plan. Each category runs its own fallback chain and a
 * failed category only leaves a gap in the plan; the one error that reaches
 * the caller is an invalid query, raised before any source is asked.
 */
export class TripAggregator {
  private readonly orchestrator: FallbackOrchestrator;
  private readonly travelInfo?: ITravelInfoSource;
  private readonly cache: TTLCache<TripPlan>;
  private readonly now: () => Date;

  constructor(deps: TripAggregatorDeps) {
    this.orchestrator = deps.orchestrator;
    this.travelInfo = deps.travel_info;
    this.cache = deps.cache ?? new TTLCache<TripPlan>(300); // 5 min
    this.now = deps.now ?? (() => new Date());
  }

  async plan(input: TripQueryInput, options: PlanOptions = {}): Promise<TripPlan> {
    const query = validateTripQuery(input);
    const includeActivities = options.include_activities ?? true;
    const run: RunOptions = { max_results: options.max_results };
    const key = JSON.stringify({ query, includeActivities, max_results: options.max_results });
    // Partial plans are not cached.
    return this.cache.getOrLoad(
      key,
      () => this.assemble(query, includeActivities, run),
      (plan) => plan.status === "success"
    );
  }

  /** One category through its fallback chain, without the rest of the plan. */
  async searchCategory<C extends Category>(
    category: C,
    input: TripQueryInput
  ): Promise<RankedResultSet<C>> {
    const query = validateTripQuery(input);
    if (category === "flight" && !query.origin_city) {
      return emptyResultSet<C>(category, "not_started", [NO_ORIGIN]);
    }
    return this.orchestrator.run(category, query);
  }

  private async assemble(
    query: TripQuery,
    includeActivities: boolean,
    run: RunOptions
  ): Promise<TripPlan> {
    const [flightsResult, hotelsResult, activitiesResult, infoResult] = await Promise.allSettled([
      query.origin_city
        ? this.orchestrator.run("flight", query, run)
        : Promise.resolve(emptyResultSet("flight", "not_started", [NO_ORIGIN])),
      this.orchestrator.run("hotel", query, run),
      includeActivities
        ? this.orchestrator.run("activity", query, run)
        : Promise.resolve(
            emptyResultSet("activity", "not_started", ["Activities were left out of this plan."])
          ),
      this.lookupTravelInfo(query),
    ]);

    const flights = settle(flightsResult, "flight", query);
    const hotels = settle(hotelsResult, "hotel", query);
    const activities = settle(activitiesResult, "activity", query);
    let travelInfo: TravelInfoOutcome;
    if (infoResult.status === "fulfilled") {
      travelInfo = infoResult.value;
    } else {
      console.error(
        `[aggregator] travel info failed: ${
          infoResult.reason instanceof Error ? infoResult.reason.message : String(infoResult.reason)
        }`
      );
      travelInfo = missingTravelInfo(query);
    }

    const suggestions = [
      ...flights.suggestions,
      ...hotels.suggestions,
      ...activities.suggestions,
      ...travelInfo.suggestions,
    ];
    if (query.return_date < query.departure_date) {
      suggestions.push(
        `The return date ${query.return_date} is before the departure date ${query.departure_date}; check the trip dates.`
      );
    }

    const requested = [
      ...(query.origin_city ? [flights] : []),
      hotels,
      ...(includeActivities ? [activities] : []),
    ];
    const complete =
      requested.every((set) => set.records.length > 0) && travelInfo.info !== null;

    const plan: TripPlan = {
      query,
      flights,
      hotels,
      activities,
      travel_info: travelInfo.info,
      summary: buildSummary({
        query,
        flight: flights.records[0],
        hotel: hotels.records[0],
        activity: activities.records[0],
      }),
      suggestions: [...new Set(suggestions)],
      status: complete ? "success" : "partial",
      created_at: this.now().toISOString(),
    };

    console.error(
      `[aggregator] ${query.destination_city}: ${plan.status} ` +
        `(flights ${flights.records.length}, hotels ${hotels.records.length}, ` +
        `activities ${activities.records.length}, travel info ${travelInfo.info ? "yes" : "no"})`
    );
    return deepFreeze(plan);
  }

  private async lookupTravelInfo(query: TripQuery): Promise<TravelInfoOutcome> {
    if (!this.travelInfo || !this.travelInfo.isAvailable()) return missingTravelInfo(query);
    const info = await this.travelInfo.lookup(query);
    return info ? { info, suggestions: [] } : missingTravelInfo(query);
  }
}

interface TravelInfoOutcome {
  info: TravelInfo | null;
  suggestions: string[];
}

function missingTravelInfo(query: TripQuery): TravelInfoOutcome {
  const destination = query.destination_country ?? query.destination_city;
  return {
    info: null,
    suggestions: [
      `No travel information (visa, advisories, health) was found for ${destination}. ` +
        `Check official government sources before you travel.`,
    ],
  };
}

/** A category that rejected becomes an empty, exhausted one. */
function settle<C extends Category>(
  result: PromiseSettledResult<RankedResultSet<C>>,
  category: C,
  query: TripQuery
): RankedResultSet<C> {
  if (result.status === "fulfilled") return result.value;
  console.error(
    `[aggregator] ${CATEGORY_PLURAL[category]} failed: ${
      result.reason instanceof Error ? result.reason.message : String(result.reason)
    }`
  );
  return emptyResultSet(category, "exhausted", [exhaustedSuggestion(category, query)]);
}

const NO_ORIGIN = "Add an origin city to include flights in the plan.";

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
