import { z } from "zod";
import type { TripAggregator } from "../services/trip-aggregator.js";
import { parseTripQuery } from "../services/query-parser.js";
import { formatTripPlan } from "../utils/formatting.js";

export const planTripFromTextSchema = z.object({
  request: z
    .string()
    .min(1)
    .describe(
      'Travel request in plain language, e.g. "2 adults from New York to Paris, June 15-22 2025, cheap hotel"'
    ),
});

export type PlanTripFromTextInput = z.infer<typeof planTripFromTextSchema>;

export async function handlePlanTripFromText(
  input: PlanTripFromTextInput,
  aggregator: TripAggregator,
  now: Date = new Date()
): Promise<string> {
  const query = parseTripQuery(input.request, now);
  const plan = await aggregator.plan(query);

  const understood = [
    query.origin_city ? `from ${query.origin_city}` : null,
    `to ${query.destination_city}`,
    `${query.departure_date} → ${query.return_date}`,
    `${query.travelers} traveler${query.travelers === 1 ? "" : "s"}`,
    `${query.budget_level} budget`,
  ]
    .filter((part): part is string => part !== null)
    .join(", ");

  return `_Understood: ${understood}_\n\n${formatTripPlan(plan)}`;
}
