import { z } from "zod";
import type { TripAggregator } from "../services/trip-aggregator.js";
import { formatTripPlan } from "../utils/formatting.js";

export const tripFields = {
  origin_city: z
    .string()
    .optional()
    .describe("City of departure. Leave out to plan without flights"),
  destination_city: z.string().describe("City to travel to, e.g. Paris"),
  departure_date: z.string().describe("Departure / check-in date YYYY-MM-DD"),
  return_date: z.string().describe("Return / check-out date YYYY-MM-DD"),
  travelers: z.number().int().default(1).describe("Number of travelers"),
  budget_level: z
    .enum(["budget", "moderate", "luxury"])
    .default("moderate")
    .describe("Price range for hotels and activities"),
  accommodation_type: z
    .string()
    .optional()
    .describe("Preferred kind of stay, e.g. hostel, apartment, resort"),
  flight_class: z
    .enum(["economy", "premium_economy", "business", "first"])
    .optional()
    .describe("Cabin class"),
  origin_country: z
    .string()
    .optional()
    .describe("Traveler's country, for visa rules (default: United States)"),
  destination_country: z
    .string()
    .optional()
    .describe("Destination country, for visa rules and advisories"),
};

export const planTripSchema = z.object({
  ...tripFields,
  include_activities: z
    .boolean()
    .default(true)
    .describe("Whether to search for things to do"),
  max_results_per_category: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Most results to show for flights, hotels and activities each"),
});

export type PlanTripInput = z.infer<typeof planTripSchema>;

export async function handlePlanTrip(
  input: PlanTripInput,
  aggregator: TripAggregator
): Promise<string> {
  const { include_activities, max_results_per_category, ...query } = input;
  const plan = await aggregator.plan(query, {
    include_activities,
    max_results: max_results_per_category,
  });
  return formatTripPlan(plan);
}
