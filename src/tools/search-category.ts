import { z } from "zod";
import type { TripAggregator } from "../services/trip-aggregator.js";
import { formatCategoryTitle, formatResultSet } from "../utils/formatting.js";
import { tripFields } from "./plan-trip.js";

export const searchCategorySchema = z.object({
  category: z
    .enum(["flight", "hotel", "activity"])
    .describe("What to search for"),
  ...tripFields,
  limit: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Maximum number of results to show"),
});

export type SearchCategoryInput = z.infer<typeof searchCategorySchema>;

export async function handleSearchCategory(
  input: SearchCategoryInput,
  aggregator: TripAggregator
): Promise<string> {
  const { category, limit, ...query } = input;
  const set = await aggregator.searchCategory(category, query);
  const shown = limit !== undefined ? { ...set, records: set.records.slice(0, limit) } : set;

  const tried = set.attempts
    .map((a) => `${a.source}: ${a.status}${a.added_count > 0 ? ` (+${a.added_count})` : ""}`)
    .join(", ");

  return [
    `## ${formatCategoryTitle(shown)} in ${query.destination_city}\n`,
    formatResultSet(shown),
    tried ? `\n_Sources tried: ${tried}. Result: ${set.state}._` : "",
  ]
    .join("\n")
    .trimEnd();
}
