#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config } from "dotenv";

import { loadConfig } from "./config.js";
import { InvalidQuery } from "./errors.js";
import { createServices } from "./setup.js";
import { planTripSchema, handlePlanTrip } from "./tools/plan-trip.js";
import {
  planTripFromTextSchema,
  handlePlanTripFromText,
} from "./tools/plan-trip-from-text.js";
import {
  searchCategorySchema,
  handleSearchCategory,
} from "./tools/search-category.js";

config();

const { aggregator } = createServices(loadConfig());

const server = new McpServer({
  name: "trip-aggregator",
  version: "1.0.0",
});

function errorResult(action: string, err: unknown) {
  const text =
    err instanceof InvalidQuery
      ? `Invalid trip request:\n${err.issues.map((i) => `- ${i}`).join("\n")}`
      : `Error ${action}: ${err instanceof Error ? err.message : String(err)}`;
  return { content: [{ type: "text" as const, text }], isError: true };
}

// Tool 1: plan_trip
server.tool(
  "plan_trip",
  "Plan a trip: ranked flights, hotels and activities merged from several sources (Amadeus, web search, travel sites), plus visa, advisory and health information and suggestions for anything that could not be found.",
  planTripSchema.shape,
  async (input) => {
    try {
      const text = await handlePlanTrip(input, aggregator);
      return { content: [{ type: "text", text }] };
    } catch (err) {
      return errorResult("planning trip", err);
    }
  }
);

// Tool 2: plan_trip_from_text
server.tool(
  "plan_trip_from_text",
  "Plan a trip from a plain-language request such as \"2 adults from Boston to Lisbon, May 3-10, budget\". Cities, dates, travelers, budget, accommodation type and cabin class are read from the text.",
  planTripFromTextSchema.shape,
  async (input) => {
    try {
      const text = await handlePlanTripFromText(input, aggregator);
      return { content: [{ type: "text", text }] };
    } catch (err) {
      return errorResult("planning trip", err);
    }
  }
);

// Tool 3: search_category
server.tool(
  "search_category",
  "Search a single category (flight, hotel or activity) through its source fallback chain and show which sources were tried.",
  searchCategorySchema.shape,
  async (input) => {
    try {
      const text = await handleSearchCategory(input, aggregator);
      return { content: [{ type: "text", text }] };
    } catch (err) {
      return errorResult(`searching ${input.category}`, err);
    }
  }
);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Trip aggregator MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
