import { describe, expect, it } from "vitest";
import { buildSummary, describeFlight, nightsBetween } from "../src/services/summary.js";
import { PARIS_QUERY, flight, hotel } from "./fixtures.js";

describe("buildSummary", () => {
  it("says so when nothing was found", () => {
    expect(buildSummary({ query: { ...PARIS_QUERY, travelers: 1 } })).toEqual({
      headline: "Trip to Paris",
      overview:
        "7-night trip from New York to Paris, 2025-06-15 to 2025-06-22, for 1 traveler. " +
        "No flights, hotels or activities could be found for this trip yet.",
    });
  });

  it("formats a hotel price when no price text was given", () => {
    const { overview } = buildSummary({
      query: PARIS_QUERY,
      hotel: hotel({ name: "Hotel Bleu", price: 99.5, currency: "GBP" }),
    });
    expect(overview).toBe(
      "7-night trip from New York to Paris, 2025-06-15 to 2025-06-22, for 2 travelers. " +
        "Top hotel: Hotel Bleu, GBP 99.50."
    );
  });
});

describe("describeFlight", () => {
  it("counts stops and shows the price", () => {
    expect(describeFlight(flight(["BA178", "BA304"], { price: 500 }))).toBe("BA JFK → CDG, 1 stop, USD 500.00");
    expect(describeFlight(flight(["LH1", "LH2", "LH3"]))).toBe("LH JFK → CDG, 2 stops, price unknown");
  });
});

describe("nightsBetween", () => {
  it("counts nights between two dates", () => {
    expect(nightsBetween("2025-06-15", "2025-06-22")).toBe(7);
    expect(nightsBetween("2025-10-25", "2025-10-27")).toBe(2);
  });

  it("returns null for reversed, equal or invalid dates", () => {
    expect(nightsBetween("2025-06-22", "2025-06-15")).toBeNull();
    expect(nightsBetween("2025-06-15", "2025-06-15")).toBeNull();
    expect(nightsBetween("soon", "2025-06-15")).toBeNull();
  });
});
