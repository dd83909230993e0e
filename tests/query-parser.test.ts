import { describe, expect, it } from "vitest";
import { InvalidQuery } from "../src/errors.js";
import {
  parseBudget,
  parseFlightClass,
  parseTravelers,
  parseTripQuery,
} from "../src/services/query-parser.js";

const NOW = new Date("2025-03-01T12:00:00Z");

describe("parseTripQuery", () => {
  it("reads cities, a same-month range, travelers, budget and stay type", () => {
    expect(parseTripQuery("2 adults from New York to Paris, June 15-22 2025, cheap hostel", NOW)).toEqual({
      origin_city: "New York",
      destination_city: "Paris",
      departure_date: "2025-06-15",
      return_date: "2025-06-22",
      travelers: 2,
      budget_level: "budget",
      accommodation_type: "hostel",
    });
  });

  it("reads a start date plus a trip length", () => {
    expect(
      parseTripQuery(
        "Two people flying business class from London to Tokyo, luxury resort, 10 days starting October 3",
        NOW
      )
    ).toEqual({
      origin_city: "London",
      destination_city: "Tokyo",
      departure_date: "2025-10-03",
      return_date: "2025-10-13",
      travelers: 2,
      budget_level: "luxury",
      accommodation_type: "resort",
      flight_class: "business",
    });
  });

  it("reads numeric US dates", () => {
    expect(parseTripQuery("Family of 4 travelers to Lisbon 07/01/2025 - 07/08/2025 economy", NOW)).toEqual({
      destination_city: "Lisbon",
      departure_date: "2025-07-01",
      return_date: "2025-07-08",
      travelers: 4,
      budget_level: "moderate",
      flight_class: "economy",
    });
  });

  it("defaults to a trip a month out", () => {
    expect(parseTripQuery("Weekend in Rome for 3 nights", NOW)).toEqual({
      destination_city: "Rome",
      departure_date: "2025-03-31",
      return_date: "2025-04-03",
      travelers: 1,
      budget_level: "moderate",
    });
  });

  it("rolls a date that has passed into next year", () => {
    const query = parseTripQuery("Ski trip to Oslo Jan 10 - Jan 14", NOW);
    expect(query.destination_city).toBe("Oslo");
    expect([query.departure_date, query.return_date]).toEqual(["2026-01-10", "2026-01-14"]);
  });

  it("carries a range across new year", () => {
    const query = parseTripQuery("Flying to Berlin Dec 28 to Jan 4", NOW);
    expect(query.destination_city).toBe("Berlin");
    expect([query.departure_date, query.return_date]).toEqual(["2025-12-28", "2026-01-04"]);
  });

  it("takes ISO dates as given", () => {
    const query = parseTripQuery("From Boston to Madrid 2025-05-03 until 2025-05-10", NOW);
    expect(query).toMatchObject({
      origin_city: "Boston",
      destination_city: "Madrid",
      departure_date: "2025-05-03",
      return_date: "2025-05-10",
    });
  });

  it("fails without a destination", () => {
    expect(() => parseTripQuery("Take me to the beach", NOW)).toThrow(InvalidQuery);
    let err: unknown;
    try {
      parseTripQuery("somewhere warm please", NOW);
    } catch (e) {
      err = e;
    }
    expect(err).toHaveProperty("issues", ["could not find a destination city in the request"]);
  });
});

describe("parseTravelers", () => {
  it("reads counts, number words and couples", () => {
    expect(parseTravelers("3 guests")).toBe(3);
    expect(parseTravelers("five passengers")).toBe(5);
    expect(parseTravelers("a couple getaway")).toBe(2);
    expect(parseTravelers("solo trip")).toBe(1);
  });
});

describe("parseBudget", () => {
  it("does not mistake premium economy for luxury", () => {
    expect(parseBudget("premium economy to Rome")).toBe("moderate");
    expect(parseBudget("a five-star stay")).toBe("luxury");
    expect(parseBudget("low-cost options")).toBe("budget");
  });
});

describe("parseFlightClass", () => {
  it("reads cabin classes", () => {
    expect(parseFlightClass("premium economy to Rome")).toBe("premium_economy");
    expect(parseFlightClass("first class please")).toBe("first");
    expect(parseFlightClass("any seat")).toBeUndefined();
  });
});
