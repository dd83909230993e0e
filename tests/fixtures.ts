import type {
  ActivityRecord,
  FlightRecord,
  HotelRecord,
  TripQuery,
} from "../src/providers/provider.js";

export const PARIS_QUERY: TripQuery = {
  origin_city: "New York",
  destination_city: "Paris",
  departure_date: "2025-06-15",
  return_date: "2025-06-22",
  travelers: 2,
  budget_level: "moderate",
};

export function hotel(overrides: Partial<HotelRecord> = {}): HotelRecord {
  return {
    category: "hotel",
    name: "Hotel",
    address: "Paris",
    price: null,
    amenities: [],
    source: "web_search",
    ...overrides,
  };
}

export function activity(overrides: Partial<ActivityRecord> = {}): ActivityRecord {
  return {
    category: "activity",
    name: "Activity",
    description: "",
    location: "Paris",
    source: "web_search",
    ...overrides,
  };
}

export function flight(
  numbers: string[],
  overrides: Partial<Omit<FlightRecord, "segments" | "stops">> = {},
  departure_time = "2025-06-15T18:30:00Z"
): FlightRecord {
  const segments = numbers.map((flight_number, i) => ({
    departure_airport: i === 0 ? "JFK" : "LHR",
    arrival_airport: i === numbers.length - 1 ? "CDG" : "LHR",
    departure_time,
    arrival_time: "2025-06-16T07:45:00Z",
    flight_number,
    airline: flight_number.slice(0, 2),
  }));
  return {
    category: "flight",
    price: null,
    currency: "USD",
    segments,
    stops: segments.length - 1,
    source: "amadeus",
    ...overrides,
  };
}
