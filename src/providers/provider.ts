export type SourceName = "amadeus" | "web_search" | "page_scraper";

export const SOURCE_NAMES = ["amadeus", "web_search", "page_scraper"] as const;

export type Category = "flight" | "hotel" | "activity";

export const CATEGORIES = ["flight", "hotel", "activity"] as const;

export type BudgetLevel = "budget" | "moderate" | "luxury";

export type FlightClass = "economy" | "premium_economy" | "business" | "first";

export interface TripQuery {
  origin_city?: string;
  destination_city: string;
  departure_date: string; // YYYY-MM-DD
  return_date: string; // YYYY-MM-DD
  travelers: number;
  budget_level: BudgetLevel;
  accommodation_type?: string;
  flight_class?: FlightClass;
  origin_country?: string;
  destination_country?: string;
}

/** Whatever a source handed back, still in that source's own vocabulary. */
export interface RawRecord {
  source: SourceName;
  category: Category;
  fields: Record<string, unknown>;
}

export interface FlightSegment {
  departure_airport: string;
  arrival_airport: string;
  departure_time: string;
  arrival_time: string;
  flight_number: string;
  airline: string;
}

export interface FlightRecord {
  category: "flight";
  price: number | null;
  currency: string;
  segments: FlightSegment[];
  stops: number;
  source: SourceName;
  cabin_class?: string;
  duration?: string;
}

export interface HotelRecord {
  category: "hotel";
  name: string;
  address: string;
  price: number | null;
  price_text?: string;
  currency?: string;
  rating?: number; // 0-5
  amenities: string[];
  source: SourceName;
  description?: string;
  /** Kind of lodging when the source says: Hotel, Hostel, apartment... */
  type?: string;
  url?: string;
}

export interface ActivityRecord {
  category: "activity";
  name: string;
  description: string;
  rating?: number; // 0-5
  price_range?: string;
  location: string;
  source: SourceName;
  type?: string;
  url?: string;
}

export type NormalizedRecord = FlightRecord | HotelRecord | ActivityRecord;

export interface RecordByCategory {
  flight: FlightRecord;
  hotel: HotelRecord;
  activity: ActivityRecord;
}

export type OrchestrationState =
  | "not_started"
  | "trying_source"
  | "sufficient"
  | "completed"
  | "exhausted"
  | "timed_out";

export interface SourceAttempt {
  source: SourceName;
  status: "ok" | "empty" | "unavailable" | "skipped";
  raw_count: number;
  added_count: number;
  dropped_count: number;
  /** Records left out for missing the traveller's budget or lodging type. */
  filtered_count?: number;
  error?: string;
}

export interface RankedResultSet<C extends Category = Category> {
  category: C;
  records: RecordByCategory[C][];
  contributing_sources: SourceName[];
  suggestions: string[];
  state: OrchestrationState;
  attempts: SourceAttempt[];
}

export interface TravelInfo {
  visa: { requirement: string; description: string };
  advisories: Array<{ source: string; level: string; summary: string }>;
  health: { summary: string; vaccinations: string[] };
  source: string;
}

export interface TripSummary {
  headline: string;
  overview: string;
}

export interface TripPlan {
  query: TripQuery;
  flights: RankedResultSet<"flight">;
  hotels: RankedResultSet<"hotel">;
  activities: RankedResultSet<"activity">;
  travel_info: TravelInfo | null;
  summary: TripSummary;
  suggestions: string[];
  status: "success" | "partial";
  created_at: string; // ISO 8601
}

export interface ISourceAdapter {
  readonly name: SourceName;
  readonly categories: readonly Category[];
  search(category: Category, query: TripQuery): Promise<RawRecord[]>;
  isAvailable(): boolean;
}

export interface ITravelInfoSource {
  readonly name: string;
  lookup(query: TripQuery): Promise<TravelInfo | null>;
  isAvailable(): boolean;
}
