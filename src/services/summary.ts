import type {
  ActivityRecord,
  FlightRecord,
  HotelRecord,
  TripQuery,
  TripSummary,
} from "../providers/provider.js";

export interface SummaryParts {
  query: TripQuery;
  flight?: FlightRecord;
  hotel?: HotelRecord;
  activity?: ActivityRecord;
}

export function buildSummary({ query, flight, hotel, activity }: SummaryParts): TripSummary {
  const headline = `Trip to ${query.destination_city}`;
  const sentences: string[] = [];

  const nights = nightsBetween(query.departure_date, query.return_date);
  const length = nights !== null ? `${nights}-night trip` : "Trip";
  const who = query.travelers === 1 ? "1 traveler" : `${query.travelers} travelers`;
  const from = query.origin_city ? ` from ${query.origin_city}` : "";
  sentences.push(
    `${length}${from} to ${query.destination_city}, ${query.departure_date} to ${query.return_date}, for ${who}.`
  );

  if (flight) sentences.push(`Best flight: ${describeFlight(flight)}.`);
  if (hotel) sentences.push(`Top hotel: ${describeHotel(hotel)}.`);
  if (activity) sentences.push(`Top activity: ${describeActivity(activity)}.`);
  if (!flight && !hotel && !activity) {
    sentences.push("No flights, hotels or activities could be found for this trip yet.");
  }

  return { headline, overview: sentences.join(" ") };
}

export function describeFlight(f: FlightRecord): string {
  const first = f.segments[0];
  const last = f.segments[f.segments.length - 1];
  const stops = f.stops === 0 ? "nonstop" : f.stops === 1 ? "1 stop" : `${f.stops} stops`;
  const price = f.price !== null ? `${f.currency} ${f.price.toFixed(2)}` : "price unknown";
  return `${first.airline} ${first.departure_airport} → ${last.arrival_airport}, ${stops}, ${price}`;
}

function describeHotel(h: HotelRecord): string {
  const parts = [h.name];
  if (h.rating !== undefined) parts.push(`rated ${h.rating}/5`);
  if (h.price !== null) {
    parts.push(h.price_text ?? `${h.currency ?? ""} ${h.price.toFixed(2)}`.trim());
  }
  return parts.join(", ");
}

function describeActivity(a: ActivityRecord): string {
  return a.rating !== undefined ? `${a.name}, rated ${a.rating}/5` : a.name;
}

export function nightsBetween(departure: string, ret: string): number | null {
  const start = Date.parse(`${departure}T00:00:00Z`);
  const end = Date.parse(`${ret}T00:00:00Z`);
  if (Number.isNaN(start) || Number.isNaN(end) || end <= start) return null;
  return Math.round((end - start) / 86_400_000);
}
