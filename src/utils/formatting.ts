import type {
  ActivityRecord,
  FlightRecord,
  HotelRecord,
  RankedResultSet,
  TravelInfo,
  TripPlan,
} from "../providers/provider.js";
import { CATEGORY_PLURAL } from "../services/orchestrator.js";

export function formatFlightsTable(flights: FlightRecord[]): string {
  if (flights.length === 0) return "No flights found.";

  const lines: string[] = [];
  lines.push(`Found **${flights.length}** flights:\n`);
  lines.push("| # | Price | Airline | Flights | Route | Departure | Arrival | Stops | Source |");
  lines.push("|---|-------|---------|---------|-------|-----------|---------|-------|--------|");

  for (let i = 0; i < flights.length; i++) {
    const f = flights[i];
    const first = f.segments[0];
    const last = f.segments[f.segments.length - 1];
    const route = [first.departure_airport, ...f.segments.map((s) => s.arrival_airport)].join("→");
    const numbers = f.segments.map((s) => s.flight_number).filter(Boolean).join(", ") || "-";

    lines.push(
      `| ${i + 1} | **${formatPrice(f.price, f.currency)}** | ${cell(first.airline)} | ${cell(numbers)} | ${route} | ${formatDateTime(first.departure_time)} | ${formatDateTime(last.arrival_time)} | ${f.stops} | ${f.source} |`
    );
  }

  return lines.join("\n");
}

export function formatHotelsTable(hotels: HotelRecord[]): string {
  if (hotels.length === 0) return "No hotels found.";

  const lines: string[] = [];
  lines.push(`Found **${hotels.length}** hotels:\n`);
  lines.push("| # | Hotel | Rating | Price | Address | Amenities | Source |");
  lines.push("|---|-------|--------|-------|---------|-----------|--------|");

  for (let i = 0; i < hotels.length; i++) {
    const h = hotels[i];
    const name = h.url ? `[${cell(h.name)}](${h.url})` : cell(h.name);
    const price = h.price_text ?? formatPrice(h.price, h.currency);
    const amenities = h.amenities.slice(0, 4).join(", ") || "-";

    lines.push(
      `| ${i + 1} | **${name}** | ${formatRating(h.rating)} | ${cell(price)} | ${cell(h.address || "-")} | ${cell(amenities)} | ${h.source} |`
    );
  }

  return lines.join("\n");
}

export function formatActivitiesTable(activities: ActivityRecord[]): string {
  if (activities.length === 0) return "No activities found.";

  const lines: string[] = [];
  lines.push(`Found **${activities.length}** activities:\n`);
  lines.push("| # | Activity | Rating | Price | Location | Source |");
  lines.push("|---|----------|--------|-------|----------|--------|");

  for (let i = 0; i < activities.length; i++) {
    const a = activities[i];
    const name = a.url ? `[${cell(a.name)}](${a.url})` : cell(a.name);

    lines.push(
      `| ${i + 1} | **${name}** | ${formatRating(a.rating)} | ${cell(a.price_range ?? "-")} | ${cell(a.location || "-")} | ${a.source} |`
    );
  }

  return lines.join("\n");
}

export function formatTravelInfo(info: TravelInfo | null): string {
  if (!info) return "No travel information found.";

  const lines: string[] = [];
  lines.push(`**Visa:** ${info.visa.requirement}`);
  if (info.visa.description) lines.push(info.visa.description);

  if (info.advisories.length > 0) {
    lines.push("\n**Advisories:**");
    for (const a of info.advisories) {
      lines.push(`- ${a.source}: ${a.level}${a.summary ? `. ${a.summary}` : ""}`);
    }
  }

  if (info.health.summary || info.health.vaccinations.length > 0) {
    lines.push(`\n**Health:** ${info.health.summary}`.trimEnd());
    if (info.health.vaccinations.length > 0) {
      lines.push(`Vaccinations: ${info.health.vaccinations.join(", ")}`);
    }
  }
  return lines.join("\n");
}

export function formatResultSet(set: RankedResultSet): string {
  let table: string;
  switch (set.category) {
    case "flight":
      table = formatFlightsTable(set.records.filter(isFlight));
      break;
    case "hotel":
      table = formatHotelsTable(set.records.filter(isHotel));
      break;
    default:
      table = formatActivitiesTable(set.records.filter(isActivity));
  }

  const lines = [table];
  if (set.contributing_sources.length > 0) {
    lines.push(`\n_Sources: ${set.contributing_sources.join(", ")}_`);
  }
  for (const s of set.suggestions) lines.push(`\n> ${s}`);
  return lines.join("\n");
}

export function formatTripPlan(plan: TripPlan): string {
  const lines: string[] = [];
  lines.push(`# ${plan.summary.headline}\n`);
  lines.push(plan.summary.overview);
  lines.push(`\n_Status: ${plan.status}_`);

  if (plan.query.origin_city) {
    lines.push(`\n## Flights\n`);
    lines.push(formatFlightsTable(plan.flights.records));
  }
  lines.push(`\n## Hotels\n`);
  lines.push(formatHotelsTable(plan.hotels.records));
  if (plan.activities.state !== "not_started") {
    lines.push(`\n## Activities\n`);
    lines.push(formatActivitiesTable(plan.activities.records));
  }
  lines.push(`\n## Travel information\n`);
  lines.push(formatTravelInfo(plan.travel_info));

  if (plan.suggestions.length > 0) {
    lines.push(`\n## Suggestions\n`);
    for (const s of plan.suggestions) lines.push(`- ${s}`);
  }
  return lines.join("\n");
}

export function formatCategoryTitle(set: RankedResultSet): string {
  const title = CATEGORY_PLURAL[set.category];
  return title.charAt(0).toUpperCase() + title.slice(1);
}

function formatPrice(price: number | null, currency?: string): string {
  if (price === null) return "N/A";
  return currency ? `${price} ${currency}` : String(price);
}

function formatRating(rating?: number): string {
  return rating === undefined ? "-" : `${rating}/5`;
}

/** Times are shown as the source gave them, local to the airport. */
function formatDateTime(iso: string): string {
  const m = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2})/.exec(iso);
  return m ? `${m[1]} ${m[2]}` : iso;
}

/** Pipes and newlines would break the markdown row. */
function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\s*\n\s*/g, " ");
}

function isFlight(r: FlightRecord | HotelRecord | ActivityRecord): r is FlightRecord {
  return r.category === "flight";
}

function isHotel(r: FlightRecord | HotelRecord | ActivityRecord): r is HotelRecord {
  return r.category === "hotel";
}

function isActivity(r: FlightRecord | HotelRecord | ActivityRecord): r is ActivityRecord {
  return r.category === "activity";
}
