import type { BudgetLevel, FlightClass, TripQuery } from "../providers/provider.js";
import { InvalidQuery } from "../errors.js";

const MONTHS: Record<string, number> = {
  january: 1, jan: 1,
  february: 2, feb: 2,
  march: 3, mar: 3,
  april: 4, apr: 4,
  may: 5,
  june: 6, jun: 6,
  july: 7, jul: 7,
  august: 8, aug: 8,
  september: 9, sep: 9, sept: 9,
  october: 10, oct: 10,
  november: 11, nov: 11,
  december: 12, dec: 12,
};

const NUMBER_WORDS: Record<string, number> = {
  one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7, eight: 8, nine: 9, ten: 10,
};

// Capitalised words that start a sentence or a date, never a place.
const NOT_PLACES = new Set([
  "i", "we", "my", "our", "the", "a", "an", "me", "us", "next", "this", "early", "late",
  "mid", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday",
]);

const DAY_MS = 86_400_000;
const MONTH = "\\b([A-Za-z]{3,9})\\.?";
const DAY = "(\\d{1,2})(?:st|nd|rd|th)?";
const YEAR = "(?:,?\\s*(\\d{4}))?";
const PLACE = "([A-Z][\\w'.-]*(?:\\s+[A-Z][\\w'.-]*)*)";

interface DateRange {
  departure: string;
  return: string;
}

/**
 * Best-effort reading of a free-text travel request, e.g.
 * "2 adults from New York to Paris, June 15-22 2025, cheap hostel".
 * Only the destination is mandatory.
 */
export function parseTripQuery(text: string, now: Date = new Date()): TripQuery {
  const destination = findPlace(text, /\bto\s+/g) ?? findPlace(text, /\bin\s+/g);
  if (!destination) {
    throw new InvalidQuery(["could not find a destination city in the request"]);
  }
  const origin = findPlace(text, /\bfrom\s+/g);
  const dates = parseDates(text, now) ?? defaultDates(text, now);
  const flight_class = parseFlightClass(text);
  const accommodation_type = parseAccommodation(text);

  return {
    ...(origin && origin !== destination ? { origin_city: origin } : {}),
    destination_city: destination,
    departure_date: dates.departure,
    return_date: dates.return,
    travelers: parseTravelers(text),
    budget_level: parseBudget(text),
    ...(accommodation_type ? { accommodation_type } : {}),
    ...(flight_class ? { flight_class } : {}),
  };
}

/** First capitalised place name after one of `lead`'s matches, cut at a month or stop word. */
function findPlace(text: string, lead: RegExp): string | null {
  for (const match of text.matchAll(new RegExp(lead.source, "gi"))) {
    const rest = text.slice((match.index ?? 0) + match[0].length);
    const found = new RegExp(`^${PLACE}`).exec(rest);
    if (!found) continue;

    const words: string[] = [];
    for (const word of found[1].split(/\s+/)) {
      const bare = word.replace(/[.,]+$/, "");
      if (MONTHS[bare.toLowerCase()] !== undefined || NOT_PLACES.has(bare.toLowerCase())) break;
      words.push(bare);
      if (bare !== word) break; // trailing punctuation ends the name
    }
    if (words.length > 0) return words.join(" ");
  }
  return null;
}

export function parseDates(text: string, now: Date): DateRange | null {
  const iso = [...text.matchAll(/\b(\d{4})-(\d{2})-(\d{2})\b/g)]
    .map((m) => isoDate(Number(m[1]), Number(m[2]), Number(m[3])))
    .filter((d): d is string => d !== null);
  if (iso.length > 0) {
    return { departure: iso[0], return: iso[1] ?? addDays(iso[0], 7) };
  }

  const us = [...text.matchAll(/\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/g)]
    .map((m) => isoDate(Number(m[3]), Number(m[1]), Number(m[2])))
    .filter((d): d is string => d !== null);
  if (us.length > 0) {
    return { departure: us[0], return: us[1] ?? addDays(us[0], 7) };
  }

  // "June 15 to June 22, 2025", "Dec 28 - Jan 4"
  const twoMonths = firstMatch(
    text,
    `${MONTH}\\s+${DAY}${YEAR}\\s*(?:to|until|through|till|-|–)\\s*${MONTH}\\s+${DAY}${YEAR}`,
    ([, m1, d1, y1, m2, d2, y2]) => monthRange(now, m1, d1, y1 ?? y2, m2, d2, y2)
  );
  if (twoMonths) return twoMonths;

  // "June 15-22, 2025"
  const sameMonth = firstMatch(
    text,
    `${MONTH}\\s+${DAY}\\s*(?:-|–|to)\\s*${DAY}${YEAR}`,
    ([, m, d1, d2, y]) => monthRange(now, m, d1, y, m, d2, y)
  );
  if (sameMonth) return sameMonth;

  // "June 15, 2025": a week from that day unless a length is given
  return firstMatch(text, `${MONTH}\\s+${DAY}${YEAR}`, ([, m, d, y]) => {
    const month = MONTHS[m.toLowerCase()];
    if (month === undefined) return null;
    const departure = resolveYear(now, month, Number(d), y);
    return departure ? { departure, return: addDays(departure, tripLength(text) ?? 7) } : null;
  });
}

/** The first match of `pattern` that `read` accepts. */
function firstMatch<T>(
  text: string,
  pattern: string,
  read: (groups: RegExpMatchArray) => T | null
): T | null {
  for (const match of text.matchAll(new RegExp(pattern, "gi"))) {
    const value = read(match);
    if (value !== null) return value;
  }
  return null;
}

function monthRange(
  now: Date,
  m1: string,
  d1: string,
  y1: string | undefined,
  m2: string,
  d2: string,
  y2: string | undefined
): DateRange | null {
  const start = MONTHS[m1.toLowerCase()];
  const end = MONTHS[m2.toLowerCase()];
  if (start === undefined || end === undefined) return null;

  const departure = resolveYear(now, start, Number(d1), y1);
  if (!departure) return null;
  let ret = isoDate(y2 ? Number(y2) : Number(departure.slice(0, 4)), end, Number(d2));
  if (!ret) return null;
  // "Dec 28 - Jan 4" crosses into the next year
  if (!y2 && ret < departure) ret = isoDate(Number(departure.slice(0, 4)) + 1, end, Number(d2));
  return ret ? { departure, return: ret } : null;
}

/** The given year, or the next time that month/day comes round after `now`. */
function resolveYear(now: Date, month: number, day: number, year?: string): string | null {
  if (year) return isoDate(Number(year), month, day);
  const today = now.toISOString().slice(0, 10);
  const thisYear = isoDate(now.getUTCFullYear(), month, day);
  if (thisYear && thisYear >= today) return thisYear;
  return isoDate(now.getUTCFullYear() + 1, month, day);
}

function defaultDates(text: string, now: Date): DateRange {
  const departure = addDays(now.toISOString().slice(0, 10), 30);
  return { departure, return: addDays(departure, tripLength(text) ?? 7) };
}

function tripLength(text: string): number | null {
  const days = /\b(\d{1,2})\s*(?:days?|nights?)\b/i.exec(text);
  if (days) return Number(days[1]);
  const weeks = /\b(a|one|two|three|\d)\s+weeks?\b/i.exec(text);
  if (weeks) {
    const n = weeks[1].toLowerCase() === "a" ? 1 : NUMBER_WORDS[weeks[1].toLowerCase()] ?? Number(weeks[1]);
    return n * 7;
  }
  return null;
}

export function parseTravelers(text: string): number {
  const counted =
    /\b(\d{1,2}|one|two|three|four|five|six|seven|eight|nine|ten)\s+(?:adults?|people|persons|travell?ers|guests|passengers)\b/i.exec(
      text
    );
  if (counted) {
    const word = counted[1].toLowerCase();
    const n = NUMBER_WORDS[word] ?? Number(word);
    if (n >= 1) return n;
  }
  if (/\b(?:couple|two of us|my (?:wife|husband|partner))\b/i.test(text)) return 2;
  return 1;
}

export function parseBudget(text: string): BudgetLevel {
  const t = text.toLowerCase().replace(/premium economy/g, "");
  if (/\b(?:luxury|luxurious|upscale|premium|5[- ]star|five[- ]star)\b/.test(t)) return "luxury";
  if (/\b(?:cheap|budget|affordable|inexpensive|low[- ]cost|backpack\w*)\b/.test(t)) return "budget";
  return "moderate";
}

export function parseFlightClass(text: string): FlightClass | undefined {
  const t = text.toLowerCase();
  if (/premium economy/.test(t)) return "premium_economy";
  if (/\bbusiness class\b|\bflying business\b/.test(t)) return "business";
  if (/\bfirst class\b/.test(t)) return "first";
  if (/\beconomy\b/.test(t)) return "economy";
  return undefined;
}

function parseAccommodation(text: string): string | undefined {
  const m =
    /\b(hostel|apartment|resort|villa|guest ?house|bed and breakfast|b&b|motel|boutique hotel)s?\b/i.exec(
      text
    );
  if (!m) return undefined;
  const kind = m[1].toLowerCase();
  if (kind === "b&b") return "bed and breakfast";
  return kind.replace("guest house", "guesthouse");
}

function isoDate(year: number, month: number, day: number): string | null {
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return d.toISOString().slice(0, 10);
}

function addDays(date: string, days: number): string {
  return new Date(Date.parse(`${date}T00:00:00Z`) + days * DAY_MS).toISOString().slice(0, 10);
}
