import { z } from "zod";
import type {
  ActivityRecord,
  Category,
  FlightRecord,
  FlightSegment,
  HotelRecord,
  RawRecord,
  RecordByCategory,
  SourceName,
} from "../providers/provider.js";

const CURRENCY_SYMBOLS = new Map([
  ["US$", "USD"],
  ["$", "USD"],
  ["€", "EUR"],
  ["£", "GBP"],
  ["¥", "JPY"],
  ["₹", "INR"],
  ["zł", "PLN"],
  ["CHF", "CHF"],
]);

const CURRENCY_CODES = new Set([
  "USD", "EUR", "GBP", "JPY", "INR", "PLN", "CHF", "CAD", "AUD", "NZD",
  "CNY", "HKD", "SGD", "AED", "THB", "SEK", "NOK", "DKK", "CZK", "HUF",
  "MXN", "BRL", "ZAR", "KRW", "TRY",
]);

export interface ParsedPrice {
  amount: number | null;
  currency?: string;
}

/**
 * "USD 842.50" -> 842.5 USD, "€1,250" -> 1250 EUR, "" -> null.
 * A missing amount stays null: zero is a real price, absence is not.
 */
export function parsePrice(
  value: string | number | null | undefined,
  fallback_currency?: string
): ParsedPrice {
  if (typeof value === "number") {
    return Number.isFinite(value)
      ? { amount: value, currency: fallback_currency }
      : { amount: null, currency: fallback_currency };
  }
  if (value === null || value === undefined) {
    return { amount: null, currency: fallback_currency };
  }

  const text = value.trim();
  const currency = findCurrency(text) ?? fallback_currency;
  const match = text.match(/\d[\d,]*(?:\.\d+)?/);
  if (!match) return { amount: null, currency };

  const amount = Number(match[0].replace(/,/g, ""));
  return { amount: Number.isFinite(amount) ? amount : null, currency };
}

function findCurrency(text: string): string | undefined {
  for (const token of text.match(/[A-Z]{3}/g) ?? []) {
    if (CURRENCY_CODES.has(token)) return token;
  }
  for (const [symbol, code] of CURRENCY_SYMBOLS) {
    if (text.includes(symbol)) return code;
  }
  return undefined;
}

/**
 * Ratings end up on a 0-5 scale. "8.5/10" -> 4.25, "4 stars" -> 4,
 * a bare number above 5 is read as out of 10.
 */
export function parseRating(
  value: string | number | null | undefined,
  best?: number
): number | undefined {
  if (value === null || value === undefined || value === "") return undefined;

  let score: number;
  let scale = best;
  if (typeof value === "number") {
    score = value;
  } else {
    const ratio = value.match(/(\d+(?:\.\d+)?)\s*\/\s*(\d+(?:\.\d+)?)/);
    if (ratio) {
      score = Number(ratio[1]);
      scale = Number(ratio[2]);
    } else {
      const num = value.match(/\d+(?:\.\d+)?/);
      if (!num) return undefined;
      score = Number(num[0]);
    }
  }

  if (!Number.isFinite(score) || score < 0) return undefined;
  if (scale === undefined) scale = score > 5 ? 10 : 5;
  if (!(scale > 0) || score > scale) return undefined;
  return Math.round((score / scale) * 5 * 100) / 100;
}

// Shared field readers. LLM output likes nulls, so everything is nullish.
const text = z
  .string()
  .nullish()
  .transform((v) => (v ?? "").trim());
const optionalText = z
  .string()
  .nullish()
  .transform((v) => {
    const t = v?.trim();
    return t ? t : undefined;
  });
const priceValue = z.union([z.string(), z.number()]).nullish();
const ratingValue = z.union([z.string(), z.number()]).nullish();
const stringList = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((v) => {
    if (!v) return [];
    const items = typeof v === "string" ? v.split(",") : v;
    return items.map((s) => s.trim()).filter((s) => s.length > 0);
  });

const ldRating = z
  .object({
    ratingValue: ratingValue,
    bestRating: z.union([z.string(), z.number()]).nullish(),
  })
  .nullish();

const ldAddress = z
  .union([
    z.string(),
    z.object({
      streetAddress: text,
      postalCode: text,
      addressLocality: text,
      addressCountry: z
        .union([z.string(), z.object({ name: text })])
        .nullish(),
    }),
  ])
  .nullish();

const ldOffers = z
  .union([
    z.object({ price: priceValue, priceCurrency: optionalText }),
    z.array(z.object({ price: priceValue, priceCurrency: optionalText })),
  ])
  .nullish();

type Mapper<C extends Category> = (
  fields: Record<string, unknown>,
  source: SourceName
) => RecordByCategory[C] | null;

// amadeus ---------------------------------------------------------------

const amadeusFlightFields = z.object({
  price: z
    .object({ total: priceValue, currency: optionalText })
    .nullish(),
  itineraries: z
    .array(
      z.object({
        duration: optionalText,
        segments: z.array(
          z.object({
            carrierCode: text,
            number: text,
            departure: z.object({ iataCode: text, at: text }),
            arrival: z.object({ iataCode: text, at: text }),
          })
        ),
      })
    )
    .default([]),
  travelerPricings: z
    .array(
      z.object({
        fareDetailsBySegment: z
          .array(z.object({ cabin: optionalText }))
          .default([]),
      })
    )
    .default([]),
});

const amadeusFlight: Mapper<"flight"> = (fields, source) => {
  const parsed = amadeusFlightFields.safeParse(fields);
  if (!parsed.success) return null;
  const offer = parsed.data;

  // Outbound and return legs together, in travel order.
  const segments = offer.itineraries.flatMap((it) =>
    it.segments.map((s) => ({
      departure_airport: s.departure.iataCode,
      arrival_airport: s.arrival.iataCode,
      departure_time: s.departure.at,
      arrival_time: s.arrival.at,
      flight_number: `${s.carrierCode}${s.number}`,
      airline: s.carrierCode,
    }))
  );
  const price = parsePrice(offer.price?.total, offer.price?.currency ?? "USD");

  return flightRecord(source, price, segments, {
    cabin_class:
      offer.travelerPricings[0]?.fareDetailsBySegment[0]?.cabin,
    duration: offer.itineraries[0]?.duration,
  });
};

const amadeusHotelFields = z.object({
  hotel: z.object({
    name: text,
    rating: ratingValue,
    amenities: stringList,
    address: z
      .object({
        lines: z.array(z.string()).nullish(),
        postalCode: text,
        cityName: text,
        countryCode: text,
      })
      .nullish(),
  }),
  offers: z
    .array(
      z.object({
        price: z
          .object({ total: priceValue, currency: optionalText })
          .nullish(),
      })
    )
    .default([]),
});

const amadeusHotel: Mapper<"hotel"> = (fields, source) => {
  const parsed = amadeusHotelFields.safeParse(fields);
  if (!parsed.success) return null;
  const { hotel, offers } = parsed.data;
  const offerPrice = offers[0]?.price;
  const address = hotel.address;

  return hotelRecord(source, {
    name: hotel.name,
    address: joinParts([
      ...(address?.lines ?? []),
      address?.postalCode,
      address?.cityName,
      address?.countryCode,
    ]),
    price: parsePrice(offerPrice?.total, offerPrice?.currency),
    rating: parseRating(hotel.rating, 5),
    amenities: hotel.amenities.slice(0, 5),
  });
};

// web_search (LLM extraction) -------------------------------------------

const webFlightFields = z.object({
  price: priceValue,
  currency: optionalText,
  airline: text,
  cabin_class: optionalText,
  segments: z
    .array(
      z.object({
        departure_airport: text,
        arrival_airport: text,
        departure_time: text,
        arrival_time: text,
        flight_number: text,
        airline: optionalText,
      })
    )
    .nullish()
    .transform((v) => v ?? []),
});

const webFlight: Mapper<"flight"> = (fields, source) => {
  const parsed = webFlightFields.safeParse(fields);
  if (!parsed.success) return null;
  const f = parsed.data;
  const segments = f.segments.map((s) => ({
    departure_airport: s.departure_airport,
    arrival_airport: s.arrival_airport,
    departure_time: s.departure_time,
    arrival_time: s.arrival_time,
    flight_number: s.flight_number,
    airline: s.airline ?? f.airline,
  }));
  return flightRecord(source, parsePrice(f.price, f.currency), segments, {
    cabin_class: f.cabin_class,
  });
};

const webHotelFields = z.object({
  name: text,
  location: text,
  stars: ratingValue,
  price_range: priceValue,
  currency: optionalText,
  amenities: stringList,
  description: optionalText,
  guest_rating: ratingValue,
  type: optionalText,
  url: optionalText,
});

const webHotel: Mapper<"hotel"> = (fields, source) => {
  const parsed = webHotelFields.safeParse(fields);
  if (!parsed.success) return null;
  const h = parsed.data;
  return hotelRecord(source, {
    name: h.name,
    address: h.location,
    price: parsePrice(h.price_range, h.currency),
    price_text: typeof h.price_range === "string" ? h.price_range.trim() : undefined,
    // Guest score first; star class only when nobody reviewed it.
    rating: parseRating(h.guest_rating) ?? parseRating(h.stars, 5),
    amenities: h.amenities.slice(0, 5),
    description: h.description,
    type: h.type,
    url: h.url,
  });
};

const webActivityFields = z.object({
  name: text,
  description: text,
  location: text,
  type: optionalText,
  price_range: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v === null || v === undefined ? undefined : String(v).trim() || undefined)),
  rating: ratingValue,
  url: optionalText,
});

const webActivity: Mapper<"activity"> = (fields, source) => {
  const parsed = webActivityFields.safeParse(fields);
  if (!parsed.success) return null;
  const a = parsed.data;
  return activityRecord(source, {
    name: a.name,
    description: a.description,
    location: a.location,
    type: a.type,
    price_range: a.price_range,
    rating: parseRating(a.rating),
    url: a.url,
  });
};

// page_scraper (schema.org JSON-LD) -------------------------------------

const ldHotelFields = z.object({
  "@type": z.union([z.string(), z.array(z.string())]).nullish(),
  name: text,
  description: optionalText,
  url: optionalText,
  address: ldAddress,
  priceRange: priceValue,
  aggregateRating: ldRating,
  starRating: ldRating,
  amenityFeature: z
    .array(z.union([z.string(), z.object({ name: text })]))
    .nullish(),
});

const ldHotel: Mapper<"hotel"> = (fields, source) => {
  const parsed = ldHotelFields.safeParse(fields);
  if (!parsed.success) return null;
  const h = parsed.data;
  return hotelRecord(source, {
    name: h.name,
    address: formatLdAddress(h.address),
    price: parsePrice(h.priceRange),
    price_text: typeof h.priceRange === "string" ? h.priceRange.trim() : undefined,
    rating: ldRatingValue(h.aggregateRating) ?? ldRatingValue(h.starRating),
    amenities: (h.amenityFeature ?? [])
      .map((a) => (typeof a === "string" ? a.trim() : a.name))
      .filter((a) => a.length > 0)
      .slice(0, 5),
    description: h.description,
    type: Array.isArray(h["@type"]) ? h["@type"][0] : h["@type"] ?? undefined,
    url: h.url,
  });
};

const ldActivityFields = z.object({
  "@type": z.union([z.string(), z.array(z.string())]).nullish(),
  name: text,
  description: text,
  url: optionalText,
  address: ldAddress,
  location: z
    .union([z.string(), z.object({ name: text, address: ldAddress })])
    .nullish(),
  priceRange: priceValue,
  offers: ldOffers,
  aggregateRating: ldRating,
});

const ldActivity: Mapper<"activity"> = (fields, source) => {
  const parsed = ldActivityFields.safeParse(fields);
  if (!parsed.success) return null;
  const a = parsed.data;

  let location = formatLdAddress(a.address);
  if (!location && a.location) {
    location =
      typeof a.location === "string"
        ? a.location.trim()
        : a.location.name || formatLdAddress(a.location.address);
  }

  const offer = Array.isArray(a.offers) ? a.offers[0] : a.offers;
  let price_range: string | undefined;
  if (a.priceRange !== null && a.priceRange !== undefined) {
    price_range = String(a.priceRange).trim() || undefined;
  } else if (offer && offer.price !== null && offer.price !== undefined) {
    price_range = [offer.priceCurrency, String(offer.price)].filter(Boolean).join(" ");
  }

  const ldType = Array.isArray(a["@type"]) ? a["@type"][0] : a["@type"];
  return activityRecord(source, {
    name: a.name,
    description: a.description,
    location,
    type: ldType ?? undefined,
    price_range,
    rating: ldRatingValue(a.aggregateRating),
    url: a.url,
  });
};

// -----------------------------------------------------------------------

const MAPPERS: {
  [S in SourceName]: { [C in Category]?: Mapper<C> };
} = {
  amadeus: { flight: amadeusFlight, hotel: amadeusHotel },
  web_search: { flight: webFlight, hotel: webHotel, activity: webActivity },
  page_scraper: { hotel: ldHotel, activity: ldActivity },
};

/**
 * Map one source record into the canonical shape for its category.
 * Returns null when a mandatory field is missing or a field has the wrong type.
 */
export function normalize<C extends Category>(
  category: C,
  raw: RawRecord
): RecordByCategory[C] | null {
  if (raw.category !== category) return null;
  const mapper: Mapper<C> | undefined = MAPPERS[raw.source][category];
  if (!mapper) return null;
  return mapper(raw.fields, raw.source);
}

export function normalizeAll<C extends Category>(
  category: C,
  raws: RawRecord[]
): { records: RecordByCategory[C][]; dropped: number } {
  const records: RecordByCategory[C][] = [];
  let dropped = 0;
  for (const raw of raws) {
    const record = normalize(category, raw);
    if (record) records.push(record);
    else dropped++;
  }
  if (dropped > 0) {
    console.error(
      `[normalizer] dropped ${dropped}/${raws.length} malformed ${category} records`
    );
  }
  return { records, dropped };
}

function flightRecord(
  source: SourceName,
  price: ParsedPrice,
  segments: FlightSegment[],
  extras: { cabin_class?: string; duration?: string }
): FlightRecord | null {
  if (segments.length === 0) return null;
  if (segments.some((s) => !s.departure_airport || !s.arrival_airport)) {
    return null;
  }
  return {
    category: "flight",
    price: price.amount,
    currency: price.currency ?? "USD",
    segments,
    stops: segments.length - 1,
    source,
    ...(extras.cabin_class ? { cabin_class: extras.cabin_class } : {}),
    ...(extras.duration ? { duration: extras.duration } : {}),
  };
}

function hotelRecord(
  source: SourceName,
  h: {
    name: string;
    address: string;
    price: ParsedPrice;
    price_text?: string;
    rating?: number;
    amenities: string[];
    description?: string;
    type?: string;
    url?: string;
  }
): HotelRecord | null {
  if (!h.name) return null;
  const record: HotelRecord = {
    category: "hotel",
    name: h.name,
    address: h.address,
    price: h.price.amount,
    amenities: h.amenities,
    source,
  };
  if (h.price_text) record.price_text = h.price_text;
  if (h.price.currency) record.currency = h.price.currency;
  if (h.rating !== undefined) record.rating = h.rating;
  if (h.description) record.description = h.description;
  if (h.type) record.type = h.type;
  if (h.url) record.url = h.url;
  return record;
}

function activityRecord(
  source: SourceName,
  a: Omit<ActivityRecord, "category" | "source">
): ActivityRecord | null {
  if (!a.name) return null;
  const record: ActivityRecord = {
    category: "activity",
    name: a.name,
    description: a.description,
    location: a.location,
    source,
  };
  if (a.rating !== undefined) record.rating = a.rating;
  if (a.price_range) record.price_range = a.price_range;
  if (a.type) record.type = a.type;
  if (a.url) record.url = a.url;
  return record;
}

function ldRatingValue(
  rating: z.infer<typeof ldRating>
): number | undefined {
  if (!rating) return undefined;
  const best =
    rating.bestRating === null || rating.bestRating === undefined
      ? undefined
      : Number(rating.bestRating);
  return parseRating(rating.ratingValue, Number.isFinite(best) ? best : undefined);
}

function formatLdAddress(address: z.infer<typeof ldAddress>): string {
  if (!address) return "";
  if (typeof address === "string") return address.trim();
  const country =
    typeof address.addressCountry === "string"
      ? address.addressCountry
      : address.addressCountry?.name;
  return joinParts([
    address.streetAddress,
    address.postalCode,
    address.addressLocality,
    country,
  ]);
}

function joinParts(parts: Array<string | null | undefined>): string {
  return parts
    .map((p) => p?.trim() ?? "")
    .filter((p) => p.length > 0)
    .join(", ");
}
