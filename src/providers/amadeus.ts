import type {
  Category,
  ISourceAdapter,
  RawRecord,
  TripQuery,
} from "./provider.js";
import { HttpError } from "../errors.js";
import { TTLCache } from "../services/cache.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import { Retrier, type RetrierOptions } from "../utils/retrier.js";
import { staticCityCode } from "../utils/city-codes.js";

const TRAVEL_CLASS = {
  economy: "ECONOMY",
  premium_economy: "PREMIUM_ECONOMY",
  business: "BUSINESS",
  first: "FIRST",
} as const;

const HOTEL_BATCH = 20;

export interface AmadeusOptions {
  client_id: string;
  client_secret: string;
  base_url: string;
  retry?: Omit<RetrierOptions, "limiter">;
  max_flights?: number;
  max_hotels?: number;
  currency?: string;
}

export class AmadeusSource implements ISourceAdapter {
  readonly name = "amadeus" as const;
  readonly categories = ["flight", "hotel"] as const;
  private readonly options: AmadeusOptions;
  // Self-service tier allows 10 req/s; keep well under it.
  private readonly retrier: Retrier;
  private readonly cityCodes = new TTLCache<string>(24 * 3600);

  private accessToken = "";
  private tokenExpiry = 0;

  constructor(options: AmadeusOptions) {
    this.options = options;
    this.retrier = new Retrier(this.name, {
      ...options.retry,
      limiter: new RateLimiter(5, 5),
    });
  }

  isAvailable(): boolean {
    return this.options.client_id.length > 0 && this.options.client_secret.length > 0;
  }

  async search(category: Category, query: TripQuery): Promise<RawRecord[]> {
    if (category === "flight") return this.searchFlights(query);
    if (category === "hotel") return this.searchHotels(query);
    return [];
  }

  private async searchFlights(query: TripQuery): Promise<RawRecord[]> {
    if (!query.origin_city) return [];
    const [origin, destination] = await Promise.all([
      this.resolveCityCode(query.origin_city),
      this.resolveCityCode(query.destination_city),
    ]);
    if (!origin || !destination) {
      console.error(
        `[amadeus] no IATA code for ${origin ? query.destination_city : query.origin_city}`
      );
      return [];
    }

    const params = new URLSearchParams({
      originLocationCode: origin,
      destinationLocationCode: destination,
      departureDate: query.departure_date,
      adults: String(query.travelers),
      max: String(this.options.max_flights ?? 10),
      currencyCode: this.options.currency ?? "USD",
    });
    if (query.return_date) params.set("returnDate", query.return_date);
    if (query.flight_class) params.set("travelClass", TRAVEL_CLASS[query.flight_class]);

    const data = await this.get<AmadeusList<Record<string, unknown>>>(
      "/v2/shopping/flight-offers",
      params
    );
    return (data?.data ?? []).map((offer): RawRecord => ({
      source: this.name,
      category: "flight",
      fields: offer,
    }));
  }

  /** Hotel list for the city, then offers for those hotels in batches. */
  private async searchHotels(query: TripQuery): Promise<RawRecord[]> {
    const cityCode = await this.resolveCityCode(query.destination_city);
    if (!cityCode) {
      console.error(`[amadeus] no IATA code for ${query.destination_city}`);
      return [];
    }

    const wanted = this.options.max_hotels ?? 10;
    const listing = await this.get<AmadeusList<AmadeusHotelListing>>(
      "/v1/reference-data/locations/hotels/by-city",
      new URLSearchParams({
        cityCode,
        radius: "20",
        radiusUnit: "KM",
        hotelSource: "ALL",
      })
    );
    const hotels = (listing?.data ?? [])
      .filter((h) => h.hotelId)
      .slice(0, wanted * 3); // many listed hotels have no availability
    const byId = new Map(hotels.map((h) => [h.hotelId, h]));

    const results: RawRecord[] = [];
    for (let i = 0; i < hotels.length && results.length < wanted; i += HOTEL_BATCH) {
      const ids = hotels.slice(i, i + HOTEL_BATCH).map((h) => h.hotelId);
      const offers = await this.get<AmadeusList<AmadeusHotelOffer>>(
        "/v3/shopping/hotel-offers",
        new URLSearchParams({
          hotelIds: ids.join(","),
          adults: String(query.travelers),
          checkInDate: query.departure_date,
          checkOutDate: query.return_date,
          roomQuantity: "1",
          currency: this.options.currency ?? "USD",
          bestRateOnly: "true",
        }),
        [400] // no availability for any hotel in the batch
      );

      for (const item of offers?.data ?? []) {
        if (results.length >= wanted) break;
        const listed = item.hotel?.hotelId ? byId.get(item.hotel.hotelId) : undefined;
        results.push({
          source: this.name,
          category: "hotel",
          fields: { ...item, hotel: { ...listed, ...item.hotel } },
        });
      }
    }
    return results;
  }

  /**
   * Amadeus first, then the static table. Only resolved codes are cached; a
   * failed lookup with no static fallback rethrows so the attempt reads as
   * unavailable rather than empty.
   */
  async resolveCityCode(city: string): Promise<string | null> {
    const key = city.trim().toLowerCase();
    const cached = this.cityCodes.get(key);
    if (cached !== undefined) return cached;

    let lookupError: unknown;
    try {
      const data = await this.get<AmadeusList<{ iataCode?: string }>>(
        "/v1/reference-data/locations/cities",
        new URLSearchParams({ keyword: city.trim().toUpperCase(), max: "1" })
      );
      const code = data?.data?.[0]?.iataCode;
      if (code) {
        this.cityCodes.set(key, code);
        return code;
      }
    } catch (err) {
      lookupError = err;
      console.error(
        `[amadeus] city lookup failed for ${city}: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const fallback = staticCityCode(city);
    if (fallback) {
      this.cityCodes.set(key, fallback);
      return fallback;
    }
    if (lookupError !== undefined) throw lookupError;
    return null;
  }

  /** GET through the retrier. Statuses in `emptyOn` mean "nothing here", not failure. */
  private async get<T>(
    path: string,
    params: URLSearchParams,
    emptyOn: number[] = [404]
  ): Promise<T | null> {
    return this.retrier.call(async () => {
      await this.ensureToken();
      const resp = await fetch(`${this.options.base_url}${path}?${params}`, {
        headers: { Authorization: `Bearer ${this.accessToken}` },
      });
      if (emptyOn.includes(resp.status)) return null;
      if (resp.status === 401) this.accessToken = "";
      if (!resp.ok) throw await HttpError.fromResponse("Amadeus API error", resp);
      return (await resp.json()) as T;
    });
  }

  private async ensureToken(): Promise<void> {
    if (this.accessToken && Date.now() < this.tokenExpiry) return;

    const resp = await fetch(`${this.options.base_url}/v1/security/oauth2/token`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        grant_type: "client_credentials",
        client_id: this.options.client_id,
        client_secret: this.options.client_secret,
      }),
    });

    if (!resp.ok) {
      throw await HttpError.fromResponse("Amadeus OAuth error", resp);
    }

    const token = (await resp.json()) as {
      access_token: string;
      expires_in: number;
    };
    this.accessToken = token.access_token;
    // Refresh 60s before expiry
    this.tokenExpiry = Date.now() + (token.expires_in - 60) * 1000;
  }
}

interface AmadeusList<T> {
  data?: T[];
}

interface AmadeusHotelListing {
  hotelId: string;
  name?: string;
  address?: { countryCode?: string };
}

interface AmadeusHotelOffer {
  hotel?: { hotelId?: string; name?: string } & Record<string, unknown>;
  offers?: unknown[];
}
