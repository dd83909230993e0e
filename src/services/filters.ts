import type {
  BudgetLevel,
  HotelRecord,
  NormalizedRecord,
  TripQuery,
} from "../providers/provider.js";

/** Nightly price bands, inclusive at both ends, in the record's own currency. */
export const BUDGET_BANDS: Record<BudgetLevel, readonly [number, number]> = {
  budget: [0, 100],
  moderate: [100, 300],
  luxury: [300, Number.POSITIVE_INFINITY],
};

export function fitsBudget(price: number, level: BudgetLevel): boolean {
  const [min, max] = BUDGET_BANDS[level];
  return price >= min && price <= max;
}

/** The wanted kind appears in the hotel's type or in its name. */
export function matchesAccommodation(hotel: HotelRecord, wanted: string | undefined): boolean {
  const kind = singular(wanted ?? "");
  if (!kind) return true;
  return [hotel.type ?? "", hotel.name].some((text) => compact(text).includes(compact(kind)));
}

/**
 * Whether a normalized record suits the traveller's stated preferences.
 * Only priced hotels are judged; everything else passes.
 */
export function matchesPreferences(record: NormalizedRecord, query: TripQuery): boolean {
  if (record.category !== "hotel" || record.price === null) return true;
  return (
    fitsBudget(record.price, query.budget_level) &&
    matchesAccommodation(record, query.accommodation_type)
  );
}

function compact(text: string): string {
  return text.toLowerCase().replace(/[\s_-]+/g, "");
}

function singular(word: string): string {
  const w = word.trim().toLowerCase();
  return w.length > 3 && w.endsWith("s") ? w.slice(0, -1) : w;
}
