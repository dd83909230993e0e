import type {
  ActivityRecord,
  Category,
  FlightRecord,
  HotelRecord,
  NormalizedRecord,
  RecordByCategory,
} from "../providers/provider.js";
import { parsePrice } from "./normalizer.js";

export type UnratedPlacement = "zero" | "last";

export interface RankOptions {
  /**
   * "zero" ranks an unrated record as if it were rated 0; "last" puts every
   * unrated record after all rated ones, including those rated 0.
   */
  unrated?: UnratedPlacement;
}

export function compareFlights(a: FlightRecord, b: FlightRecord): number {
  if (a.stops !== b.stops) return a.stops - b.stops;
  return compareNumbers(a.price ?? Infinity, b.price ?? Infinity);
}

function priceOf(record: HotelRecord | ActivityRecord): number {
  if (record.category === "hotel") return record.price ?? Infinity;
  return parsePrice(record.price_range).amount ?? Infinity;
}

function ratedComparator(unrated: UnratedPlacement) {
  return (a: HotelRecord | ActivityRecord, b: HotelRecord | ActivityRecord) => {
    if (unrated === "last") {
      const aRated = a.rating !== undefined;
      const bRated = b.rating !== undefined;
      if (aRated !== bRated) return aRated ? -1 : 1;
    }
    const byRating = compareNumbers(b.rating ?? 0, a.rating ?? 0);
    if (byRating !== 0) return byRating;
    return compareNumbers(priceOf(a), priceOf(b));
  };
}

function comparatorFor(
  category: Category,
  unrated: UnratedPlacement
): (a: NormalizedRecord, b: NormalizedRecord) => number {
  if (category === "flight") {
    return (a, b) =>
      a.category === "flight" && b.category === "flight" ? compareFlights(a, b) : 0;
  }
  const compare = ratedComparator(unrated);
  return (a, b) =>
    a.category !== "flight" && b.category !== "flight" ? compare(a, b) : 0;
}

/** Best first. Stable: ties keep their incoming (source-priority) order. */
export function rank<C extends Category>(
  category: C,
  records: RecordByCategory[C][],
  options: RankOptions = {}
): RecordByCategory[C][] {
  return [...records].sort(comparatorFor(category, options.unrated ?? "zero"));
}

// Infinity - Infinity is NaN, which Array#sort treats as "equal" inconsistently.
function compareNumbers(a: number, b: number): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
