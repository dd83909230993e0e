import type { NormalizedRecord } from "../providers/provider.js";

export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Identity of a record across sources. Flights have no name, so they key on
 * flight numbers and departure times, segment by segment.
 */
export function dedupeKey(record: NormalizedRecord): string {
  if (record.category === "flight") {
    return record.segments
      .map((s) => `${normalizeName(s.flight_number)}@${s.departure_time.slice(0, 16)}`)
      .join("|");
  }
  return normalizeName(record.name);
}

/** First record seen for a key wins, so feed records in source-priority order. */
export function dedupe<R extends NormalizedRecord>(records: R[]): R[] {
  const seen = new Set<string>();
  const out: R[] = [];
  for (const record of records) {
    const key = dedupeKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(record);
  }
  return out;
}
