import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

let table: Map<string, string> | null = null;

function loadTable(): Map<string, string> {
  if (!table) {
    const path = fileURLToPath(new URL("../../data/city-codes.json", import.meta.url));
    const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
    table = new Map();
    if (raw && typeof raw === "object") {
      for (const [city, code] of Object.entries(raw)) {
        if (typeof code === "string") table.set(city, code);
      }
    }
  }
  return table;
}

/** IATA city code from the static table: exact name first, then partial match. */
export function staticCityCode(city: string): string | null {
  const name = city.trim().toLowerCase();
  if (!name) return null;
  const codes = loadTable();
  const exact = codes.get(name);
  if (exact) return exact;
  if (name.length < 4) return null;
  for (const [known, code] of codes) {
    if (name.includes(known) || known.includes(name)) return code;
  }
  return null;
}
