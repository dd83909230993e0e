import { config } from "dotenv";
import { loadConfig } from "./config.js";
import type { ISourceAdapter, TripQuery } from "./providers/provider.js";
import { createServices } from "./setup.js";

config();

interface HealthResult {
  source: string;
  credentials: boolean;
  reachable: boolean | null;
  records: number | null;
  responseMs: number | null;
  error: string | null;
}

const PROBE_TIMEOUT_MS = 10_000;

async function checkSource(
  source: ISourceAdapter,
  query: TripQuery,
  timeout_ms = PROBE_TIMEOUT_MS
): Promise<HealthResult> {
  const result: HealthResult = {
    source: source.name,
    credentials: source.isAvailable(),
    reachable: null,
    records: null,
    responseMs: null,
    error: null,
  };

  if (!result.credentials) {
    return result;
  }

  const category = source.categories.includes("hotel") ? "hotel" : source.categories[0];
  const start = performance.now();
  let timer: NodeJS.Timeout | undefined;
  try {
    const records = await Promise.race([
      source.search(category, query),
      new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error(`Timeout (${timeout_ms / 1000}s)`)),
          timeout_ms
        );
      }),
    ]);
    result.reachable = true;
    result.records = records.length;
  } catch (err) {
    result.reachable = false;
    result.error = err instanceof Error ? err.message : String(err);
  } finally {
    clearTimeout(timer);
    result.responseMs = Math.round(performance.now() - start);
  }

  return result;
}

function probeQuery(): TripQuery {
  const inAMonth = new Date(Date.now() + 30 * 86_400_000);
  const weekLater = new Date(inAMonth.getTime() + 7 * 86_400_000);
  return {
    origin_city: "London",
    destination_city: "Paris",
    departure_date: inAMonth.toISOString().slice(0, 10),
    return_date: weekLater.toISOString().slice(0, 10),
    travelers: 1,
    budget_level: "moderate",
  };
}

function statusOf(r: HealthResult): string {
  if (r.reachable === null) return "skipped";
  return r.reachable ? "reachable" : "FAILED";
}

async function main() {
  const { adapters } = createServices(loadConfig());

  console.log("Trip Source Health Check\n");
  console.log("Checking %d sources...\n", adapters.length);

  const query = probeQuery();
  const results = await Promise.all(adapters.map((a) => checkSource(a, query)));

  const columns: Array<{ title: string; width: number; value: (r: HealthResult) => string }> = [
    { title: "Source", width: 13, value: (r) => r.source },
    { title: "Credentials", width: 12, value: (r) => (r.credentials ? "OK" : "missing") },
    { title: "Status", width: 10, value: statusOf },
    { title: "Records", width: 8, value: (r) => (r.records !== null ? String(r.records) : "-") },
    { title: "Time", width: 9, value: (r) => (r.responseMs !== null ? `${r.responseMs}ms` : "-") },
    { title: "Error", width: 30, value: (r) => (r.error ? r.error.slice(0, 30) : "-") },
  ];

  console.log(columns.map((c) => c.title.padEnd(c.width)).join(" | "));
  console.log(columns.map((c) => "-".repeat(c.width)).join("-+-"));
  for (const r of results) {
    console.log(columns.map((c) => c.value(r).padEnd(c.width)).join(" | "));
  }

  const working = results.filter((r) => r.reachable === true).length;
  const withCreds = results.filter((r) => r.credentials).length;

  console.log(
    "\nSummary: %d/%d sources have credentials, %d/%d reachable",
    withCreds,
    results.length,
    working,
    results.length
  );

  process.exit(working > 0 ? 0 : 1);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
