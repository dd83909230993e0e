import type { ZodIssue } from "zod";

export class HttpError extends Error {
  readonly status: number;
  readonly retryAfterMs?: number;

  constructor(
    label: string,
    status: number,
    body = "",
    retryAfterMs?: number
  ) {
    super(`${label}: ${status}${body ? ` ${body.slice(0, 200)}` : ""}`);
    this.name = "HttpError";
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }

  static async fromResponse(label: string, resp: Response): Promise<HttpError> {
    const body = await resp.text().catch(() => "");
    return new HttpError(
      label,
      resp.status,
      body,
      parseRetryAfter(resp.headers.get("retry-after"))
    );
  }
}

/** Raised by a source call that was told to slow down. */
export class RateLimitedError extends Error {
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super(message);
    this.name = "RateLimitedError";
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * A source could not produce results after its retries were spent.
 * The orchestrator treats it as "zero results from this source".
 */
export class SourceUnavailable extends Error {
  readonly source: string;

  constructor(source: string, cause: unknown) {
    super(
      `${source} unavailable: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "SourceUnavailable";
    this.source = source;
  }
}

export class InvalidQuery extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid trip query: ${issues.join("; ")}`);
    this.name = "InvalidQuery";
    this.issues = issues;
  }

  static fromZod(issues: ZodIssue[]): InvalidQuery {
    return new InvalidQuery(
      issues.map((i) =>
        i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
      )
    );
  }
}

export function isRateLimitSignal(err: unknown): boolean {
  if (err instanceof RateLimitedError) return true;
  return err instanceof HttpError && err.status === 429;
}

/** 4xx other than 429 will not get better by asking again. */
export function isPermanentFailure(err: unknown): boolean {
  return (
    err instanceof HttpError &&
    err.status >= 400 &&
    err.status < 500 &&
    err.status !== 429
  );
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const at = Date.parse(header);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - Date.now());
}
