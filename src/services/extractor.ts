import OpenAI from "openai";
import { HttpError } from "../errors.js";

export interface Extractor {
  /** Structured data found in `text`, shaped after `schema_hint`, or null. */
  extractStructured(text: string, schema_hint: string): Promise<unknown>;
  isAvailable(): boolean;
}

const SYSTEM_PROMPT =
  "You extract travel information from web page text. Reply with JSON only, " +
  "following the structure you are given. Leave a field empty when the text " +
  "does not state it; never invent values.";

export class OpenAIExtractor implements Extractor {
  private readonly apiKey: string;
  private readonly model: string;
  private client: OpenAI | null = null;

  constructor(apiKey: string, model: string) {
    this.apiKey = apiKey;
    this.model = model;
  }

  isAvailable(): boolean {
    return this.apiKey.length > 0;
  }

  /** API failures surface as HttpError so the retrier can tell a bad key from a blip. */
  async extractStructured(text: string, schema_hint: string): Promise<unknown> {
    try {
      const res = await this.getClient().chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          {
            role: "user",
            content: `Return JSON with this structure:\n${schema_hint}\n\nCONTENT:\n${text}`,
          },
        ],
        temperature: 0.2,
        max_tokens: 1500,
      });
      return extractJson(res.choices[0]?.message?.content ?? "");
    } catch (err) {
      if (err instanceof OpenAI.APIError && err.status !== undefined) {
        throw new HttpError("OpenAI API error", err.status, err.message.replace(/^\d+ /, ""));
      }
      throw err;
    }
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new Error("Missing OPENAI_API_KEY. Set it in .env to enable web extraction.");
      }
      this.client = new OpenAI({ apiKey: this.apiKey, maxRetries: 0 });
    }
    return this.client;
  }
}

/**
 * First well-formed JSON object or array in `text`. Models wrap JSON in
 * prose and code fences; this scans for a balanced candidate that parses.
 */
export function extractJson(text: string): unknown {
  const body = text.replace(/```(?:json)?/gi, "");
  for (let start = 0; start < body.length; start++) {
    const ch = body[start];
    if (ch !== "{" && ch !== "[") continue;
    const end = matchingBracket(body, start);
    if (end === -1) continue;
    try {
      return JSON.parse(body.slice(start, end + 1));
    } catch {
      // not JSON after all; keep scanning
    }
  }
  return null;
}

function matchingBracket(text: string, start: number): number {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") stack.push("}");
    else if (ch === "[") stack.push("]");
    else if (ch === "}" || ch === "]") {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i;
    }
  }
  return -1;
}
