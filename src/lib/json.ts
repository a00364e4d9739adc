// src/lib/json.ts
// Narrowing helpers for JSON from remote APIs.

export type JsonObject = Record<string, unknown>;

export function isObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function str(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function arr(v: unknown): unknown[] {
  return Array.isArray(v) ? v : [];
}

/** Parsed object body, or {} when the body is empty or not a JSON object. */
export async function readJson(resp: Response): Promise<JsonObject> {
  const raw = await resp.text();
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isObject(parsed) ? parsed : {};
  } catch {
    return { raw };
  }
}
