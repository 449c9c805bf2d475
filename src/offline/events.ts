/**
 * Shape checks and identity helpers for offline queue payloads.
 */

import { secureCompare } from "../security/secrets.js";
import { canonicalJson, sha256Hex } from "../utils/canonical-json.js";
import { isRecord, type JsonObject } from "../utils/records.js";

export interface OfflineBatch {
  processId: string | null;
  events: JsonObject[];
}

/** First truthy value among `keys`, matching the upstream's mixed casing. */
function pick(item: JsonObject, ...keys: string[]): unknown {
  for (const key of keys) {
    if (item[key]) return item[key];
  }
  return undefined;
}

/** Returns a problem description, or null when the response is usable. */
export function validateOfflineGetResponse(response: unknown): string | null {
  if (!isRecord(response)) return "response is not an object";
  const result = response.result;
  if (result === undefined || result === null) return "missing result field";
  if (!isRecord(result)) return "result is not an object";
  const processId = result.process_id;
  if (processId !== undefined && processId !== null && typeof processId !== "string") {
    return "result.process_id must be string when present";
  }
  return null;
}

/**
 * Events come from `result.events`, `result.items` or `result.result`,
 * whichever is a list or map first. Non-object entries are dropped.
 */
export function parseOfflineGet(response: JsonObject): OfflineBatch {
  const result = isRecord(response.result) ? response.result : {};
  const processId = typeof result.process_id === "string" ? result.process_id : null;

  for (const candidate of [result.events, result.items, result.result]) {
    if (Array.isArray(candidate)) {
      return { processId, events: candidate.filter(isRecord) };
    }
    if (isRecord(candidate)) {
      return { processId, events: Object.values(candidate).filter(isRecord) };
    }
  }
  return { processId, events: [] };
}

export function validateEventItem(item: unknown): string | null {
  if (!isRecord(item)) return "event item is not an object";
  const name = pick(item, "event", "EVENT");
  if (name !== undefined && typeof name !== "string") {
    return "event field must be a string";
  }
  const data = pick(item, "data", "DATA");
  if (data !== undefined && !isRecord(data)) return "data field must be an object";
  const auth = pick(item, "auth", "AUTH");
  if (auth !== undefined && !isRecord(auth)) return "auth field must be an object";
  return null;
}

export function eventName(item: JsonObject): string | null {
  const name = pick(item, "event", "EVENT");
  return name === undefined ? null : String(name);
}

export function eventData(item: JsonObject): JsonObject {
  const data = pick(item, "data", "DATA");
  return isRecord(data) ? data : {};
}

export function eventAuth(item: JsonObject): JsonObject {
  const auth = pick(item, "auth", "AUTH");
  return isRecord(auth) ? auth : {};
}

export function eventMessageId(item: JsonObject): string | null {
  for (const key of ["message_id", "MESSAGE_ID", "id", "ID"]) {
    const value = item[key];
    if (value !== undefined && value !== null) return String(value);
  }
  return null;
}

/**
 * Redelivery-safe identity: event name plus a digest of the canonical data.
 * The message id is deliberately left out.
 */
export function eventDedupKey(item: JsonObject): string {
  const name = eventName(item) ?? "unknown";
  const digest = sha256Hex(canonicalJson(eventData(item))).slice(0, 16);
  return `${name}:${digest}`;
}

/** With no expected token configured every event passes. */
export function validateApplicationToken(
  auth: JsonObject,
  expected: string | null | undefined,
): boolean {
  if (expected === null || expected === undefined) return true;
  const received = auth.application_token;
  return secureCompare(typeof received === "string" ? received : null, expected);
}
