/**
 * Replay cache for write calls retried by their submitter.
 *
 * Records live in one JSON file (`{ entries: { [key]: record } }`) that is
 * rewritten whole under the advisory lock. Expired records are dropped on
 * every write.
 */

import { z } from "zod";
import { mutateJsonState, readJsonState, type JsonObject } from "../storage/json-state.js";
import { canonicalJson, sha256Hex } from "../utils/canonical-json.js";
import { isRecord } from "../utils/records.js";

export const DEFAULT_IDEMPOTENCY_TTL_SEC = 86_400;

export const CORRELATION_FIELDS = [
  "idempotency_key",
  "IDEMPOTENCY_KEY",
  "origin_id",
  "ORIGIN_ID",
  "external_id",
  "EXTERNAL_ID",
] as const;

const RecordSchema = z.object({
  status: z.enum(["in_progress", "done"]),
  updatedAtMs: z.number(),
  expiresAtMs: z.number(),
  response: z.unknown().optional(),
});

export type IdempotencyRecord = z.infer<typeof RecordSchema>;

export interface KeyInput {
  tenant: string;
  method: string;
  params: Record<string, unknown>;
  explicitKey?: string | null;
}

export interface IdempotencyStoreOptions {
  ttlSec?: number;
  now?: () => number;
}

function liveEntries(
  state: JsonObject,
  nowMs: number,
): Record<string, IdempotencyRecord> {
  const entries: Record<string, IdempotencyRecord> = {};
  const raw = isRecord(state.entries) ? state.entries : {};
  for (const [key, value] of Object.entries(raw)) {
    const parsed = RecordSchema.safeParse(value);
    if (!parsed.success) continue;
    if (parsed.data.expiresAtMs < nowMs) continue;
    entries[key] = parsed.data;
  }
  return entries;
}

export class IdempotencyStore {
  readonly stateFile: string;
  readonly ttlSec: number;
  private readonly now: () => number;

  constructor(stateFile: string, opts: IdempotencyStoreOptions = {}) {
    this.stateFile = stateFile;
    this.ttlSec = Math.max(opts.ttlSec ?? DEFAULT_IDEMPOTENCY_TTL_SEC, 60);
    this.now = opts.now ?? Date.now;
  }

  /**
   * Explicit key first, then the first correlation field holding a string
   * or number, then a content hash of tenant, method and canonical params.
   */
  keyFor({ tenant, method, params, explicitKey }: KeyInput): string {
    const explicit = explicitKey?.trim();
    if (explicit) return `${tenant}|${method}|${explicit}`;

    for (const field of CORRELATION_FIELDS) {
      const value = params[field];
      if (typeof value === "string" || typeof value === "number") {
        return `${tenant}|${method}|${field}:${value}`;
      }
    }

    const digest = sha256Hex(`${tenant}|${method}|${canonicalJson(params)}`);
    return `${tenant}|${method}|auto:${digest.slice(0, 24)}`;
  }

  /** Cached response of a finished, unexpired record; null otherwise. */
  async checkReplay(key: string): Promise<Record<string, unknown> | null> {
    const state = await readJsonState(this.stateFile);
    const entries = isRecord(state.entries) ? state.entries : {};
    const parsed = RecordSchema.safeParse(entries[key]);
    if (!parsed.success) return null;
    const record = parsed.data;
    if (record.expiresAtMs < this.now()) return null;
    if (record.status !== "done") return null;
    return isRecord(record.response) ? record.response : null;
  }

  async start(key: string): Promise<void> {
    await this.put(key, (nowMs) => ({
      status: "in_progress",
      updatedAtMs: nowMs,
      expiresAtMs: nowMs + this.ttlSec * 1000,
    }));
  }

  async done(key: string, response: Record<string, unknown>): Promise<void> {
    await this.put(key, (nowMs) => ({
      status: "done",
      updatedAtMs: nowMs,
      expiresAtMs: nowMs + this.ttlSec * 1000,
      response,
    }));
  }

  /** Drop `key` so a failed execution does not block a later retry. */
  async clear(key: string): Promise<void> {
    await this.put(key, () => null);
  }

  private async put(
    key: string,
    build: (nowMs: number) => IdempotencyRecord | null,
  ): Promise<void> {
    const nowMs = this.now();
    await mutateJsonState(this.stateFile, (state) => {
      const entries = liveEntries(state, nowMs);
      const next = build(nowMs);
      if (next) {
        entries[key] = next;
      } else {
        delete entries[key];
      }
      return { state: { ...state, entries }, result: undefined };
    });
  }
}
