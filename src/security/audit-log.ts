/**
 * Append-only audit log for gateway calls.
 * Never log real secret values: only parameter names are kept, and error
 * messages pass through `maskSecrets`.
 */

import { logger } from "@elizaos/core";
import { appendJsonLine } from "../storage/json-state.js";
import { maskSecrets } from "./secrets.js";

export type AuditEventType =
  | "call_executed"
  | "call_failed"
  | "call_replayed"
  | "plan_created"
  | "policy_denied";

export interface AuditEntry {
  timestamp: string;
  type: AuditEventType;
  requestId: string;
  tenant: string;
  method: string;
  risk: string;
  durationMs: number;
  allowlisted: boolean;
  packs: string[];
  restV3: boolean;
  paramKeys: string[];
  planId: string;
  idempotencyKey: string;
  errorCode?: string;
  errorMessage?: string;
  severity: "info" | "warn" | "error";
}

export interface AuditLogConfig {
  /** JSON lines file; null keeps the log in memory only. */
  file?: string | null;
  maxEntries?: number;
  sink?: (entry: AuditEntry) => void;
}

export class AuditLog {
  private entries: AuditEntry[] = [];
  private readonly file: string | null;
  private readonly maxEntries: number;
  private readonly sink?: (entry: AuditEntry) => void;

  constructor(config: AuditLogConfig = {}) {
    this.file = config.file ?? null;
    this.maxEntries = config.maxEntries ?? 5000;
    this.sink = config.sink;
  }

  async record(entry: Omit<AuditEntry, "timestamp">): Promise<AuditEntry> {
    const full: AuditEntry = {
      ...entry,
      paramKeys: [...entry.paramKeys].sort(),
      timestamp: new Date().toISOString(),
    };
    if (full.errorMessage !== undefined) {
      full.errorMessage = maskSecrets(full.errorMessage);
    }

    this.entries.push(full);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-Math.floor(this.maxEntries / 2));
    }

    const line = `[audit] ${full.type} ${full.method} (${full.risk}) request=${full.requestId}`;
    if (full.severity === "error") logger.error(line);
    else if (full.severity === "warn") logger.warn(line);
    else logger.debug(line);

    this.sink?.(full);
    if (this.file) await appendJsonLine(this.file, full);
    return full;
  }

  getRecent(count = 100): AuditEntry[] {
    return this.entries.slice(-count);
  }

  getByType(type: AuditEventType, count = 50): AuditEntry[] {
    return this.entries.filter((e) => e.type === type).slice(-count);
  }

  get size(): number {
    return this.entries.length;
  }
}
