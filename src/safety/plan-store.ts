/**
 * Durable single-use execution intents.
 *
 * `create` records exactly what was approved; `consume` flips the plan to
 * executed once and hands the stored method and params back so the caller
 * runs the approved payload rather than whatever it was given later.
 */

import crypto from "node:crypto";
import { logger } from "@elizaos/core";
import { z } from "zod";
import { workflowError } from "../client/errors.js";
import { mutateJsonState, type JsonObject } from "../storage/json-state.js";
import { canonicalJson, sha256Hex } from "../utils/canonical-json.js";
import { isRecord } from "../utils/records.js";
import type { RiskLevel } from "./risk.js";

export const DEFAULT_PLAN_TTL_SEC = 1800;

const PlanSchema = z.object({
  planId: z.string(),
  tenant: z.string(),
  method: z.string(),
  params: z.record(z.unknown()),
  risk: z.enum(["read", "write", "destructive"]),
  allowlisted: z.boolean(),
  packs: z.array(z.string()),
  createdAtMs: z.number(),
  expiresAtMs: z.number(),
  executed: z.boolean(),
  executedAtMs: z.number().optional(),
});

export type Plan = z.infer<typeof PlanSchema>;

export interface PlanDraft {
  tenant: string;
  method: string;
  params: Record<string, unknown>;
  risk: RiskLevel;
  allowlisted: boolean;
  packs: readonly string[];
}

export interface PlanStoreOptions {
  ttlSec?: number;
  now?: () => number;
}

function livePlans(state: JsonObject, nowMs: number): Record<string, Plan> {
  const plans: Record<string, Plan> = {};
  const raw = isRecord(state.plans) ? state.plans : {};
  for (const [id, value] of Object.entries(raw)) {
    const parsed = PlanSchema.safeParse(value);
    if (!parsed.success) continue;
    if (parsed.data.expiresAtMs < nowMs) continue;
    plans[id] = parsed.data;
  }
  return plans;
}

export class PlanStore {
  readonly stateFile: string;
  readonly ttlSec: number;
  private readonly now: () => number;

  constructor(stateFile: string, opts: PlanStoreOptions = {}) {
    this.stateFile = stateFile;
    this.ttlSec = Math.max(opts.ttlSec ?? DEFAULT_PLAN_TTL_SEC, 60);
    this.now = opts.now ?? Date.now;
  }

  async create(draft: PlanDraft): Promise<Plan> {
    const nowMs = this.now();
    const seed = [
      draft.tenant,
      draft.method,
      draft.risk,
      canonicalJson(draft.params),
      nowMs,
      crypto.randomUUID(),
    ].join("|");
    const plan: Plan = {
      planId: sha256Hex(seed).slice(0, 20),
      tenant: draft.tenant,
      method: draft.method,
      params: draft.params,
      risk: draft.risk,
      allowlisted: draft.allowlisted,
      packs: [...draft.packs],
      createdAtMs: nowMs,
      expiresAtMs: nowMs + this.ttlSec * 1000,
      executed: false,
    };

    await mutateJsonState(this.stateFile, (state) => {
      const plans = livePlans(state, nowMs);
      plans[plan.planId] = plan;
      return { state: { ...state, plans }, result: undefined };
    });
    logger.info(
      `[plan-store] Created plan ${plan.planId} for ${plan.method} (${plan.risk})`,
    );
    return plan;
  }

  /**
   * Mark `planId` executed and return it. Throws `PLAN_NOT_FOUND` (missing
   * or expired), `PLAN_TENANT_MISMATCH` or `PLAN_ALREADY_EXECUTED`.
   */
  async consume(planId: string, tenant: string): Promise<Plan> {
    const nowMs = this.now();
    return mutateJsonState(this.stateFile, (state) => {
      const plans = livePlans(state, nowMs);
      const plan = plans[planId];
      if (!plan) {
        throw workflowError("PLAN_NOT_FOUND", `plan '${planId}' not found or expired`);
      }
      if (plan.tenant !== tenant) {
        throw workflowError("PLAN_TENANT_MISMATCH", "plan tenant mismatch");
      }
      if (plan.executed) {
        throw workflowError(
          "PLAN_ALREADY_EXECUTED",
          `plan '${planId}' already executed`,
        );
      }
      const executed: Plan = { ...plan, executed: true, executedAtMs: nowMs };
      plans[planId] = executed;
      return { state: { ...state, plans }, result: executed };
    });
  }
}
