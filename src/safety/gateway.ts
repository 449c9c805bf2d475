/**
 * Guarded entry point for one caller request.
 *
 * Order of checks: plan consumption, schema, allowlist (including batch
 * sub-commands), risk, plan-only, plan requirement, confirmation, then
 * idempotent replay and execution. Every refusal is a workflow or
 * validation error in the returned result; nothing here throws for a
 * caller mistake.
 */

import crypto from "node:crypto";
import { logger } from "@elizaos/core";
import {
  ApiError,
  failure,
  success,
  workflowError,
  type Result,
} from "../client/errors.js";
import type { CallExecutor } from "../client/executor.js";
import { tenantKey, type ApiResponse } from "../client/types.js";
import type { AuditEntry, AuditLog } from "../security/audit-log.js";
import type { IdempotencyStore } from "./idempotency-store.js";
import { isAllowed, type PackName } from "./packs.js";
import type { Plan, PlanStore } from "./plan-store.js";
import {
  batchCommandMethod,
  classifyRisk,
  type RiskLevel,
} from "./risk.js";
import { validateMethodAndParams } from "./schemas.js";
import { isRecord } from "../utils/records.js";

export interface GatewayRequest {
  method?: string;
  params?: Record<string, unknown>;
  restV3?: boolean;
  planOnly?: boolean;
  executePlanId?: string;
  confirmWrite?: boolean;
  confirmDestructive?: boolean;
  allowUnlisted?: boolean;
  idempotencyKey?: string;
  /** Set false to skip the replay cache for this request. */
  idempotency?: boolean;
}

export type GatewayOutcome =
  | { type: "planned"; plan: Plan }
  | {
      type: "executed" | "replayed";
      method: string;
      risk: RiskLevel;
      response: ApiResponse;
      idempotencyKey: string;
      planId: string;
    };

export type GatewayResult = Result<GatewayOutcome>;

export interface CallGatewayOptions {
  executor: CallExecutor;
  planStore: PlanStore;
  idempotencyStore?: IdempotencyStore | null;
  audit?: AuditLog | null;
  allowlist: readonly string[];
  packs: readonly PackName[];
  requirePlan?: boolean;
  now?: () => number;
}

interface CallContext {
  requestId: string;
  startedMs: number;
  method: string;
  params: Record<string, unknown>;
  risk: RiskLevel;
  allowlisted: boolean;
  restV3: boolean;
  planId: string;
  idempotencyKey: string;
}

export class CallGateway {
  private readonly opts: CallGatewayOptions;
  private readonly now: () => number;

  constructor(opts: CallGatewayOptions) {
    this.opts = opts;
    this.now = opts.now ?? Date.now;
  }

  async run(request: GatewayRequest): Promise<GatewayResult> {
    try {
      return await this.runGuarded(request);
    } catch (err) {
      if (err instanceof ApiError) return failure(err);
      throw err;
    }
  }

  private async runGuarded(request: GatewayRequest): Promise<GatewayResult> {
    const { executor } = this.opts;
    const tenant = tenantKey(executor.tenant);
    let method = (request.method ?? "").trim().toLowerCase();
    let params = request.params ?? {};
    let planId = "";

    if (request.executePlanId?.trim()) {
      const plan = await this.opts.planStore.consume(
        request.executePlanId.trim(),
        tenant,
      );
      const plannedMethod = plan.method.trim().toLowerCase();
      if (method && method !== plannedMethod) {
        throw workflowError(
          "PLAN_METHOD_MISMATCH",
          `method '${method}' does not match planned method '${plannedMethod}'`,
        );
      }
      method = plannedMethod;
      params = plan.params;
      planId = plan.planId;
    }

    if (!method) {
      throw workflowError("METHOD_REQUIRED", "method is required (or execute a plan)");
    }

    validateMethodAndParams(method, params);

    const allowlisted = isAllowed(method, this.opts.allowlist);
    const risk = classifyRisk(method, params);
    const ctx: CallContext = {
      requestId: crypto.randomUUID().replace(/-/g, "").slice(0, 12),
      startedMs: this.now(),
      method,
      params,
      risk,
      allowlisted,
      restV3: request.restV3 ?? false,
      planId,
      idempotencyKey: "",
    };

    const denial = this.checkPolicy(ctx, request);
    if (denial) {
      await this.audit(ctx, "policy_denied", "warn", denial);
      return failure(denial);
    }

    if (request.planOnly) {
      const plan = await this.opts.planStore.create({
        tenant,
        method,
        params,
        risk,
        allowlisted,
        packs: this.opts.packs,
      });
      ctx.planId = plan.planId;
      await this.audit(ctx, "plan_created", "info");
      return success({ type: "planned", plan });
    }

    const store =
      risk !== "read" && request.idempotency !== false
        ? (this.opts.idempotencyStore ?? null)
        : null;

    if (store) {
      ctx.idempotencyKey = store.keyFor({
        tenant,
        method,
        params,
        explicitKey: request.idempotencyKey,
      });
      const cached = await store.checkReplay(ctx.idempotencyKey);
      if (cached) {
        logger.info(`[gateway] Replaying cached response for ${method}`);
        await this.audit(ctx, "call_replayed", "info");
        return success(this.outcome("replayed", ctx, cached));
      }
      await store.start(ctx.idempotencyKey);
    }

    const result = await executor.execute(method, params, { restV3: ctx.restV3 });
    if (!result.ok) {
      if (store) await store.clear(ctx.idempotencyKey);
      await this.audit(ctx, "call_failed", "error", result.error);
      return failure(result.error);
    }

    if (store) await store.done(ctx.idempotencyKey, result.value);
    await this.audit(ctx, "call_executed", "info");
    return success(this.outcome("executed", ctx, result.value));
  }

  private checkPolicy(ctx: CallContext, request: GatewayRequest): ApiError | null {
    const allowUnlisted = request.allowUnlisted ?? false;
    if (!ctx.allowlisted && !allowUnlisted) {
      return workflowError(
        "METHOD_NOT_ALLOWED",
        `method '${ctx.method}' is outside the allowlist; extend the allowlist or packs, or allow unlisted methods`,
      );
    }

    if (ctx.method === "batch" && !allowUnlisted) {
      const cmd = isRecord(ctx.params.cmd) ? ctx.params.cmd : {};
      for (const [name, command] of Object.entries(cmd)) {
        if (typeof command !== "string") continue;
        const commandMethod = batchCommandMethod(command);
        if (!isAllowed(commandMethod, this.opts.allowlist)) {
          return workflowError(
            "BATCH_COMMAND_NOT_ALLOWED",
            `batch command '${name}' uses non-allowlisted method '${commandMethod}'`,
          );
        }
      }
    }

    // Creating a plan is how a risky call gets approved in the first place.
    if (request.planOnly) return null;

    if (this.opts.requirePlan && ctx.risk !== "read" && !ctx.planId) {
      return workflowError(
        "PLAN_REQUIRED",
        "a plan is required for write/destructive operations; create one and execute it by id",
      );
    }
    if (ctx.planId) return null;
    if (ctx.risk === "write" && !request.confirmWrite) {
      return workflowError(
        "CONFIRMATION_REQUIRED",
        "write method detected; confirm the write to execute",
      );
    }
    if (ctx.risk === "destructive" && !request.confirmDestructive) {
      return workflowError(
        "CONFIRMATION_REQUIRED",
        "destructive method detected; confirm the destructive call to execute",
      );
    }
    return null;
  }

  private outcome(
    type: "executed" | "replayed",
    ctx: CallContext,
    response: ApiResponse,
  ): GatewayOutcome {
    return {
      type,
      method: ctx.method,
      risk: ctx.risk,
      response,
      idempotencyKey: ctx.idempotencyKey,
      planId: ctx.planId,
    };
  }

  private async audit(
    ctx: CallContext,
    type: AuditEntry["type"],
    severity: AuditEntry["severity"],
    error?: ApiError,
  ): Promise<void> {
    if (!this.opts.audit) return;
    await this.opts.audit.record({
      type,
      severity,
      requestId: ctx.requestId,
      tenant: tenantKey(this.opts.executor.tenant),
      method: ctx.method,
      risk: ctx.risk,
      durationMs: this.now() - ctx.startedMs,
      allowlisted: ctx.allowlisted,
      packs: [...this.opts.packs],
      restV3: ctx.restV3,
      paramKeys: Object.keys(ctx.params),
      planId: ctx.planId,
      idempotencyKey: ctx.idempotencyKey,
      ...(error ? { errorCode: error.code, errorMessage: error.message } : {}),
    });
  }
}
