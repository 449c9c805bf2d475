import type { Command } from "commander";
import { ApiError } from "../client/errors.js";
import { IdempotencyStore } from "../safety/idempotency-store.js";
import { CallGateway } from "../safety/gateway.js";
import { expandAllowlist, parseMethodAllowlist, parsePackList } from "../safety/packs.js";
import { PlanStore } from "../safety/plan-store.js";
import { AuditLog } from "../security/audit-log.js";
import { isRecord } from "../utils/records.js";
import { createRelayContext } from "./context.js";
import {
  EXIT_OK,
  EXIT_USAGE_ERROR,
  printJson,
  processIO,
  reportError,
  type CliIO,
} from "./output.js";

export interface CallCliOptions {
  params: string;
  restV3?: boolean;
  autoRefresh?: boolean;
  maskSecrets: boolean;
  methodAllowlist?: string;
  packs?: string;
  allowUnlisted?: boolean;
  planOnly?: boolean;
  executePlan?: string;
  requirePlan?: boolean;
  confirmWrite?: boolean;
  confirmDestructive?: boolean;
  audit: boolean;
  idempotencyKey?: string;
  idempotency: boolean;
}

export async function runCall(
  method: string | undefined,
  options: CallCliOptions,
  env: NodeJS.ProcessEnv = process.env,
  io: CliIO = processIO,
): Promise<number> {
  let params: unknown;
  try {
    params = JSON.parse(options.params);
  } catch (err) {
    io.err(`Error: invalid JSON in --params: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_USAGE_ERROR;
  }
  if (!isRecord(params)) {
    io.err("Error: --params must decode to a JSON object");
    return EXIT_USAGE_ERROR;
  }

  try {
    const { config, executor } = createRelayContext(env, {
      autoRefresh: options.autoRefresh,
    });
    const packs = parsePackList(options.packs ?? config.packs);
    const allowlist = expandAllowlist(
      parseMethodAllowlist(options.methodAllowlist ?? config.methodAllowlist),
      packs,
    );

    const gateway = new CallGateway({
      executor,
      planStore: new PlanStore(config.planFile, { ttlSec: config.planTtlSec }),
      idempotencyStore: new IdempotencyStore(config.idempotencyFile, {
        ttlSec: config.idempotencyTtlSec,
      }),
      audit: options.audit ? new AuditLog({ file: config.auditFile }) : null,
      allowlist,
      packs,
      requirePlan: options.requirePlan || config.requirePlan,
    });

    const result = await gateway.run({
      method,
      params,
      restV3: options.restV3,
      planOnly: options.planOnly,
      executePlanId: options.executePlan,
      confirmWrite: options.confirmWrite,
      confirmDestructive: options.confirmDestructive,
      allowUnlisted: options.allowUnlisted,
      idempotencyKey: options.idempotencyKey,
      idempotency: options.idempotency,
    });
    if (!result.ok) return reportError(io, result.error);

    const outcome = result.value;
    if (outcome.type === "planned") {
      printJson(
        io,
        {
          plan: outcome.plan,
          next: { executeCommand: `b24-relay call --execute-plan ${outcome.plan.planId}` },
        },
        options.maskSecrets,
      );
    } else {
      printJson(io, outcome.response, options.maskSecrets);
    }
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ApiError) return reportError(io, err);
    throw err;
  }
}

export function registerCallCommand(program: Command): void {
  program
    .command("call")
    .description("Call one API method through the allowlist, plan and idempotency guards")
    .argument("[method]", "API method, e.g. crm.lead.list")
    .option("--params <json>", "JSON object with method params", "{}")
    .option("--rest-v3", "Use the /rest/api/ path (oauth mode only)")
    .option("--auto-refresh", "Refresh expired oauth tokens through the token endpoint")
    .option("--no-mask-secrets", "Print credentials in output unmasked")
    .option("--method-allowlist <patterns>", "Comma separated allowlist patterns, e.g. 'user.*,crm.*,batch'")
    .option("--packs <names>", "Comma separated capability packs, or 'none'")
    .option("--allow-unlisted", "Allow a method outside the allowlist for this call")
    .option("--plan-only", "Persist an execution plan and print it without calling the API")
    .option("--execute-plan <id>", "Execute a previously created plan")
    .option("--require-plan", "Require plan then execute for write/destructive calls")
    .option("--confirm-write", "Confirm a write method or write batch command")
    .option("--confirm-destructive", "Confirm a destructive method")
    .option("--no-audit", "Skip the audit log for this call")
    .option("--idempotency-key <key>", "Explicit idempotency key for write/destructive calls")
    .option("--no-idempotency", "Bypass the replay cache")
    .action(async (method: string | undefined, options: CallCliOptions) => {
      process.exitCode = await runCall(method, options);
    });
}
