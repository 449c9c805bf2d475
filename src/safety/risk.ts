import { isRecord } from "../utils/records.js";

export type RiskLevel = "read" | "write" | "destructive";

const WRITE_METHOD_RE =
  /(?:^|\.)(add|update|set|register|bind|import|complete|start|stop|move|clear)$/;
const DESTRUCTIVE_METHOD_RE =
  /(?:^|\.)(delete|remove|recyclebin|unregister|unbind)$/;

const RISK_ORDER: Record<RiskLevel, number> = {
  read: 0,
  write: 1,
  destructive: 2,
};

/** Method part of a batch command such as `crm.deal.list?filter[ID]=1`. */
export function batchCommandMethod(command: string): string {
  return (command.split("?", 1)[0] ?? "").trim().toLowerCase();
}

/** String commands of a batch `cmd` map; anything else is ignored. */
export function batchCommands(params: Record<string, unknown> | undefined): string[] {
  const cmd = params?.cmd;
  if (!isRecord(cmd)) return [];
  return Object.values(cmd).filter(
    (value): value is string => typeof value === "string",
  );
}

export function maxRisk(a: RiskLevel, b: RiskLevel): RiskLevel {
  return RISK_ORDER[a] >= RISK_ORDER[b] ? a : b;
}

/**
 * Suffix based risk tier. A batch is as risky as its riskiest sub-command.
 */
export function classifyRisk(
  method: string,
  params?: Record<string, unknown>,
): RiskLevel {
  const name = method.toLowerCase();
  if (name === "batch") {
    return batchCommands(params)
      .map((command) => classifyRisk(batchCommandMethod(command)))
      .reduce<RiskLevel>(maxRisk, "read");
  }
  if (DESTRUCTIVE_METHOD_RE.test(name)) return "destructive";
  if (WRITE_METHOD_RE.test(name)) return "write";
  return "read";
}
