import path from "node:path";
import { InvalidArgumentError, type Command } from "commander";
import { ApiError } from "../client/errors.js";
import { DeadLetterQueue } from "../offline/dead-letter.js";
import { RetryBudget } from "../offline/retry-budget.js";
import { OfflineWorker } from "../offline/worker.js";
import { tenantKey } from "../client/types.js";
import { createRelayContext } from "./context.js";
import { processIO, reportError, type CliIO } from "./output.js";

export interface WorkerCliOptions {
  once?: boolean;
  sleep: number;
  maxRetries: number;
  stateFile?: string;
  dlqFile?: string;
  applicationToken?: string;
}

export async function runWorker(
  options: WorkerCliOptions,
  env: NodeJS.ProcessEnv = process.env,
  io: CliIO = processIO,
): Promise<number> {
  try {
    const { config, tenant, executor } = createRelayContext(env);
    const retryBudget = await RetryBudget.open(
      options.stateFile ? path.resolve(options.stateFile) : config.retryStateFile,
      options.maxRetries,
    );
    const worker = new OfflineWorker({
      client: executor,
      tenantKey: tenantKey(tenant),
      retryBudget,
      deadLetters: new DeadLetterQueue(
        options.dlqFile ? path.resolve(options.dlqFile) : config.dlqFile,
      ),
      applicationToken: options.applicationToken ?? env.B24_APPLICATION_TOKEN ?? null,
      idleSleepMs: options.sleep * 1000,
    });

    const dispose = worker.installSignalHandlers();
    try {
      return await worker.run({ once: options.once });
    } finally {
      dispose();
    }
  } catch (err) {
    if (err instanceof ApiError) return reportError(io, err);
    throw err;
  }
}

function parseNumber(raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(`expected a non-negative number, got '${raw}'`);
  }
  return value;
}

export function registerWorkerCommand(program: Command): void {
  program
    .command("worker")
    .description("Drain the offline event queue with retry budget and dead-lettering")
    .option("--once", "Run one polling cycle and exit")
    .option("--sleep <sec>", "Idle sleep between empty polls", parseNumber, 3)
    .option("--max-retries <n>", "Retry budget per event dedup key", parseNumber, 5)
    .option("--state-file <path>", "Retry budget state file")
    .option("--dlq-file <path>", "Dead-letter JSON lines file")
    .option("--application-token <token>", "Expected application_token on events")
    .action(async (options: WorkerCliOptions) => {
      process.exitCode = await runWorker(options);
    });
}
