/**
 * Offline event worker.
 *
 * Each cycle reads the queue without clearing it, processes every item,
 * and acknowledges only what it resolved durably: handled items and items
 * written to the dead-letter file. Items still inside their retry budget
 * stay queued for redelivery.
 */

import { logger } from "@elizaos/core";
import { ApiError, describeError } from "../client/errors.js";
import type { ApiResponse, CallParams } from "../client/types.js";
import { interruptibleSleep } from "../utils/sleep.js";
import type { JsonObject } from "../utils/records.js";
import type { DeadLetterQueue } from "./dead-letter.js";
import {
  eventAuth,
  eventDedupKey,
  eventMessageId,
  parseOfflineGet,
  validateApplicationToken,
  validateEventItem,
  validateOfflineGetResponse,
} from "./events.js";
import type { RetryBudget } from "./retry-budget.js";

/** The slice of the executor the worker needs. */
export interface OfflineQueueClient {
  call(method: string, params?: CallParams): Promise<ApiResponse>;
}

export type EventHandler = (item: JsonObject) => Promise<void>;

export interface OfflineWorkerOptions {
  client: OfflineQueueClient;
  tenantKey: string;
  retryBudget: RetryBudget;
  deadLetters: DeadLetterQueue;
  handler?: EventHandler;
  applicationToken?: string | null;
  idleSleepMs?: number;
  maxConsecutiveErrors?: number;
}

export interface CycleReport {
  count: number;
  processId: string | null;
  clearedIds: string[];
  errorIds: string[];
  pendingFailures: boolean;
}

function emptyCycle(processId: string | null): CycleReport {
  return { count: 0, processId, clearedIds: [], errorIds: [], pendingFailures: false };
}

async function acceptEvent(item: JsonObject): Promise<void> {
  logger.debug(
    `[offline-worker] No handler configured, accepting ${eventMessageId(item) ?? "event"}`,
  );
}

export class OfflineWorker {
  private readonly opts: OfflineWorkerOptions;
  private readonly handler: EventHandler;
  private readonly idleSleepMs: number;
  private readonly maxConsecutiveErrors: number;
  private readonly shutdown = new AbortController();

  constructor(opts: OfflineWorkerOptions) {
    this.opts = opts;
    this.handler = opts.handler ?? acceptEvent;
    this.idleSleepMs = Math.max(0, opts.idleSleepMs ?? 3000);
    this.maxConsecutiveErrors = Math.max(1, opts.maxConsecutiveErrors ?? 10);
  }

  get stopping(): boolean {
    return this.shutdown.signal.aborted;
  }

  /** Stop after the current cycle; an idle sleep ends immediately. */
  requestShutdown(): void {
    if (this.stopping) return;
    logger.info("[offline-worker] Shutdown requested, finishing current cycle");
    this.shutdown.abort();
  }

  /** Route SIGTERM and SIGINT to `requestShutdown`. Returns the disposer. */
  installSignalHandlers(): () => void {
    const onSignal = (signal: NodeJS.Signals) => {
      logger.info(`[offline-worker] Received ${signal}`);
      this.requestShutdown();
    };
    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
    return () => {
      process.off("SIGTERM", onSignal);
      process.off("SIGINT", onSignal);
    };
  }

  async runOnce(): Promise<CycleReport> {
    const { client, retryBudget, deadLetters, tenantKey } = this.opts;

    const response = await client.call("event.offline.get", { clear: "0" });
    const problem = validateOfflineGetResponse(response);
    if (problem) {
      throw new ApiError(`Invalid offline response schema: ${problem}`, {
        code: "INVALID_OFFLINE_RESPONSE_SCHEMA",
        kind: "validation",
        payload: { raw: response },
      });
    }

    const { processId, events } = parseOfflineGet(response);
    if (!processId || events.length === 0) {
      return emptyCycle(processId);
    }

    const clearedIds: string[] = [];
    const errorIds: string[] = [];
    let pendingFailures = false;

    try {
      for (const item of events) {
        const messageId = eventMessageId(item);

        const schemaError = validateEventItem(item);
        if (schemaError) {
          await deadLetters.append({
            tenant: tenantKey,
            item,
            error: `INVALID_EVENT_SCHEMA: ${schemaError}`,
            retries: 0,
          });
          if (messageId) {
            clearedIds.push(messageId);
            errorIds.push(messageId);
          } else {
            pendingFailures = true;
          }
          continue;
        }

        if (!validateApplicationToken(eventAuth(item), this.opts.applicationToken)) {
          logger.warn(
            `[offline-worker] SECURITY: invalid application_token for event ${messageId ?? "(no id)"}`,
          );
          pendingFailures = true;
          continue;
        }

        const dedupKey = eventDedupKey(item);
        try {
          await this.handler(item);
          retryBudget.clear(dedupKey);
          if (messageId) clearedIds.push(messageId);
        } catch (err) {
          const retries = retryBudget.fail(dedupKey);
          if (!retryBudget.exhausted(dedupKey)) {
            logger.warn(
              `[offline-worker] Event ${messageId ?? dedupKey} failed (${retries}/${retryBudget.maxRetries}): ${describeError(err)}`,
            );
            pendingFailures = true;
            continue;
          }
          await deadLetters.append({
            tenant: tenantKey,
            item,
            error: describeError(err),
            retries,
          });
          retryBudget.clear(dedupKey);
          logger.error(
            `[offline-worker] Event ${messageId ?? dedupKey} dead-lettered after ${retries} failures`,
          );
          if (messageId) {
            clearedIds.push(messageId);
            errorIds.push(messageId);
          }
        }
      }

      if (errorIds.length > 0) {
        await this.reportErrors(processId, errorIds);
      }

      // Full acknowledgment by process id when nothing is left retrying.
      if (!pendingFailures || clearedIds.length > 0) {
        const params: CallParams = { process_id: processId };
        if (clearedIds.length > 0) params.message_id = clearedIds;
        await client.call("event.offline.clear", params);
      }
    } finally {
      await retryBudget.save();
    }

    return { count: events.length, processId, clearedIds, errorIds, pendingFailures };
  }

  /**
   * Poll until shutdown. Resolves with the process exit code: 0 after a
   * graceful stop, 1 on a fatal error or a run of consecutive failures.
   */
  async run(options: { once?: boolean } = {}): Promise<number> {
    let consecutiveErrors = 0;

    while (!this.stopping) {
      try {
        const report = await this.runOnce();
        consecutiveErrors = 0;
        if (options.once) {
          logger.info(`[offline-worker] Processed batch size: ${report.count}`);
          return 0;
        }
        if (report.count === 0) {
          await interruptibleSleep(this.idleSleepMs, this.shutdown.signal);
        }
      } catch (err) {
        if (!(err instanceof ApiError)) throw err;
        consecutiveErrors += 1;
        logger.error(
          `[offline-worker] API error: code=${err.code} status=${err.status} msg=${err.message}`,
        );
        if (err.fatal) {
          logger.error(`[offline-worker] Error code ${err.code} is not recoverable, exiting`);
          return 1;
        }
        if (options.once) return 0;
        if (consecutiveErrors >= this.maxConsecutiveErrors) {
          logger.error(
            `[offline-worker] ${consecutiveErrors} consecutive errors, exiting`,
          );
          return 1;
        }
        await interruptibleSleep(this.idleSleepMs, this.shutdown.signal);
      }
    }

    logger.info("[offline-worker] Worker stopped gracefully");
    return 0;
  }

  private async reportErrors(processId: string, messageIds: string[]): Promise<void> {
    try {
      await this.opts.client.call("event.offline.error", {
        process_id: processId,
        message_id: messageIds,
      });
    } catch (err) {
      if (!(err instanceof ApiError)) throw err;
      logger.warn(
        `[offline-worker] Failed to report event.offline.error (${err.code}): ${err.message}`,
      );
    }
  }
}
