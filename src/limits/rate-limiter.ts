/**
 * Per-tenant request rate limiting.
 *
 * The file-backed token bucket keeps its state outside the process so that
 * several workers and CLI invocations sharing one tenant respect a single
 * global rate. `acquire` never drops a request; it sleeps until a token is
 * available.
 */

import { logger } from "@elizaos/core";
import { z } from "zod";
import { mutateJsonState } from "../storage/json-state.js";
import { sleep } from "../utils/sleep.js";

export interface RateLimiter {
  acquire(key: string): Promise<void>;
  info(): RateLimiterInfo;
}

export interface RateLimiterInfo {
  mode: "noop" | "file";
  distributed: boolean;
}

export class NoopRateLimiter implements RateLimiter {
  async acquire(_key: string): Promise<void> {}

  info(): RateLimiterInfo {
    return { mode: "noop", distributed: false };
  }
}

export interface FileRateLimiterOptions {
  ratePerSec?: number;
  burst?: number;
  stateTtlSec?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const BucketSchema = z.object({
  last: z.number(),
  tokens: z.number(),
});

type Bucket = z.infer<typeof BucketSchema>;

export class FileRateLimiter implements RateLimiter {
  readonly stateFile: string;
  readonly ratePerSec: number;
  readonly burst: number;
  readonly stateTtlSec: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(stateFile: string, opts: FileRateLimiterOptions = {}) {
    this.stateFile = stateFile;
    this.ratePerSec = Math.max(opts.ratePerSec ?? 2, 0.1);
    this.burst = Math.max(opts.burst ?? 10, 1);
    this.stateTtlSec = Math.max(opts.stateTtlSec ?? 3600, 60);
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? sleep;
  }

  async acquire(key: string): Promise<void> {
    for (;;) {
      const waitSec = await this.reserve(key);
      if (waitSec <= 0) return;
      logger.debug(
        `[rate-limiter] ${key} throttled, waiting ${waitSec.toFixed(3)}s`,
      );
      await this.sleep(waitSec * 1000);
    }
  }

  /**
   * One locked reservation attempt. Returns 0 when a token was consumed,
   * otherwise the seconds needed to accumulate the missing fraction.
   */
  async reserve(key: string, nowMs = this.now()): Promise<number> {
    const nowSec = nowMs / 1000;
    return mutateJsonState(this.stateFile, (state) => {
      const parsed = BucketSchema.safeParse(state[key]);
      const previous: Bucket = parsed.success
        ? parsed.data
        : { last: nowSec, tokens: this.burst };

      const elapsed = Math.max(0, nowSec - previous.last);
      let tokens = Math.min(this.burst, previous.tokens + elapsed * this.ratePerSec);

      let wait = 0;
      if (tokens >= 1) {
        tokens -= 1;
      } else {
        wait = (1 - tokens) / this.ratePerSec;
      }

      const next: Record<string, unknown> = {};
      for (const [candidate, value] of Object.entries(state)) {
        if (candidate === key) continue;
        const bucket = BucketSchema.safeParse(value);
        if (!bucket.success) continue;
        if (nowSec - bucket.data.last > this.stateTtlSec) continue;
        next[candidate] = bucket.data;
      }
      next[key] = { last: nowSec, tokens };

      return { state: next, result: wait };
    });
  }

  info(): RateLimiterInfo {
    return { mode: "file", distributed: true };
  }
}

export interface RateLimiterConfig {
  mode: "file" | "off";
  stateFile: string;
  ratePerSec: number;
  burst: number;
  stateTtlSec: number;
}

/** Single switch-over point between the shared bucket and the no-op limiter. */
export function createRateLimiter(config: RateLimiterConfig): RateLimiter {
  if (config.mode === "off") return new NoopRateLimiter();
  return new FileRateLimiter(config.stateFile, {
    ratePerSec: config.ratePerSec,
    burst: config.burst,
    stateTtlSec: config.stateTtlSec,
  });
}
