import { z } from "zod";
import { readJsonState, writeJsonState } from "../storage/json-state.js";

const CountersSchema = z.record(z.number().int().nonnegative());

/**
 * Failure counters per event dedup key. Counters live in memory during a
 * cycle and are persisted by `save()`.
 */
export class RetryBudget {
  readonly stateFile: string;
  readonly maxRetries: number;
  private counters: Record<string, number>;

  private constructor(
    stateFile: string,
    maxRetries: number,
    counters: Record<string, number>,
  ) {
    this.stateFile = stateFile;
    this.maxRetries = Math.max(1, maxRetries);
    this.counters = counters;
  }

  /** Load counters from `stateFile`; unreadable state starts empty. */
  static async open(stateFile: string, maxRetries: number): Promise<RetryBudget> {
    const parsed = CountersSchema.safeParse(await readJsonState(stateFile));
    return new RetryBudget(stateFile, maxRetries, parsed.success ? parsed.data : {});
  }

  /** Record one more failure for `key` and return the new count. */
  fail(key: string): number {
    const count = (this.counters[key] ?? 0) + 1;
    this.counters[key] = count;
    return count;
  }

  clear(key: string): void {
    delete this.counters[key];
  }

  exhausted(key: string): boolean {
    return this.count(key) >= this.maxRetries;
  }

  count(key: string): number {
    return this.counters[key] ?? 0;
  }

  async save(): Promise<void> {
    await writeJsonState(this.stateFile, { ...this.counters });
  }
}
