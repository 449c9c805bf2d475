import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@elizaos/core", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn() },
}));

import { ApiError } from "../client/errors.js";
import type { ApiResponse, CallParams } from "../client/types.js";
import type { JsonObject } from "../utils/records.js";
import { DeadLetterQueue } from "./dead-letter.js";
import { eventDedupKey } from "./events.js";
import { RetryBudget } from "./retry-budget.js";
import { OfflineWorker, type OfflineQueueClient } from "./worker.js";

interface RecordedCall {
  method: string;
  params: CallParams;
}

/** In-memory offline queue that honors clear by message id or process id. */
class FakeQueue implements OfflineQueueClient {
  readonly calls: RecordedCall[] = [];
  getResponse: (() => ApiResponse) | null = null;

  constructor(public items: JsonObject[], readonly processId = "p1") {}

  async call(method: string, params: CallParams = {}): Promise<ApiResponse> {
    this.calls.push({ method, params });
    if (method === "event.offline.get") {
      if (this.getResponse) return this.getResponse();
      return { result: { process_id: this.processId, events: [...this.items] } };
    }
    if (method === "event.offline.clear") {
      const ids = params.message_id;
      this.items = Array.isArray(ids)
        ? this.items.filter((item) => !ids.includes(item.message_id))
        : [];
    }
    return { result: true };
  }

  callsTo(method: string): CallParams[] {
    return this.calls.filter((c) => c.method === method).map((c) => c.params);
  }
}

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "relay-worker-"));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function setup(
  queue: OfflineQueueClient,
  opts: {
    handler?: (item: JsonObject) => Promise<void>;
    applicationToken?: string;
    maxRetries?: number;
    maxConsecutiveErrors?: number;
    idleSleepMs?: number;
  } = {},
) {
  const retryFile = path.join(tmpDir, "retry.json");
  const retryBudget = await RetryBudget.open(retryFile, opts.maxRetries ?? 2);
  const deadLetters = new DeadLetterQueue(path.join(tmpDir, "dlq.jsonl"), () => 1_700_000_000_000);
  const worker = new OfflineWorker({
    client: queue,
    tenantKey: "portal.example.test",
    retryBudget,
    deadLetters,
    handler: opts.handler,
    applicationToken: opts.applicationToken,
    idleSleepMs: opts.idleSleepMs ?? 0,
    maxConsecutiveErrors: opts.maxConsecutiveErrors,
  });
  return { worker, retryBudget, deadLetters, retryFile };
}

const malformed = { message_id: "m1", event: "ONCRMDEALADD", data: "broken" };
const flaky = { message_id: "m2", event: "ONCRMDEALUPDATE", data: { id: 2 } };
const healthy = { message_id: "m3", event: "ONCRMDEALADD", data: { id: 3 } };

describe("OfflineWorker.runOnce", () => {
  it("acknowledges only resolved events and dead-letters after the budget", async () => {
    const queue = new FakeQueue([malformed, flaky, healthy]);
    const handler = vi.fn(async (item: JsonObject) => {
      if (item.message_id === "m2") throw new Error("handler down");
    });
    const { worker, deadLetters, retryFile } = await setup(queue, { handler });

    const first = await worker.runOnce();
    expect(first).toEqual({
      count: 3,
      processId: "p1",
      clearedIds: ["m1", "m3"],
      errorIds: ["m1"],
      pendingFailures: true,
    });
    expect(queue.callsTo("event.offline.get")).toEqual([{ clear: "0" }]);
    expect(queue.callsTo("event.offline.error")).toEqual([
      { process_id: "p1", message_id: ["m1"] },
    ]);
    expect(queue.callsTo("event.offline.clear")).toEqual([
      { process_id: "p1", message_id: ["m1", "m3"] },
    ]);
    expect(queue.items).toEqual([flaky]);
    expect(Object.values(JSON.parse(await fs.readFile(retryFile, "utf8")))).toEqual([1]);

    const second = await worker.runOnce();
    expect(second).toMatchObject({ clearedIds: ["m2"], errorIds: ["m2"], pendingFailures: false });
    expect(queue.items).toEqual([]);

    const rows = await deadLetters.readAll();
    expect(rows.map((r) => [r.messageId, r.retryCount, r.error])).toEqual([
      ["m1", 0, "INVALID_EVENT_SCHEMA: data field must be an object"],
      ["m2", 2, "handler down"],
    ]);
    expect(JSON.parse(await fs.readFile(retryFile, "utf8"))).toEqual({});
  });

  it("resets the retry counter when a redelivered event succeeds", async () => {
    const queue = new FakeQueue([flaky]);
    let calls = 0;
    const handler = vi.fn(async () => {
      calls += 1;
      if (calls === 1) throw new Error("handler down");
    });
    const { worker, retryBudget, retryFile } = await setup(queue, { handler, maxRetries: 3 });
    const key = eventDedupKey(flaky);

    const first = await worker.runOnce();
    expect(first.pendingFailures).toBe(true);
    expect(retryBudget.count(key)).toBe(1);
    expect(queue.callsTo("event.offline.clear")).toEqual([]);

    queue.items = [{ ...flaky, message_id: "m7" }];
    const second = await worker.runOnce();

    expect(second).toMatchObject({ clearedIds: ["m7"], errorIds: [], pendingFailures: false });
    expect(retryBudget.count(key)).toBe(0);
    expect(queue.callsTo("event.offline.clear")).toEqual([
      { process_id: "p1", message_id: ["m7"] },
    ]);
    expect(JSON.parse(await fs.readFile(retryFile, "utf8"))).toEqual({});
  });

  it("clears the whole process when events carry no message id", async () => {
    const queue = new FakeQueue([{ event: "ONCRMLEADADD", data: { id: 1 } }]);
    const { worker } = await setup(queue);

    const report = await worker.runOnce();
    expect(report.clearedIds).toEqual([]);
    expect(queue.callsTo("event.offline.clear")).toEqual([{ process_id: "p1" }]);
  });

  it("leaves events with a bad application token queued", async () => {
    const queue = new FakeQueue([
      { message_id: "m1", event: "ONCRMLEADADD", data: {}, auth: { application_token: "wrong" } },
    ]);
    const handler = vi.fn(async () => {});
    const { worker } = await setup(queue, { handler, applicationToken: "test-token" });

    const report = await worker.runOnce();
    expect(report.pendingFailures).toBe(true);
    expect(handler).not.toHaveBeenCalled();
    expect(queue.callsTo("event.offline.clear")).toEqual([]);
  });

  it("rejects a malformed queue response", async () => {
    const queue = new FakeQueue([]);
    queue.getResponse = () => ({ result: { process_id: 42 } });
    const { worker } = await setup(queue);

    await expect(worker.runOnce()).rejects.toMatchObject({
      code: "INVALID_OFFLINE_RESPONSE_SCHEMA",
      kind: "validation",
    });
  });

  it("does nothing for an empty queue", async () => {
    const queue = new FakeQueue([]);
    const { worker } = await setup(queue);

    expect(await worker.runOnce()).toEqual({
      count: 0,
      processId: "p1",
      clearedIds: [],
      errorIds: [],
      pendingFailures: false,
    });
    expect(queue.calls).toHaveLength(1);
  });

  it("returns independent lists for every empty cycle", async () => {
    const { worker } = await setup(new FakeQueue([]));

    const first = await worker.runOnce();
    first.clearedIds.push("m1");
    first.errorIds.push("m1");
    const second = await worker.runOnce();

    expect(second.clearedIds).toEqual([]);
    expect(second.errorIds).toEqual([]);
  });
});

describe("OfflineWorker.run", () => {
  it("processes one batch in once mode", async () => {
    const queue = new FakeQueue([healthy]);
    const { worker } = await setup(queue);

    expect(await worker.run({ once: true })).toBe(0);
    expect(queue.items).toEqual([]);
  });

  it("exits 0 in once mode after a recoverable error", async () => {
    const queue = new FakeQueue([]);
    queue.getResponse = () => {
      throw new ApiError("busy", { status: 503 });
    };
    const { worker } = await setup(queue);

    expect(await worker.run({ once: true })).toBe(0);
  });

  it("exits 1 on a fatal error", async () => {
    const queue = new FakeQueue([]);
    queue.getResponse = () => {
      throw new ApiError("denied", { status: 401, code: "INVALID_CREDENTIALS" });
    };
    const { worker } = await setup(queue);

    expect(await worker.run()).toBe(1);
  });

  it("exits 1 after too many consecutive errors", async () => {
    const queue = new FakeQueue([]);
    queue.getResponse = () => {
      throw new ApiError("busy", { status: 503 });
    };
    const { worker } = await setup(queue, { maxConsecutiveErrors: 3 });

    expect(await worker.run()).toBe(1);
    expect(queue.callsTo("event.offline.get")).toHaveLength(3);
  });

  it("rethrows errors that are not API errors", async () => {
    const queue = new FakeQueue([]);
    queue.getResponse = () => {
      throw new TypeError("bug");
    };
    const { worker } = await setup(queue);

    await expect(worker.run()).rejects.toThrow("bug");
  });

  it("stops gracefully when shutdown interrupts the idle sleep", async () => {
    const queue = new FakeQueue([]);
    const { worker } = await setup(queue, { idleSleepMs: 60_000 });

    const running = worker.run();
    await vi.waitFor(() => expect(queue.calls).toHaveLength(1));
    worker.requestShutdown();

    expect(await running).toBe(0);
    expect(worker.stopping).toBe(true);
  });
});
