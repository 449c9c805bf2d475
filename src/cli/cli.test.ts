import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@elizaos/core", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn() },
}));

import { availablePacks } from "../safety/packs.js";
import { runCall, type CallCliOptions } from "./call-command.js";
import type { CliIO } from "./output.js";
import { runPacks } from "./packs-command.js";
import { buildProgram } from "./run-main.js";

function captureIO() {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = { out: (t) => out.push(t), err: (t) => err.push(t) };
  return { io, out, err };
}

const baseOptions: CallCliOptions = {
  params: "{}",
  maskSecrets: true,
  audit: true,
  idempotency: true,
};

let tmpDir: string;
let env: NodeJS.ProcessEnv;
let mockFetch: ReturnType<typeof vi.fn>;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "relay-cli-"));
  env = {
    B24_DOMAIN: "portal.example.test",
    B24_WEBHOOK_USER_ID: "1",
    B24_WEBHOOK_CODE: "test-secret",
    B24_STATE_DIR: tmpDir,
    B24_RATE_LIMITER: "off",
  };
  mockFetch = vi.fn().mockResolvedValue({
    status: 200,
    ok: true,
    text: async () => JSON.stringify({ result: 7 }),
  });
  vi.stubGlobal("fetch", mockFetch);
});

afterEach(async () => {
  vi.unstubAllGlobals();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("buildProgram", () => {
  it("registers the call, packs and worker commands", () => {
    expect(buildProgram().commands.map((c) => c.name())).toEqual(["call", "packs", "worker"]);
  });
});

describe("runPacks", () => {
  it("prints defaults, available and selected packs", () => {
    const { io, out } = captureIO();
    expect(runPacks("comms,core", {}, io)).toBe(0);

    const printed = JSON.parse(out[0] ?? "{}") as {
      defaultPacks: string[];
      availablePacks: Record<string, string[]>;
      selectedPacks: string[];
    };
    expect(printed.defaultPacks).toEqual(["core"]);
    expect(Object.keys(printed.availablePacks).sort()).toEqual(availablePacks());
    expect(printed.selectedPacks).toEqual(["comms", "core"]);
  });

  it("falls back to B24_PACKS", () => {
    const { io, out } = captureIO();
    runPacks(undefined, { B24_PACKS: "none" }, io);
    expect((JSON.parse(out[0] ?? "{}") as { selectedPacks: string[] }).selectedPacks).toEqual([]);
  });

  it("exits 2 on an unknown pack", () => {
    const { io, err } = captureIO();
    expect(runPacks("bogus", {}, io)).toBe(2);
    expect(err).toEqual([
      `Error: unknown pack 'bogus', available packs: ${availablePacks().join(", ")} (UNKNOWN_PACK)`,
    ]);
  });
});

describe("runCall", () => {
  it("rejects params that are not a JSON object", async () => {
    const bad = captureIO();
    expect(await runCall("user.current", { ...baseOptions, params: "{" }, env, bad.io)).toBe(2);
    expect(bad.err[0]).toMatch(/^Error: invalid JSON in --params: /);

    const list = captureIO();
    expect(await runCall("user.current", { ...baseOptions, params: "[1]" }, env, list.io)).toBe(2);
    expect(list.err).toEqual(["Error: --params must decode to a JSON object"]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("prints the response of a read call", async () => {
    const { io, out } = captureIO();
    expect(await runCall("user.current", baseOptions, env, io)).toBe(0);
    expect(out).toEqual([JSON.stringify({ result: 7 }, null, 2)]);
  });

  it("reports a missing domain as a usage error", async () => {
    const { io, err } = captureIO();
    expect(await runCall("user.current", baseOptions, { B24_STATE_DIR: tmpDir }, io)).toBe(2);
    expect(err).toEqual(["Error: B24_DOMAIN is required (MISSING_DOMAIN)"]);
  });

  it("reports upstream errors with exit code 1", async () => {
    mockFetch.mockResolvedValue({
      status: 401,
      ok: false,
      text: async () =>
        JSON.stringify({ error: "INVALID_CREDENTIALS", error_description: "Invalid request credentials" }),
    });
    const { io, err } = captureIO();
    expect(await runCall("user.current", baseOptions, env, io)).toBe(1);
    expect(err).toEqual([
      "API error: code=INVALID_CREDENTIALS status=401 msg=Invalid request credentials",
    ]);
  });

  it("creates a plan and executes it by id", async () => {
    const plan = captureIO();
    expect(
      await runCall(
        "crm.lead.add",
        { ...baseOptions, params: '{"fields":{"TITLE":"Lead"}}', planOnly: true },
        env,
        plan.io,
      ),
    ).toBe(0);
    expect(mockFetch).not.toHaveBeenCalled();

    const printed = JSON.parse(plan.out[0] ?? "{}") as {
      plan: { planId: string; risk: string };
      next: { executeCommand: string };
    };
    expect(printed.plan.risk).toBe("write");
    expect(printed.next.executeCommand).toBe(
      `b24-relay call --execute-plan ${printed.plan.planId}`,
    );

    const run = captureIO();
    expect(
      await runCall(undefined, { ...baseOptions, executePlan: printed.plan.planId }, env, run.io),
    ).toBe(0);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(run.out).toEqual([JSON.stringify({ result: 7 }, null, 2)]);

    const auditLines = (await fs.readFile(path.join(tmpDir, "audit.jsonl"), "utf8"))
      .trim()
      .split("\n")
      .map((line) => (JSON.parse(line) as { type: string }).type);
    expect(auditLines).toEqual(["plan_created", "call_executed"]);
  });

  it("refuses an unconfirmed write", async () => {
    const { io, err } = captureIO();
    expect(await runCall("crm.lead.add", baseOptions, env, io)).toBe(2);
    expect(err).toEqual([
      "Error: write method detected; confirm the write to execute (CONFIRMATION_REQUIRED)",
    ]);
  });
});
