/**
 * File-backed JSON state shared between processes.
 *
 * Every read-modify-write cycle runs under an exclusive advisory lock
 * (`<file>.lock`), so independent processes pointing at the same file see a
 * serialized history. Writes go through a temp file + rename.
 */

import fs from "node:fs/promises";
import path from "node:path";
import lockfile from "proper-lockfile";
import { isRecord, type JsonObject } from "../utils/records.js";

export type { JsonObject };

export interface StateMutation<TResult> {
  state: JsonObject;
  result: TResult;
}

const LOCK_OPTIONS = {
  realpath: false,
  stale: 10_000,
  retries: { retries: 200, factor: 1.2, minTimeout: 5, maxTimeout: 100 },
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function parseState(raw: string): JsonObject {
  const trimmed = raw.trim();
  if (!trimmed) return {};
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecord(parsed) ? parsed : {};
  } catch {
    // A torn or hand-edited file starts over as empty state.
    return {};
  }
}

async function readRaw(file: string): Promise<string> {
  try {
    return await fs.readFile(file, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return "";
    throw err;
  }
}

async function writeAtomic(file: string, payload: string): Promise<void> {
  const temp = `${file}.${process.pid}.tmp`;
  await fs.writeFile(temp, payload, { encoding: "utf8", mode: 0o600 });
  await fs.rename(temp, file);
}

/** Run `fn` while holding the exclusive lock for `file`. */
export async function withFileLock<T>(
  file: string,
  fn: () => Promise<T>,
): Promise<T> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const release = await lockfile.lock(file, LOCK_OPTIONS);
  try {
    return await fn();
  } finally {
    await release();
  }
}

export async function readJsonState(file: string): Promise<JsonObject> {
  return withFileLock(file, async () => parseState(await readRaw(file)));
}

/**
 * Load, mutate and persist `file` as one locked cycle. If the mutator throws,
 * nothing is written and the error propagates to the caller.
 */
export async function mutateJsonState<TResult>(
  file: string,
  mutator: (state: JsonObject) => StateMutation<TResult>,
): Promise<TResult> {
  return withFileLock(file, async () => {
    const current = parseState(await readRaw(file));
    const { state, result } = mutator(current);
    await writeAtomic(file, JSON.stringify(state));
    return result;
  });
}

/** Replace `file` wholesale with `state`. */
export async function writeJsonState(
  file: string,
  state: JsonObject,
): Promise<void> {
  await withFileLock(file, () => writeAtomic(file, JSON.stringify(state, null, 2)));
}

/** Append one JSON document as a line, under the same lock discipline. */
export async function appendJsonLine(
  file: string,
  row: unknown,
): Promise<void> {
  await withFileLock(file, async () => {
    await fs.appendFile(file, `${JSON.stringify(row)}\n`, "utf8");
  });
}

/** Read every JSON line of `file`; blank lines are skipped. */
export async function readJsonLines(file: string): Promise<unknown[]> {
  const raw = await readRaw(file);
  const rows: unknown[] = [];
  for (const line of raw.split("\n")) {
    if (!line.trim()) continue;
    rows.push(JSON.parse(line));
  }
  return rows;
}
