import type { ApiError } from "../client/errors.js";
import { maskSecrets } from "../security/secrets.js";

export const EXIT_OK = 0;
export const EXIT_API_ERROR = 1;
export const EXIT_USAGE_ERROR = 2;

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

export const processIO: CliIO = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

export function printJson(io: CliIO, value: unknown, mask = true): void {
  const text = JSON.stringify(value, null, 2);
  io.out(mask ? maskSecrets(text) : text);
}

/** Workflow and validation errors are caller mistakes; the rest came from upstream. */
export function reportError(io: CliIO, error: ApiError): number {
  if (error.kind === "workflow" || error.kind === "validation") {
    io.err(`Error: ${maskSecrets(error.message)} (${error.code})`);
    return EXIT_USAGE_ERROR;
  }
  io.err(
    `API error: code=${error.code} status=${error.status} msg=${maskSecrets(error.message)}`,
  );
  return EXIT_API_ERROR;
}
