import type { Command } from "commander";
import { ApiError } from "../client/errors.js";
import { DEFAULT_PACKS, PACK_METHOD_ALLOWLIST, parsePackList } from "../safety/packs.js";
import { EXIT_OK, printJson, processIO, reportError, type CliIO } from "./output.js";

export function runPacks(
  packs: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  io: CliIO = processIO,
): number {
  try {
    const selected = parsePackList(packs ?? env.B24_PACKS);
    printJson(io, {
      defaultPacks: DEFAULT_PACKS,
      availablePacks: PACK_METHOD_ALLOWLIST,
      selectedPacks: selected,
    });
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ApiError) return reportError(io, err);
    throw err;
  }
}

export function registerPacksCommand(program: Command): void {
  program
    .command("packs")
    .description("Print default, available and selected capability packs")
    .option("--packs <names>", "Comma separated capability packs, or 'none'")
    .action((options: { packs?: string }) => {
      process.exitCode = runPacks(options.packs);
    });
}
