import { Command } from "commander";
import { registerCallCommand } from "./call-command.js";
import { registerPacksCommand } from "./packs-command.js";
import { registerWorkerCommand } from "./worker-command.js";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("b24-relay")
    .description("Guarded REST calls and offline event draining for portal tenants")
    .option("--debug", "Debug logging")
    .option("--verbose", "Info logging")
    .option("--no-color", "Disable colored output");

  registerCallCommand(program);
  registerPacksCommand(program);
  registerWorkerCommand(program);
  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  await buildProgram().parseAsync(argv);
}
