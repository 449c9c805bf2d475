import path from "node:path";

/** Directory holding every state file; `B24_STATE_DIR` or `./.runtime`. */
export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.B24_STATE_DIR?.trim();
  return path.resolve(override || ".runtime");
}

/** An explicit path from `env[name]`, else `fileName` inside the state dir. */
export function resolveStateFile(
  env: NodeJS.ProcessEnv,
  name: string,
  fileName: string,
): string {
  const explicit = env[name]?.trim();
  return explicit ? path.resolve(explicit) : path.join(resolveStateDir(env), fileName);
}
