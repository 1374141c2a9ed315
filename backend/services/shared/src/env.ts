// backend/services/shared/src/env.ts

/**
 * Why:
 * - Deterministic env-file loading for local runs and containers.
 * - Injected environment always wins: dotenv never overrides a key already in
 *   the target, and files listed earlier win over files listed later.
 *
 * Notes:
 * - Only loading lives here. Validation belongs to each service's config.
 * - `target` defaults to process.env; tests pass a plain object.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { expand } from "dotenv-expand";

export type EnvTarget = Record<string, string | undefined>;

/** Load a single env file if it exists; expand ${VAR} references; return true if loaded. */
function loadIfExists(absPath: string, target: EnvTarget): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.parse(fs.readFileSync(absPath));

  // Expansion sees the target's current values first, then the file's own keys.
  const scope: Record<string, string> = {};
  for (const [k, v] of Object.entries(target)) if (v !== undefined) scope[k] = v;
  const result = expand({ parsed, processEnv: scope });
  if (result.error) {
    throw new Error(
      `Failed to expand env file: ${absPath}: ${String(result.error)}`
    );
  }

  for (const [k, v] of Object.entries(result.parsed ?? {})) {
    if (target[k] === undefined) target[k] = v;
  }
  return true;
}

/**
 * Load several files in order. Returns the absolute paths that were loaded.
 * Throws if none loaded and allowMissing is false.
 */
export function loadEnvFiles(
  files: string[],
  opts: { target?: EnvTarget; allowMissing?: boolean; cwd?: string } = {}
): string[] {
  const target = opts.target ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const loaded: string[] = [];

  for (const f of files) {
    const abs = path.resolve(cwd, f);
    if (loadIfExists(abs, target)) loaded.push(abs);
  }

  if (!loaded.length && !opts.allowMissing) {
    throw new Error(`No env files loaded from: ${files.join(", ")}`);
  }
  return loaded;
}
