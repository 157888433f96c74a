/**
 * Classguard Runtime Host: CLASSGUARD_HOME Resolution
 *
 * Resolves the classguard home directory:
 *
 *   1. Explicit `home` option (e.g. the CLI's --home flag)
 *   2. CLASSGUARD_HOME environment variable
 *   3. Default: ~/.classguard
 *
 * Layout:
 *
 *   <CLASSGUARD_HOME>/
 *     logs/
 *       decisions.jsonl
 *
 * resolveClassguardHome() only computes the path. ensureClassguardHome()
 * also creates the directory.
 */

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

export const HOME_ENV_VAR = 'CLASSGUARD_HOME';

export interface ResolveClassguardHomeOptions {
  /** Highest precedence. Relative paths resolve against the working directory. */
  readonly home?: string | undefined;
  /** Environment to read CLASSGUARD_HOME from. Defaults to process.env. */
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** User home directory. Defaults to os.homedir(). */
  readonly userHome?: string;
}

function nonEmpty(value: string | undefined): value is string {
  return typeof value === 'string' && value !== '';
}

/**
 * @returns An absolute path. Nothing is created.
 */
export function resolveClassguardHome(opts: ResolveClassguardHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const fromEnv = env[HOME_ENV_VAR];

  let home: string;
  if (nonEmpty(opts.home)) {
    home = opts.home;
  } else if (nonEmpty(fromEnv)) {
    home = fromEnv;
  } else {
    home = join(opts.userHome ?? homedir(), '.classguard');
  }
  return isAbsolute(home) ? home : resolve(home);
}

/** Resolve the home directory and create it if missing. */
export function ensureClassguardHome(opts: ResolveClassguardHomeOptions = {}): string {
  const home = resolveClassguardHome(opts);
  mkdirSync(home, { recursive: true });
  return home;
}
