import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { createLogger } from "../logging";

const log = createLogger({ component: "config" });

/**
 * Walk up from `startDir` to the monorepo root: the first directory holding a
 * `.env` file or a package.json that declares workspaces.
 */
function findProjectRoot(startDir: string): string {
  let dir = startDir;
  for (;;) {
    if (existsSync(resolve(dir, ".env"))) return dir;
    const pkgPath = resolve(dir, "package.json");
    if (existsSync(pkgPath) && declaresWorkspaces(pkgPath)) return dir;
    const parent = dirname(dir);
    if (parent === dir) return startDir;
    dir = parent;
  }
}

function declaresWorkspaces(pkgPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
    return typeof pkg === "object" && pkg !== null && "workspaces" in pkg;
  } catch (err) {
    log.debug({ pkgPath, err }, "Unreadable package.json while locating project root");
    return false;
  }
}

/**
 * Parse one value of a KEY=value line.
 * Quoted values keep everything up to the closing quote; unquoted values drop
 * a trailing ` # comment`.
 */
export function parseEnvValue(raw: string): string {
  const trimmed = raw.trim();
  const quote = trimmed[0];
  if (quote === '"' || quote === "'") {
    const close = trimmed.indexOf(quote, 1);
    if (close > 0) return trimmed.slice(1, close);
  }
  const comment = trimmed.search(/\s#/);
  return comment >= 0 ? trimmed.slice(0, comment).trimEnd() : trimmed;
}

export function parseEnvFile(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;
    const key = trimmed.slice(0, eq).replace(/^export\s+/, "").trim();
    out[key] = parseEnvValue(trimmed.slice(eq + 1));
  }
  return out;
}

/**
 * Load `.env` then `.env.local` from the project root into process.env.
 * Variables already set in the environment win.
 * Call before loadRuntimeEnv().
 */
export function loadDotEnvIfPresent(cwd: string = process.cwd()): void {
  const root = findProjectRoot(cwd);
  for (const filename of [".env", ".env.local"]) {
    const fullPath = resolve(root, filename);
    if (!existsSync(fullPath)) continue;
    let raw: string;
    try {
      raw = readFileSync(fullPath, "utf8");
    } catch (err) {
      log.warn({ filename, err }, "Failed to read env file");
      continue;
    }
    for (const [key, value] of Object.entries(parseEnvFile(raw))) {
      if (process.env[key] === undefined) process.env[key] = value;
    }
  }
}
