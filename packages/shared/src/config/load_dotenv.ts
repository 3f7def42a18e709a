import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

// No logger import here: the CLI loads this before pino reads LOG_LEVEL.

/** Read in order; a later file overrides an earlier one. */
export const DOTENV_FILES = [".env", ".env.local"] as const;

const SWEEP_KEY_RE = /^(SWEEP_[A-Z0-9_]+|LOG_LEVEL|NODE_ENV)$/;
const LINE_RE = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=(.*)$/;

export interface DotEnvLoad {
  files: string[];
  /** Keys written into the target environment. */
  applied: string[];
  /** Keys found in a file that archive-sweep does not read. */
  ignored: string[];
}

function unquote(raw: string, quote: string): string {
  let out = "";
  for (let i = 1; i < raw.length; i += 1) {
    const ch = raw.charAt(i);
    if (ch === "\\" && i + 1 < raw.length) {
      i += 1;
      out += raw.charAt(i);
      continue;
    }
    if (ch === quote) return out;
    out += ch;
  }
  // Unclosed quote: keep the text as written.
  return raw;
}

function parseValue(rawValue: string): string {
  const value = rawValue.trim();
  const first = value.charAt(0);
  if (first === '"' || first === "'") return unquote(value, first);
  // ` # note` ends an unquoted value; `a#b` keeps its hash.
  const comment = value.search(/\s#/);
  return comment === -1 ? value : value.slice(0, comment).trimEnd();
}

/** `KEY=value` pairs of a dotenv file, in file order. */
export function parseDotEnv(raw: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;
    const match = LINE_RE.exec(trimmed);
    if (!match?.[1]) continue;
    pairs.push([match[1], parseValue(match[2] ?? "")]);
  }
  return pairs;
}

/**
 * Load the `SWEEP_*` settings (plus `LOG_LEVEL` and `NODE_ENV`) from `.env`
 * and `.env.local` in `dir`. Variables already set in `env` win over both
 * files; other keys in the files are reported, not applied.
 */
export function loadSweepDotEnv(
  dir: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): DotEnvLoad {
  const fromFiles = new Map<string, string>();
  const ignored = new Set<string>();
  const files: string[] = [];

  for (const name of DOTENV_FILES) {
    const path = resolve(dir, name);
    if (!existsSync(path)) continue;
    files.push(path);
    for (const [key, value] of parseDotEnv(readFileSync(path, "utf8"))) {
      if (SWEEP_KEY_RE.test(key)) fromFiles.set(key, value);
      else ignored.add(key);
    }
  }

  const applied: string[] = [];
  for (const [key, value] of fromFiles) {
    if (env[key] !== undefined) continue;
    env[key] = value;
    applied.push(key);
  }
  return { files, applied, ignored: [...ignored] };
}
