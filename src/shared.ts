/**
 * Shared setup code used by both the CLI (entry.ts) and the web server (server.ts).
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";

// ─── .env loading ────────────────────────────────────────────────────────────

export function loadDotEnv(envPath: string = path.join(process.cwd(), ".env")) {
  let content: string;
  try {
    content = fs.readFileSync(envPath, "utf-8");
  } catch {
    // No .env file
    return;
  }
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim();
    if (key && !(key in process.env)) {
      process.env[key] = value;
    }
  }
}

// Load .env immediately so env vars are available for module-level constants
loadDotEnv();

// ─── Configuration ───────────────────────────────────────────────────────────

export const APP_NAME = "rc-flexure";
export const APP_VERSION = "1.0.0";

export const APP_HOME = process.env.RC_FLEXURE_HOME ?? path.join(os.homedir(), ".rc-flexure");
export const HISTORY_DIR = process.env.RC_FLEXURE_HISTORY_DIR ?? path.join(APP_HOME, "history");

export const PORT = parseInt(process.env.PORT ?? "3001", 10);
export const HISTORY_LIMIT = parsePositiveInt(process.env.RC_FLEXURE_HISTORY_LIMIT, 10);

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

// ─── Ensure directories ─────────────────────────────────────────────────────

export function ensureDirs() {
  for (const dir of [APP_HOME, HISTORY_DIR]) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

// ─── Terminal styling ───────────────────────────────────────────────────────

export const dim = (text: string) => `\x1b[2m${text}\x1b[0m`;
export const red = (text: string) => `\x1b[31m${text}\x1b[0m`;
export const bold = (text: string) => `\x1b[1m${text}\x1b[0m`;
