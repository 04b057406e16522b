/**
 * Calculation history for rc-flexure.
 *
 * Past calculations live in a single JSON file (`calculations.json`) under the
 * history directory. Each record keeps the input exactly as computed and the
 * full result, so a record can be re-rendered without recomputing.
 */
import fs from "node:fs";
import path from "node:path";
import { HISTORY_DIR } from "./shared.js";
import type { SectionInput, SectionResult } from "./beam/section.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface HistoryRecord {
  id: number;
  timestamp: string;
  inputs: SectionInput;
  results: SectionResult;
}

interface HistoryFile {
  nextId: number;
  records: HistoryRecord[];
  updatedAt: string;
}

interface HistoryStoreConfig {
  baseDir: string;
  /** Clock used for record timestamps */
  now?: () => Date;
}

const HISTORY_FILENAME = "calculations.json";

function isHistoryFile(value: unknown): value is HistoryFile {
  if (value === null || typeof value !== "object") return false;
  return "records" in value && Array.isArray(value.records) && "nextId" in value && typeof value.nextId === "number";
}

// ─── HistoryStore ───────────────────────────────────────────────────────────

export class HistoryStore {
  private config: HistoryStoreConfig;

  constructor(config: HistoryStoreConfig) {
    this.config = config;
  }

  get baseDir(): string {
    return this.config.baseDir;
  }

  private filePath(): string {
    return path.join(this.config.baseDir, HISTORY_FILENAME);
  }

  private now(): Date {
    return this.config.now ? this.config.now() : new Date();
  }

  private read(): HistoryFile {
    const empty: HistoryFile = { nextId: 1, records: [], updatedAt: "" };
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(this.filePath(), "utf-8"));
    } catch {
      // Missing or unparsable file
      return empty;
    }
    return isHistoryFile(data) ? data : empty;
  }

  private write(data: HistoryFile): void {
    fs.mkdirSync(this.config.baseDir, { recursive: true });
    data.updatedAt = this.now().toISOString();
    fs.writeFileSync(this.filePath(), JSON.stringify(data, null, 2), "utf-8");
  }

  // ─── Operations ─────────────────────────────────────────────────────────

  save(inputs: SectionInput, results: SectionResult): HistoryRecord {
    const data = this.read();
    const record: HistoryRecord = {
      id: data.nextId,
      timestamp: this.now().toISOString(),
      inputs,
      results,
    };
    data.records.push(record);
    data.nextId += 1;
    this.write(data);
    return record;
  }

  /** Most recent first */
  list(limit = 10): HistoryRecord[] {
    return this.read().records.slice().reverse().slice(0, Math.max(0, limit));
  }

  get(id: number): HistoryRecord | null {
    return this.read().records.find((r) => r.id === id) ?? null;
  }

  delete(id: number): boolean {
    const data = this.read();
    const idx = data.records.findIndex((r) => r.id === id);
    if (idx === -1) return false;
    data.records.splice(idx, 1);
    this.write(data);
    return true;
  }

  clear(): void {
    const data = this.read();
    data.records = [];
    this.write(data);
  }
}

/** Create a HistoryStore from environment configuration */
export function createHistoryStore(): HistoryStore {
  return new HistoryStore({ baseDir: HISTORY_DIR });
}
