import type { SectionInput, SectionResult } from "../../src/beam/section.js";
import type { InputIssue } from "../../src/beam/errors.js";
import type { UnitSystem } from "../../src/beam/units.js";
import type { HistoryRecord } from "../../src/history-store.js";

export type { SectionInput, SectionResult, InputIssue, UnitSystem, HistoryRecord };

export interface CalculateResponse {
  input: SectionInput;
  result: SectionResult;
  record?: HistoryRecord;
}

export interface ReportResponse {
  summary: string;
  markdown: string;
}

/** Rejected request; `issues` holds the validation messages when the input was invalid */
export class ApiError extends Error {
  readonly status: number;
  readonly issues: InputIssue[];

  constructor(status: number, message: string, issues: InputIssue[] = []) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.issues = issues;
  }
}

async function request(path: string, init?: RequestInit): Promise<Response> {
  const res = await fetch(path, init);
  if (!res.ok) {
    let message = `HTTP ${res.status}`;
    let issues: InputIssue[] = [];
    try {
      const data = await res.json();
      if (typeof data.error === "string") message = data.error;
      if (Array.isArray(data.issues)) issues = data.issues;
    } catch {
      // Body was not JSON; keep the status message
    }
    throw new ApiError(res.status, message, issues);
  }
  return res;
}

function post(path: string, body: unknown): Promise<Response> {
  return request(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

export async function getDefaults(unit: UnitSystem): Promise<SectionInput> {
  const res = await request(`/api/defaults?unit_system=${unit}`);
  return res.json();
}

export async function calculate(
  fields: Record<string, string>,
  save = false,
): Promise<CalculateResponse> {
  const res = await post("/api/calculate", { ...fields, save });
  return res.json();
}

export async function getReport(fields: Record<string, string>): Promise<ReportResponse> {
  const res = await post("/api/report", fields);
  return res.json();
}

export async function getDiagram(fields: Record<string, string>): Promise<string> {
  const res = await post("/api/diagram", fields);
  return res.text();
}

// ─── History ──────────────────────────────────────────────────────────────

export async function listHistory(limit: number): Promise<HistoryRecord[]> {
  const res = await request(`/api/history?limit=${limit}`);
  const data = await res.json();
  return data.records;
}

export async function deleteHistory(id: number): Promise<void> {
  await request(`/api/history/${id}`, { method: "DELETE" });
}
