/**
 * HTTP API routes for rc-flexure.
 *
 * Kept independent of node:http so the routing can be exercised directly:
 * server.ts adapts IncomingMessage / ServerResponse to ApiRequest / ApiResponse.
 */
import { compute } from "./beam/section.js";
import { defaultsFor } from "./beam/defaults.js";
import { sectionInputFromRecord } from "./beam/input.js";
import { InvalidGeometryError } from "./beam/errors.js";
import { parseUnitSystem, type UnitSystem } from "./beam/units.js";
import { formatSummary, renderReport } from "./report/report.js";
import { renderSectionSvg } from "./report/diagrams.js";
import { toParams, type ToolDefinition } from "./tools/types.js";
import type { HistoryStore } from "./history-store.js";
import { APP_NAME, APP_VERSION, parsePositiveInt } from "./shared.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ApiRequest {
  method: string;
  pathname: string;
  query: URLSearchParams;
  body: string;
}

export interface ApiResponse {
  status: number;
  contentType: string;
  body: string;
}

export interface ApiContext {
  store: HistoryStore;
  tools: ToolDefinition[];
  historyLimit: number;
}

export type ApiHandler = (req: ApiRequest) => Promise<ApiResponse | null>;

/** Thrown for malformed requests that are not input-validation failures */
class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function json(status: number, data: unknown): ApiResponse {
  return { status, contentType: "application/json", body: JSON.stringify(data) };
}

function parseBody(body: string): Record<string, unknown> {
  if (!body.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new BadRequestError("Invalid JSON body.");
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new BadRequestError("Expected a JSON object body.");
  }
  return toParams(parsed);
}

function decodeSegment(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new BadRequestError(`Malformed path segment "${raw}".`);
  }
}

function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new BadRequestError(`Invalid history id "${raw}".`);
  }
  return id;
}

function errorResponse(err: unknown): ApiResponse {
  if (err instanceof InvalidGeometryError) {
    return json(400, { error: err.message, issues: err.issues });
  }
  if (err instanceof BadRequestError) {
    return json(400, { error: err.message });
  }
  const message = err instanceof Error ? err.message : String(err);
  return json(500, { error: message });
}

function calculate(body: string) {
  const params = parseBody(body);
  const input = sectionInputFromRecord(params);
  return { params, input, result: compute(input) };
}

// ─── Routes ──────────────────────────────────────────────────────────────────

export function createApiHandler(ctx: ApiContext): ApiHandler {
  const toolsByName = new Map(ctx.tools.map((t) => [t.name, t]));

  async function route(req: ApiRequest): Promise<ApiResponse | null> {
    const { method, pathname, query } = req;

    if (method === "GET" && pathname === "/api/status") {
      return json(200, {
        name: APP_NAME,
        version: APP_VERSION,
        tools: ctx.tools.map((t) => t.name),
        historyDir: ctx.store.baseDir,
      });
    }

    if (method === "GET" && pathname === "/api/defaults") {
      let unit: UnitSystem;
      try {
        unit = parseUnitSystem(query.get("unit_system") ?? "imperial");
      } catch (err) {
        throw new BadRequestError(err instanceof Error ? err.message : String(err));
      }
      return json(200, defaultsFor(unit));
    }

    if (method === "POST" && pathname === "/api/calculate") {
      const { params, input, result } = calculate(req.body);
      const record = params.save === true ? ctx.store.save(input, result) : undefined;
      return json(200, { input, result, record });
    }

    if (method === "POST" && pathname === "/api/report") {
      const { input, result } = calculate(req.body);
      return json(200, { summary: formatSummary(input, result), markdown: renderReport(input, result) });
    }

    if (method === "POST" && pathname === "/api/diagram") {
      const { input, result } = calculate(req.body);
      return { status: 200, contentType: "image/svg+xml", body: renderSectionSvg(input, result) };
    }

    if (pathname === "/api/history") {
      if (method === "GET") {
        const limit = parsePositiveInt(query.get("limit") ?? undefined, ctx.historyLimit);
        return json(200, { records: ctx.store.list(limit) });
      }
      if (method === "DELETE") {
        ctx.store.clear();
        return json(200, { cleared: true });
      }
    }

    if (pathname.startsWith("/api/history/")) {
      const id = parseId(decodeSegment(pathname.slice("/api/history/".length)));
      if (method === "GET") {
        const record = ctx.store.get(id);
        return record ? json(200, record) : json(404, { error: "Record not found" });
      }
      if (method === "DELETE") {
        return ctx.store.delete(id)
          ? json(200, { deleted: true, id })
          : json(404, { error: "Record not found" });
      }
    }

    if (method === "GET" && pathname === "/api/tools") {
      return json(200, {
        tools: ctx.tools.map((t) => ({
          name: t.name,
          label: t.label,
          description: t.description,
          parameters: t.parameters,
        })),
      });
    }

    if (method === "POST" && pathname.startsWith("/api/tools/")) {
      const name = decodeSegment(pathname.slice("/api/tools/".length));
      const tool = toolsByName.get(name);
      if (!tool) return json(404, { error: `Unknown tool "${name}"` });
      const args = parseBody(req.body);
      try {
        return json(200, await tool.execute(`http-${Date.now()}`, args));
      } catch (err) {
        // Argument errors from a tool are the caller's fault
        if (err instanceof Error && !(err instanceof InvalidGeometryError)) {
          throw new BadRequestError(err.message);
        }
        throw err;
      }
    }

    if (pathname.startsWith("/api/")) {
      return json(404, { error: "Not found" });
    }

    return null;
  }

  return async (req) => {
    try {
      return await route(req);
    } catch (err) {
      return errorResponse(err);
    }
  };
}
