#!/usr/bin/env node
/**
 * rc-flexure web server: JSON API plus the built React client from web/dist.
 */
import http from "node:http";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ensureDirs, dim, HISTORY_LIMIT, PORT, APP_NAME } from "./shared.js";
import { createAllToolDefinitions } from "./tools/index.js";
import { createHistoryStore } from "./history-store.js";
import { createApiHandler, type ApiResponse } from "./api.js";

// ─── Static file serving ────────────────────────────────────────────────────

const MIME_TYPES: Record<string, string> = {
  ".html": "text/html",
  ".js": "application/javascript",
  ".css": "text/css",
  ".json": "application/json",
  ".png": "image/png",
  ".svg": "image/svg+xml",
  ".ico": "image/x-icon",
  ".woff2": "font/woff2",
};

// dist/server.js and src/server.ts both sit one level below the project root
const STATIC_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../web/dist");

function serveStatic(res: http.ServerResponse, pathname: string): boolean {
  let filePath = path.join(STATIC_DIR, pathname);

  // Prevent path traversal
  if (!filePath.startsWith(STATIC_DIR)) {
    return false;
  }

  if (fs.existsSync(filePath) && fs.statSync(filePath).isDirectory()) {
    filePath = path.join(filePath, "index.html");
  }

  if (!fs.existsSync(filePath)) {
    return false;
  }

  const contentType = MIME_TYPES[path.extname(filePath)] ?? "application/octet-stream";
  res.writeHead(200, { "Content-Type": contentType });
  res.end(fs.readFileSync(filePath));
  return true;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function corsHeaders(): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": "*",
    "Access-Control-Allow-Methods": "GET, POST, DELETE, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
  };
}

function send(res: http.ServerResponse, response: ApiResponse) {
  res.writeHead(response.status, { ...corsHeaders(), "Content-Type": response.contentType });
  res.end(response.body);
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk: Buffer) => (body += chunk.toString()));
    req.on("end", () => resolve(body));
    req.on("error", reject);
  });
}

// ─── Setup ───────────────────────────────────────────────────────────────────

ensureDirs();

const store = createHistoryStore();
const tools = createAllToolDefinitions();
const handleApi = createApiHandler({ store, tools, historyLimit: HISTORY_LIMIT });

// ─── Server ──────────────────────────────────────────────────────────────────

const server = http.createServer(async (req, res) => {
  const url = new URL(req.url ?? "/", `http://localhost:${PORT}`);
  const method = req.method?.toUpperCase() ?? "GET";

  // CORS preflight
  if (method === "OPTIONS") {
    res.writeHead(204, corsHeaders());
    res.end();
    return;
  }

  try {
    const body = method === "POST" ? await readBody(req) : "";
    const response = await handleApi({ method, pathname: url.pathname, query: url.searchParams, body });
    if (response) {
      if (response.status >= 500) {
        console.error(`\x1b[31m${method} ${url.pathname} → ${response.status}: ${response.body}\x1b[0m`);
      } else {
        console.log(dim(`${method} ${url.pathname} → ${response.status}`));
      }
      send(res, response);
      return;
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\x1b[31mRequest failed: ${message}\x1b[0m`);
    send(res, { status: 500, contentType: "application/json", body: JSON.stringify({ error: message }) });
    return;
  }

  if (method === "GET") {
    // SPA fallback to index.html
    if (!serveStatic(res, url.pathname) && !serveStatic(res, "/index.html")) {
      send(res, { status: 404, contentType: "application/json", body: JSON.stringify({ error: "Not found" }) });
    }
    return;
  }

  send(res, { status: 404, contentType: "application/json", body: JSON.stringify({ error: "Not found" }) });
});

server.listen(PORT, () => {
  console.log(dim(`┌ ${APP_NAME} web server`));
  console.log(dim(`│ http://localhost:${PORT}`));
  console.log(dim(`│ history: ${store.baseDir}`));
  console.log(dim(`└ tools: ${tools.map((t) => t.name).join(", ")}`));
});
