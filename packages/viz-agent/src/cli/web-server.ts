import { randomUUID } from "node:crypto";
import { writeFileSync } from "node:fs";
import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { basename, extname, isAbsolute, join, relative, resolve } from "node:path";
import { VizPilotError, errorMessage, ensureProjectDirectories, isPipelineError, type Logger } from "@vizpilot/shared";
import { RESULT_NOT_FOUND, type PipelineOrchestrator } from "../services/pipeline-orchestrator.js";
import { renderErrorDocument } from "../services/artifact-document.js";

export const MAX_UPLOAD_BYTES = 16 * 1024 * 1024;
const MAX_JSON_BYTES = 64 * 1024;
const ALLOWED_UPLOAD_EXTENSIONS = new Set([".csv", ".tsv", ".xls", ".xlsx"]);

export type WebOrchestrator = Pick<
  PipelineOrchestrator,
  "processFile" | "processRequest" | "getResult" | "getStoredResult" | "getDownloadableArtifact" | "recordFeedback"
>;

export interface LaunchWebServerInput {
  orchestrator: WebOrchestrator;
  cwd: string;
  port: number;
  host: string;
  logger?: Logger;
}

export interface WebServerSession {
  url: string;
  close: () => Promise<void>;
}

export async function launchWebServer(input: LaunchWebServerInput): Promise<WebServerSession> {
  const uploadsRoot = ensureProjectDirectories(input.cwd).uploadsRoot;
  const logger = input.logger ?? console;
  const html = renderIndexHtml();

  const server = createServer((req, res) => {
    handleRequest(req, res, { orchestrator: input.orchestrator, uploadsRoot, html }).catch((error) => {
      logger.error(`Request ${req.method ?? "GET"} ${req.url ?? "/"} failed: ${errorMessage(error)}`);
      if (!res.headersSent) writeJson(res, 500, { error: "Internal server error" });
      else res.end();
    });
  });

  await new Promise<void>((resolvePromise, reject) => {
    server.once("error", reject);
    server.listen(input.port, input.host, () => resolvePromise());
  });

  const address = server.address();
  const port = isAddressInfo(address) ? address.port : input.port;
  return {
    url: `http://${input.host}:${port}`,
    close: async () => {
      await new Promise<void>((resolvePromise, reject) => {
        server.close((error) => {
          if (error) reject(error);
          else resolvePromise();
        });
      });
    },
  };
}

interface RouteContext {
  orchestrator: WebOrchestrator;
  uploadsRoot: string;
  html: string;
}

async function handleRequest(req: IncomingMessage, res: ServerResponse, context: RouteContext): Promise<void> {
  const requestUrl = new URL(req.url ?? "/", "http://localhost");
  const method = req.method ?? "GET";
  const { pathname } = requestUrl;

  try {
    if (method === "GET" && (pathname === "/" || pathname === "/index.html")) {
      res.statusCode = 200;
      res.setHeader("Content-Type", "text/html; charset=utf-8");
      res.end(context.html);
      return;
    }

    if (method === "POST" && pathname === "/upload") {
      const filename = requestUrl.searchParams.get("filename") ?? "";
      const target = resolveUploadTarget(context.uploadsRoot, filename);
      const body = await readBody(req, MAX_UPLOAD_BYTES);
      if (!body.length) throw new VizPilotError("Upload body is empty.", "INVALID_REQUEST");
      writeFileSync(target, body);
      writeJson(res, 200, await context.orchestrator.processFile(target));
      return;
    }

    if (method === "POST" && pathname === "/process") {
      const payload = parseJsonBody(await readBody(req, MAX_JSON_BYTES));
      const filePath = requireString(payload, "filePath");
      const requirements = requireString(payload, "requirements");
      const result = await context.orchestrator.processRequest(
        resolveUploadedFile(context.uploadsRoot, filePath),
        requirements,
      );
      writeJson(res, isPipelineError(result) ? 500 : 200, result);
      return;
    }

    if (method === "GET" && pathname.startsWith("/api/results/")) {
      const id = decodePathSegment(pathname.slice("/api/results/".length));
      if (id === null) {
        writeJson(res, 404, { error: RESULT_NOT_FOUND });
        return;
      }
      const result = await context.orchestrator.getResult(id);
      writeJson(res, isPipelineError(result) ? 404 : 200, result);
      return;
    }

    if (method === "GET" && pathname.startsWith("/download/")) {
      const id = decodePathSegment(pathname.slice("/download/".length));
      const stored = id === null ? null : await context.orchestrator.getStoredResult(id);
      if (!stored) {
        res.statusCode = 404;
        res.setHeader("Content-Type", "text/html; charset=utf-8");
        res.end(renderErrorDocument(RESULT_NOT_FOUND));
        return;
      }
      res.statusCode = 200;
      res.setHeader("Content-Type", "text/html; charset=utf-8");
      res.setHeader("Content-Disposition", `attachment; filename="visualization_${stored.id}.html"`);
      res.end(await context.orchestrator.getDownloadableArtifact(stored.id));
      return;
    }

    if (method === "POST" && pathname === "/feedback") {
      const payload = parseJsonBody(await readBody(req, MAX_JSON_BYTES));
      const technicalName = requireString(payload, "technicalName");
      const businessLabel = requireString(payload, "businessLabel");
      if (typeof payload.positive !== "boolean") {
        throw new VizPilotError("Field 'positive' must be a boolean.", "INVALID_REQUEST");
      }
      await context.orchestrator.recordFeedback(technicalName, businessLabel, payload.positive);
      writeJson(res, 200, { ok: true });
      return;
    }

    writeJson(res, 404, { error: "Not found" });
  } catch (error) {
    if (error instanceof VizPilotError) {
      writeJson(res, statusForCode(error.code), { error: error.message });
      return;
    }
    throw error;
  }
}

function statusForCode(code: string): number {
  if (code === "PAYLOAD_TOO_LARGE") return 413;
  if (code === "INVALID_REQUEST" || code === "UNSUPPORTED_FILE_TYPE" || code === "EMPTY_TABLE") return 400;
  return 500;
}

/** Keeps `[A-Za-z0-9._-]` of the base name and prefixes a short random token. */
export function secureUploadName(filename: string): string {
  const cleaned = basename(filename.replace(/\\/g, "/"))
    .replace(/[^A-Za-z0-9._-]/g, "_")
    .replace(/^[._]+/, "");
  return cleaned ? `${randomUUID().slice(0, 8)}_${cleaned}` : "";
}

function resolveUploadTarget(uploadsRoot: string, filename: string): string {
  const ext = extname(filename).toLowerCase();
  if (!ALLOWED_UPLOAD_EXTENSIONS.has(ext)) {
    throw new VizPilotError("File type not allowed. Upload a .csv, .tsv, .xls or .xlsx file.", "UNSUPPORTED_FILE_TYPE");
  }
  const safeName = secureUploadName(filename);
  if (!safeName) throw new VizPilotError("Query parameter 'filename' is required.", "INVALID_REQUEST");
  return join(uploadsRoot, safeName);
}

/** `/process` only reads files that were uploaded through this server. */
function resolveUploadedFile(uploadsRoot: string, filePath: string): string {
  const absolute = resolve(uploadsRoot, filePath);
  const fromRoot = relative(uploadsRoot, absolute);
  if (!fromRoot || fromRoot.startsWith("..") || isAbsolute(fromRoot)) {
    throw new VizPilotError("filePath must point to an uploaded file.", "INVALID_REQUEST");
  }
  return absolute;
}

async function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > limit) {
      throw new VizPilotError(`Request body exceeds ${limit} bytes.`, "PAYLOAD_TOO_LARGE");
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
}

function decodePathSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

function parseJsonBody(body: Buffer): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString("utf-8"));
  } catch {
    throw new VizPilotError("Request body must be valid JSON.", "INVALID_REQUEST");
  }
  if (!isRecord(parsed)) {
    throw new VizPilotError("Request body must be a JSON object.", "INVALID_REQUEST");
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function requireString(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new VizPilotError(`Field '${key}' must be a non-empty string.`, "INVALID_REQUEST");
  }
  return value;
}

function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(stringifyJsonSafe(payload));
}

export function stringifyJsonSafe(payload: unknown): string {
  return JSON.stringify(payload, (_key, value) => {
    if (typeof value === "number" && !Number.isFinite(value)) {
      return null;
    }
    return value;
  });
}

function isAddressInfo(value: string | AddressInfo | null): value is AddressInfo {
  return Boolean(value) && typeof value === "object";
}

function renderIndexHtml(): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>VizPilot</title>
  <style>
    :root {
      --ink: #1f2432;
      --paper: #f4eee1;
      --panel: #fffaf0;
      --accent: #cf4f2f;
      --accent-2: #0f6f78;
      --muted: #6f6658;
      --line: #d8c8a9;
      --radius: 16px;
    }

    * { box-sizing: border-box; }

    body {
      margin: 0;
      font-family: "IBM Plex Sans", "Avenir Next", sans-serif;
      color: var(--ink);
      background: var(--paper);
      min-height: 100vh;
    }

    .shell { width: min(1100px, 95vw); margin: 24px auto; display: grid; gap: 16px; }
    .panel { border: 1px solid var(--line); border-radius: var(--radius); background: var(--panel); padding: 14px; display: grid; gap: 10px; }
    .kicker { margin: 0; text-transform: uppercase; letter-spacing: 0.16em; color: var(--accent-2); font-size: 12px; font-weight: 700; }
    textarea { width: 100%; min-height: 80px; border: 1px solid var(--line); border-radius: 10px; padding: 8px; font: inherit; }
    button { justify-self: start; border: 0; border-radius: 10px; padding: 8px 14px; background: var(--accent); color: #fff; font-weight: 700; cursor: pointer; }
    table { border-collapse: collapse; width: 100%; }
    th, td { text-align: left; padding: 6px 8px; border-bottom: 1px solid #ebe0ca; font-size: 12px; }
    iframe { width: 100%; min-height: 460px; border: 1px solid var(--line); border-radius: 12px; background: #fff; }
    .muted { color: var(--muted); }
    .error { color: var(--accent); }
  </style>
</head>
<body>
  <main class="shell">
    <section class="panel">
      <p class="kicker">VizPilot</p>
      <input type="file" id="file" accept=".csv,.tsv,.xls,.xlsx" />
      <p class="muted" id="status">Upload a dataset to begin.</p>
      <table><thead id="schema-head"></thead><tbody id="schema-body"></tbody></table>
    </section>

    <section class="panel">
      <label for="requirements">What would you like to see?</label>
      <textarea id="requirements" placeholder="Total revenue by region as a bar chart"></textarea>
      <button id="run" disabled>Build visualization</button>
    </section>

    <section class="panel" id="result" hidden>
      <iframe id="chart" title="Visualization"></iframe>
      <p id="explanation"></p>
      <p class="muted" id="score"></p>
      <ul id="issues"></ul>
      <a id="download" href="#">Download HTML</a>
    </section>
  </main>

  <script>
    const state = { filePath: null };
    const statusEl = document.getElementById('status');
    const runEl = document.getElementById('run');

    const escapeHtml = (value) => String(value)
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;');

    function renderSchema(preview) {
      document.getElementById('schema-head').innerHTML = '<tr><th>column</th><th>business label</th><th>sample</th></tr>';
      document.getElementById('schema-body').innerHTML = Object.entries(preview.schemaMapping)
        .map(([column, label]) => '<tr><td>' + escapeHtml(column) + '</td><td>' + escapeHtml(label) + '</td><td>' +
          escapeHtml((preview.sampleData[column] || []).slice(0, 3).join(', ')) + '</td></tr>')
        .join('');
    }

    document.getElementById('file').addEventListener('change', async (event) => {
      const file = event.target.files[0];
      if (!file) return;
      statusEl.textContent = 'Uploading ' + file.name + '...';
      const response = await fetch('/upload?filename=' + encodeURIComponent(file.name), { method: 'POST', body: file });
      const payload = await response.json();
      if (!response.ok) {
        statusEl.textContent = payload.error;
        statusEl.className = 'error';
        return;
      }
      state.filePath = payload.filePath.split(/[\\\\/]/).pop();
      statusEl.textContent = 'Loaded ' + file.name;
      statusEl.className = 'muted';
      runEl.disabled = false;
      renderSchema(payload);
    });

    runEl.addEventListener('click', async () => {
      runEl.disabled = true;
      statusEl.textContent = 'Building visualization...';
      const response = await fetch('/process', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ filePath: state.filePath, requirements: document.getElementById('requirements').value }),
      });
      const payload = await response.json();
      runEl.disabled = false;
      if (!response.ok) {
        statusEl.textContent = payload.error;
        statusEl.className = 'error';
        return;
      }
      statusEl.textContent = 'Visualization ' + payload.id;
      statusEl.className = 'muted';
      document.getElementById('result').hidden = false;
      document.getElementById('chart').srcdoc = payload.renderedChart;
      document.getElementById('explanation').textContent = payload.explanationText;
      document.getElementById('score').textContent = 'Quality score: ' + payload.qualityScore + ' / 10';
      document.getElementById('issues').innerHTML = payload.issues
        .map((issue) => '<li>[' + escapeHtml(issue.severity) + '] ' + escapeHtml(issue.message) + '</li>')
        .join('');
      document.getElementById('download').href = '/download/' + encodeURIComponent(payload.id);
    });
  </script>
</body>
</html>`;
}
