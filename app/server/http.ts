import http, { type IncomingHttpHeaders } from "http";
import { z } from "zod";
import { isUnistateError, type UnistateError } from "@unistate/core";
import type { SseResponse } from "../../adapters/sse/hub";
import type { Health } from "../../adapters/types";
import { HostError } from "../../host/errors";
import { bootstrap, type App, type BootstrapOptions } from "../bootstrap";
import type { AppConfig } from "../config";

export type HttpRequest = AsyncIterable<Buffer | string> & {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
};

export type HttpResponse = SseResponse & {
  writeHead(status: number, headers?: Record<string, string>): unknown;
  end(body?: string): unknown;
};

export type HandlerOptions = {
  /** Called after `POST /shutdown` closed the app and answered. */
  onShutdown?: () => void;
  maxBodyBytes?: number;
};

const ENDPOINTS = ["/", "/status.json", "/logs", "/stream", "/state", "/health", "/metrics", "/events", "/shutdown"];

const eventItem = z.object({
  bloc: z.string().min(1),
  event: z.object({ type: z.string().min(1) }).passthrough(),
});
const eventsBody = z.union([eventItem, z.array(eventItem).min(1)]);

class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function statusOf(error: UnistateError): number {
  switch (error.code) {
    case "STATE_CLOSED":
    case "STATE_DISPOSED":
      return 409;
    default:
      return 400;
  }
}

function sendJson(res: HttpResponse, status: number, body: unknown): void {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
}

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const v = headers[name];
  return Array.isArray(v) ? v[0] : v;
}

async function readJson(req: HttpRequest, limit: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    size += buf.length;
    if (size > limit) throw new HttpError(413, "BODY_TOO_LARGE", `Body exceeds ${limit} bytes`);
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString("utf8");
  if (!text) throw new HttpError(400, "BODY_INVALID", "Expected a JSON body");
  try {
    const body: unknown = JSON.parse(text);
    return body;
  } catch (e) {
    throw new HttpError(400, "BODY_INVALID", e instanceof Error ? e.message : String(e));
  }
}

/** Request handler of the inspector server, separate from `http.createServer` so it can be driven directly. */
export function createHandler(app: App, opts: HandlerOptions = {}): (req: HttpRequest, res: HttpResponse) => Promise<void> {
  const maxBodyBytes = opts.maxBodyBytes ?? 1024 * 1024;
  const log = app.logger.child({ component: "http" });

  const routes = async (req: HttpRequest, res: HttpResponse): Promise<void> => {
    const method = req.method ?? "GET";
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    if (method === "GET" && (path === "/" || path === "/status")) return statusPage(app, res);
    if (method === "GET" && path === "/status.json") return sendJson(res, 200, await collectStatus(app));
    if (method === "GET" && path === "/logs") return logsPage(res);
    if (method === "GET" && path === "/stream") return app.sse.handler(req, res);
    if (method === "GET" && path === "/state") {
      return sendJson(res, 200, { seq: String(app.host.lastSeq), blocs: app.host.snapshot() });
    }
    if (method === "GET" && path === "/health") {
      const adapters = await adapterHealth(app);
      const ok = adapters.every(a => a.ok);
      return sendJson(res, ok ? 200 : 503, { ok, adapters });
    }
    if (method === "GET" && path === "/metrics") {
      res.writeHead(200, { "content-type": "text/plain; version=0.0.4" });
      res.end(app.metrics.render());
      return;
    }
    if (method === "POST" && path === "/events") {
      const parsed = eventsBody.safeParse(await readJson(req, maxBodyBytes));
      if (!parsed.success) {
        throw new HttpError(400, "BODY_INVALID", parsed.error.issues.map(i => `${i.path.join(".") || "body"}: ${i.message}`).join("; "));
      }
      const many = Array.isArray(parsed.data);
      const items = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
      const traceId = header(req.headers, "x-trace-id");
      const actor = header(req.headers, "x-actor");
      // all or nothing: reject the body before any item is applied
      for (const item of items) app.host.validate(item.bloc, item.event);
      let accepted = 0;
      items.forEach((item, i) => {
        const itemTrace = traceId && many ? `${traceId}:${i}` : traceId;
        if (app.host.dispatch(item.bloc, item.event, { traceId: itemTrace, actor })) accepted++;
      });
      return sendJson(res, 202, { ok: true, accepted, duplicates: items.length - accepted });
    }
    if (method === "POST" && path === "/shutdown") {
      await app.close();
      res.writeHead(204);
      res.end();
      opts.onShutdown?.();
      return;
    }
    sendJson(res, 404, { ok: false, code: "NOT_FOUND", error: `${method} ${path} not found` });
  };

  return async (req, res) => {
    try {
      await routes(req, res);
    } catch (err) {
      if (err instanceof HttpError || err instanceof HostError) {
        return sendJson(res, err.status, { ok: false, code: err.code, error: err.message });
      }
      if (isUnistateError(err)) {
        return sendJson(res, statusOf(err), { ok: false, code: err.code, error: err.message });
      }
      log.error({ err, method: req.method, url: req.url }, "request failed");
      sendJson(res, 500, { ok: false, code: "INTERNAL", error: err instanceof Error ? err.message : String(err) });
    }
  };
}

async function adapterHealth(app: App): Promise<Array<Health & { name: string }>> {
  return Promise.all(
    app.host.adapters.map(async a => {
      if (!a.health) return { name: a.name, ok: true };
      try {
        return { name: a.name, ...(await a.health()) };
      } catch (e) {
        return { name: a.name, ok: false, detail: e instanceof Error ? e.message : String(e) };
      }
    }),
  );
}

export async function collectStatus(app: App) {
  const adapters = await adapterHealth(app);
  return {
    ok: adapters.every(a => a.ok),
    node: process.version,
    pid: process.pid,
    uptimeSec: Math.round(process.uptime()),
    time: new Date().toISOString(),
    seq: String(app.host.lastSeq),
    blocs: app.host.registered(),
    endpoints: ENDPOINTS,
    adapters,
    metrics: app.metrics.render(),
  };
}

const ENTITIES: Record<string, string> = { "&": "&amp;", "<": "&lt;", ">": "&gt;", '"': "&quot;" };
const esc = (s: string) => s.replace(/[&<>"]/g, c => ENTITIES[c] ?? c);

async function statusPage(app: App, res: HttpResponse): Promise<void> {
  const data = await collectStatus(app);
  const color = (ok: boolean) => (ok ? "#16a34a" : "#dc2626");
  const html = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>unistate inspector</title>
  <style>
    body { font-family: ui-sans-serif, system-ui, sans-serif; margin: 20px; color: #111827; }
    header { display:flex; align-items:center; gap:12px; }
    .dot { width:12px; height:12px; border-radius:50%; background:${color(data.ok)}; display:inline-block; }
    pre { background:#f9fafb; padding:12px; border-radius:6px; overflow:auto; }
    code { font-family: ui-monospace, SFMono-Regular, Menlo, monospace; }
    a { color:#2563eb; text-decoration:none; }
    .grid { display:grid; grid-template-columns: 1fr 1fr 1fr; gap: 16px; }
    @media (max-width: 720px) { .grid { grid-template-columns: 1fr; } }
  </style>
  <meta http-equiv="refresh" content="5" />
</head>
<body>
  <header>
    <span class="dot"></span>
    <h1>unistate inspector</h1>
  </header>
  <p>Uptime: <b>${data.uptimeSec}s</b> • Node: <code>${esc(data.node)}</code> • PID: ${data.pid} • Seq: <code>${esc(data.seq)}</code></p>
  <div class="grid">
    <section>
      <h2>Adapters</h2>
      <ul>
        ${data.adapters
          .map(a => `<li>${esc(a.name)}: <b style="color:${color(a.ok)}">${a.ok ? "ok" : "down"}</b>${a.detail ? ` <i>${esc(a.detail)}</i>` : ""}</li>`)
          .join("")}
      </ul>
    </section>
    <section>
      <h2>Blocs</h2>
      <ul>
        ${data.blocs.map(b => `<li><code>${esc(b)}</code></li>`).join("")}
      </ul>
    </section>
    <section>
      <h2>Endpoints</h2>
      <ul>
        ${data.endpoints.map(e => `<li><a href="${e}">${e}</a></li>`).join("")}
      </ul>
    </section>
  </div>
  <section>
    <h2>Metrics</h2>
    <pre>${esc(data.metrics)}</pre>
  </section>
</body>
</html>`;
  res.writeHead(200, { "content-type": "text/html; charset=utf-8" });
  res.end(html);
}

function logsPage(res: HttpResponse): void {
  const html = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Realtime changes</title>
  <style>
    body { font-family: ui-sans-serif, system-ui, sans-serif; margin: 20px; color:#111827; }
    header { display:flex; align-items:center; gap:12px; }
    #controls { display:flex; gap:8px; margin: 12px 0; }
    button, input { padding:6px 10px; border:1px solid #e5e7eb; border-radius:6px; background:#fff; }
    #log { height: 60vh; overflow: auto; background:#0b1021; color:#e5e7eb; padding:12px; border-radius:8px; }
    .line { white-space: pre-wrap; font-family: ui-monospace, SFMono-Regular, Menlo, monospace; margin: 0; }
    .ts { color:#93c5fd; }
    .seq { color:#bbf7d0; }
    .type { color:#facc15; }
    .source { color:#fda4af; }
  </style>
</head>
<body>
  <header>
    <h1>Realtime changes</h1>
    <a href="/" style="margin-left:auto;color:#2563eb;text-decoration:none">status</a>
  </header>
  <div id="controls">
    <button id="pause">Pause</button>
    <label><input type="checkbox" id="autoscroll" checked /> Autoscroll</label>
    <input id="filter" placeholder="filter type/source (regex)" />
    <button id="clear">Clear</button>
  </div>
  <div id="log"></div>
  <script>
    const logEl = document.getElementById('log');
    const pauseBtn = document.getElementById('pause');
    const filterInput = document.getElementById('filter');
    const autoscroll = document.getElementById('autoscroll');
    let paused = false;
    pauseBtn.onclick = () => { paused = !paused; pauseBtn.textContent = paused ? 'Resume' : 'Pause'; };
    document.getElementById('clear').onclick = () => { logEl.textContent = ''; };
    const span = (cls, text) => { const s = document.createElement('span'); s.className = cls; s.textContent = text; return s; };
    const es = new EventSource('/stream');
    es.onmessage = (ev) => {
      if (paused) return;
      const n = JSON.parse(ev.data);
      const f = filterInput.value.trim();
      if (f) {
        const re = new RegExp(f);
        if (!re.test(String(n.source ?? '')) && !re.test(String(n.type))) return;
      }
      const line = document.createElement('div');
      line.className = 'line';
      line.append(span('ts', n.ts), ' ', span('seq', '#' + n.seq), ' ', span('type', n.type));
      if (n.source) line.append(' ', span('source', n.source));
      const body = n.type === 'Snapshot' ? n.states : (n.error ?? n.state ?? n.event);
      if (body !== undefined) line.append(' ' + JSON.stringify(body));
      logEl.appendChild(line);
      if (autoscroll.checked) logEl.scrollTop = logEl.scrollHeight;
    };
    es.onerror = () => {
      const line = document.createElement('div');
      line.className = 'line';
      line.textContent = '[stream error]';
      logEl.appendChild(line);
    };
  </script>
</body>
</html>`;
  res.writeHead(200, { "content-type": "text/html; charset=utf-8" });
  res.end(html);
}

/** Run `onSignal` on the first SIGINT or SIGTERM. The returned function removes the listeners. */
export function onShutdownSignals(onSignal: () => void): () => void {
  const handler = () => {
    release();
    onSignal();
  };
  const release = () => {
    process.off("SIGINT", handler);
    process.off("SIGTERM", handler);
  };
  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
  return release;
}

/** Bootstrap the app and serve it until `POST /shutdown`, SIGINT or SIGTERM. */
export async function startServer(config: AppConfig, opts: BootstrapOptions = {}) {
  const app = await bootstrap({ ...config, sqlite: config.sqlitePath, ...opts });
  const server = http.createServer();
  const release = onShutdownSignals(() => {
    stop().catch(err => app.logger.error({ err }, "shutdown failed"));
  });
  const handle = createHandler(app, {
    onShutdown: () => {
      release();
      server.close();
    },
  });
  server.on("request", (req, res) => void handle(req, res));
  await new Promise<void>(resolve => server.listen(config.port, resolve));
  const stop = async () => {
    release();
    try {
      await app.close();
    } finally {
      server.close();
    }
  };
  return { server, app, stop };
}
