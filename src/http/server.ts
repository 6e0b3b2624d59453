import http from "node:http";
import { randomUUID } from "node:crypto";

import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { asString, checkFilename, isRecord, pushErr, queryInt } from "./validation.js";
import { createInMemoryAnalyses, type AnalysisService } from "./analyses.js";
import { resolveAnalyzerConfig, type AnalyzerConfig } from "../core/config.js";
import { silentLogger, type Logger } from "../logger.js";

const SERVICE = "tfidf-analyzer";
const VERSION = "0.1.0";

export const DEFAULT_MAX_BODY_BYTES = 10_000_000;
const DEFAULT_FILENAME = "document.txt";
const RECENT_DEFAULT = 5;
const RECENT_MAX = 100;

export interface ServerOptions {
  port?: number;
  metricsEnabled?: boolean;
  /** upload size limit in bytes */
  maxBodyBytes?: number;
  config?: AnalyzerConfig;
  analyses?: AnalysisService;
  logger?: Logger;
}

class BodyTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
  }
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const logger = opts.logger ?? silentLogger();
  const analyses = opts.analyses ?? createInMemoryAnalyses({ config: opts.config ?? resolveAnalyzerConfig(), logger });
  const metricsEnabled = opts.metricsEnabled ?? true;
  const maxBodyBytes = opts.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const log = logger.child({ module: "http" });

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const started = Date.now();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const instance = url.pathname;

    res.on("finish", () => {
      log.info(
        { requestId, method: req.method, path: url.pathname, status: res.statusCode, durationMs: Date.now() - started },
        "request completed",
      );
    });

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
        });
      }

      if (req.method === "GET" && url.pathname === "/metrics") {
        if (!metricsEnabled) {
          return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "metrics not enabled", instance, requestId }));
        }
        return sendJson(res, 200, analyses.metrics());
      }

      if (req.method === "GET" && url.pathname === "/corpus") {
        return sendJson(res, 200, analyses.corpus());
      }

      if (url.pathname === "/documents") {
        if (req.method === "POST") {
          const contentType = mediaType(req);
          if (contentType !== "application/json" && contentType !== "text/plain") {
            return sendProblem(res, problem({
              status: 415,
              code: "UNSUPPORTED_MEDIA_TYPE",
              detail: "content-type must be application/json or text/plain",
              instance,
              requestId,
            }));
          }

          const raw = await readBody(req, maxBodyBytes);
          const text = decodeUtf8(raw);
          if (text === undefined) {
            return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body is not valid UTF-8 text", instance, requestId }));
          }

          const errors: FieldError[] = [];
          let filename = DEFAULT_FILENAME;
          let documentText = text;

          if (contentType === "application/json") {
            const parsed = parseJson(text);
            if (!parsed) {
              return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "malformed JSON", instance, requestId }));
            }
            const body = parsed.value;
            if (!isRecord(body)) {
              return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be a JSON object", instance, requestId }));
            }
            const t = asString(body.text);
            if (t === undefined) pushErr(errors, "$.text", "must be a string");
            documentText = t ?? "";

            if (body.filename !== undefined) {
              const f = asString(body.filename);
              if (f === undefined) pushErr(errors, "$.filename", "must be a string");
              else {
                checkFilename(errors, "$.filename", f);
                filename = f;
              }
            }
          } else {
            const f = url.searchParams.get("filename");
            if (f !== null) {
              checkFilename(errors, "filename", f);
              filename = f;
            }
          }

          if (errors.length) {
            return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance, requestId, errors }));
          }

          return sendJson(res, 201, analyses.submit({ filename, text: documentText }));
        }

        if (req.method === "GET") {
          const limit = queryInt(url.searchParams.get("limit")) ?? RECENT_DEFAULT;
          if (!Number.isInteger(limit) || limit < 1 || limit > RECENT_MAX) {
            const errors: FieldError[] = [];
            pushErr(errors, "limit", `must be an integer between 1 and ${RECENT_MAX}`);
            return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance, requestId, errors }));
          }
          return sendJson(res, 200, { documents: analyses.recent(limit) });
        }

        return sendProblem(res, problem({ status: 405, code: "METHOD_NOT_ALLOWED", detail: `${req.method} not allowed`, instance, requestId }));
      }

      const segment = req.method === "GET" ? /^\/documents\/([^/]+)$/.exec(url.pathname)?.[1] : undefined;
      if (segment !== undefined) {
        const id = decodeSegment(segment);
        const record = id === undefined ? undefined : analyses.get(id);
        if (!record) {
          return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "document not found", instance, requestId }));
        }
        return sendJson(res, 200, record);
      }

      return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance, requestId }));
    } catch (e) {
      if (e instanceof BodyTooLargeError) {
        res.setHeader("connection", "close");
        return sendProblem(res, problem({ status: 413, code: "PAYLOAD_TOO_LARGE", detail: `body must be at most ${e.limit} bytes`, instance, requestId }));
      }
      log.error({ err: e, requestId }, "request failed");
      return sendProblem(res, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function mediaType(req: http.IncomingMessage): string {
  const ct = req.headers["content-type"] ?? "";
  return (ct.split(";")[0] ?? "").trim().toLowerCase();
}

async function readBody(req: http.IncomingMessage, limit: number): Promise<Buffer> {
  const declared = Number(req.headers["content-length"]);
  if (Number.isFinite(declared) && declared > limit) throw new BodyTooLargeError(limit);

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const c of req) {
    const chunk = Buffer.isBuffer(c) ? c : Buffer.from(String(c));
    size += chunk.length;
    if (size > limit) throw new BodyTooLargeError(limit);
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function decodeUtf8(raw: Buffer): string | undefined {
  try {
    return utf8.decode(raw);
  } catch {
    return undefined;
  }
}

function parseJson(text: string): { value: unknown } | undefined {
  if (!text.length) return { value: null };
  try {
    return { value: JSON.parse(text) };
  } catch {
    return undefined;
  }
}

function decodeSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch {
    return undefined;
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("content-type", "application/json; charset=utf-8");
  res.end(JSON.stringify(body));
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(JSON.stringify(body));
}
