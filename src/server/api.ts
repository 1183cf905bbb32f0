/**
 * API Server
 *
 * Thin HTTP layer over the pipeline: accepts uploads, starts processing in
 * the background and serves claim status, audit trails and recent claims.
 */

import * as http from "node:http";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";
import { contentTypeFor } from "../services/clients/file-object-storage.js";
import { createContainer } from "../services/container.js";
import type { ClaimQueries } from "../services/claim-queries.js";
import { nextClaimId } from "../services/claim-id.js";
import { errorMessage } from "../services/errors.js";
import type { ClaimPipeline } from "../services/pipeline.js";
import type { ObjectStorage } from "../types/capabilities.js";

const MAX_BODY_BYTES = 20 * 1024 * 1024;
const MAX_LIST_LIMIT = 100;

export interface ApiDependencies {
  pipeline: ClaimPipeline;
  queries: ClaimQueries;
  objectStorage: ObjectStorage;
  bucketPrefix: string;
  backend: string;
}

export interface RouteContext {
  params: Record<string, string>;
  query: URLSearchParams;
  body: unknown;
}

type RouteHandler = (ctx: RouteContext) => Promise<unknown>;

type Method = "GET" | "POST";

type RouteTable = Record<Method, Record<string, RouteHandler>>;

// =============================================
// REQUEST/RESPONSE HELPERS
// =============================================

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

/** Throw an HTTP error */
function httpError(status: number, message: string): never {
  throw new HttpError(status, message);
}

/** Send JSON response with CORS headers */
function json(res: http.ServerResponse, data: unknown, status = 200) {
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Access-Control-Allow-Origin": "*",
  });
  res.end(JSON.stringify(data));
}

/** Parse JSON body from request */
async function parseBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new HttpError(413, "Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      const data = Buffer.concat(chunks).toString("utf-8");
      try {
        resolve(data ? JSON.parse(data) : {});
      } catch {
        reject(new HttpError(400, "Request body must be valid JSON"));
      }
    });
    req.on("error", reject);
  });
}

// =============================================
// UPLOADS
// =============================================

const uploadSchema = z.object({
  files: z
    .array(
      z.object({
        filename: z.string().min(1),
        contentType: z.string().min(1).optional(),
        contentBase64: z.string(),
      })
    )
    .min(1, "at least one file is required"),
});

/**
 * Upload file name without directories.
 */
function safeFilename(filename: string): string {
  const name = path.basename(filename.replaceAll("\\", "/"));
  if (!name || name === "." || name === "..") {
    httpError(400, `invalid filename: ${filename}`);
  }
  return name;
}

function parseLimit(value: string | null): number {
  if (value === null) return 10;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
    httpError(400, `limit must be an integer between 1 and ${MAX_LIST_LIMIT}`);
  }
  return limit;
}

// =============================================
// ROUTES
// =============================================

export interface Api {
  routes: RouteTable;
  handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void>;
  /** Resolves once every background run started so far has settled */
  drain(): Promise<void>;
}

export function createApi(deps: ApiDependencies): Api {
  const inFlight = new Set<Promise<void>>();

  const startRun = (claimId: string, bucket: string, key: string) => {
    const run = deps.pipeline
      .run({ claimId, source: { bucket, key } })
      .then((result) => {
        console.log(`[API] ${claimId} finished: ${result.state}`);
      })
      .catch((err: unknown) => {
        console.error(`[API] ${claimId} run failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        inFlight.delete(run);
      });
    inFlight.add(run);
  };

  const routes: RouteTable = { GET: {}, POST: {} };

  routes.GET["/"] = async () => ({
    status: "ok",
    service: "claim-pipeline",
    backend: deps.backend,
  });

  routes.POST["/api/v1/claims/upload"] = async ({ body }) => {
    const parsed = uploadSchema.safeParse(body);
    if (!parsed.success) {
      httpError(400, parsed.error.issues.map((issue) => issue.message).join("; "));
    }

    const claimId = nextClaimId();
    const bucket = `${deps.bucketPrefix}-raw-claims`;
    const files: { filename: string; bucket: string; key: string; size: number }[] = [];

    for (const file of parsed.data.files) {
      const filename = safeFilename(file.filename);
      const key = `${claimId}/${filename}`;
      const content = Buffer.from(file.contentBase64, "base64");
      await deps.objectStorage.put(bucket, key, content, file.contentType ?? contentTypeFor(filename));
      files.push({ filename, bucket, key, size: content.length });
    }

    const first = files[0];
    if (first) {
      startRun(claimId, first.bucket, first.key);
    }
    console.log(`[API] Accepted ${files.length} file(s) for ${claimId}`);

    return { claimId, status: "processing", files };
  };

  routes.GET["/api/v1/claims"] = async ({ query }) => {
    const claims = await deps.queries.listClaims(parseLimit(query.get("limit")));
    return { claims, count: claims.length };
  };

  routes.GET["/api/v1/claims/:id"] = async ({ params }) => {
    const view = await deps.queries.getClaimStatus(params["id"] ?? "");
    if (view.status === "unknown") httpError(404, "Claim not found");
    return view;
  };

  routes.GET["/api/v1/claims/:id/audit"] = async ({ params }) => {
    const claimId = params["id"] ?? "";
    const entries = await deps.queries.getAuditTrail(claimId);
    return { claimId, entries };
  };

  const handleRequest = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    // CORS preflight
    if (req.method === "OPTIONS") {
      res.writeHead(204, {
        "Access-Control-Allow-Origin": "*",
        "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
        "Access-Control-Allow-Headers": "Content-Type",
      });
      res.end();
      return;
    }

    const requestUrl = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    console.log(`[API] ${method} ${requestUrl.pathname}`);

    try {
      const route = matchRoute(routes, method, requestUrl.pathname);
      if (!route) {
        json(res, { error: "Not found" }, 404);
        return;
      }

      const body = method !== "GET" ? await parseBody(req) : undefined;
      const result = await route.handler({ params: route.params, query: requestUrl.searchParams, body });
      json(res, result, method === "POST" ? 202 : 200);
    } catch (err) {
      const status = err instanceof HttpError ? err.status : 500;
      if (status === 500) console.error("[API] Error:", err);
      json(res, { error: errorMessage(err) }, status);
    }
  };

  return {
    routes,
    handleRequest,
    drain: async () => {
      await Promise.all([...inFlight]);
    },
  };
}

// === SERVER ===

function isMethod(method: string): method is Method {
  return method === "GET" || method === "POST";
}

export function matchRoute(
  routes: RouteTable,
  method: string,
  pathname: string
): { handler: RouteHandler; params: Record<string, string> } | null {
  if (!isMethod(method)) return null;

  for (const [pattern, handler] of Object.entries(routes[method])) {
    const patternParts = pattern.split("/");
    const pathParts = pathname.split("/");

    if (patternParts.length !== pathParts.length) continue;

    const params: Record<string, string> = {};
    let match = true;

    for (let i = 0; i < patternParts.length; i++) {
      const part = patternParts[i] ?? "";
      const actual = pathParts[i] ?? "";
      if (part.startsWith(":")) {
        params[part.slice(1)] = decodeURIComponent(actual);
      } else if (part !== actual) {
        match = false;
        break;
      }
    }

    if (match) return { handler, params };
  }

  return null;
}

/**
 * Release resources once every background run has settled, so a run that
 * was accepted before shutdown still writes its records and audit entries.
 */
export async function closeAfterDrain(api: Pick<Api, "drain">, close: () => void): Promise<void> {
  try {
    await api.drain();
  } finally {
    close();
  }
}

export async function startServer(port?: number) {
  const container = await createContainer();
  const api = createApi({
    pipeline: container.pipeline,
    queries: container.queries,
    objectStorage: container.objectStorage,
    bucketPrefix: container.config.BUCKET_PREFIX,
    backend: container.backend,
  });
  const listenPort = port ?? container.config.PORT;

  const server = http.createServer((req, res) => {
    void api.handleRequest(req, res);
  });

  server.listen(listenPort, () => {
    console.log(`API server running at http://localhost:${listenPort}`);
    console.log("\nAvailable endpoints:");
    console.log("  GET  /                         - Health");
    console.log("  POST /api/v1/claims/upload     - Upload files and start processing");
    console.log("  GET  /api/v1/claims?limit=10   - Latest record per claim");
    console.log("  GET  /api/v1/claims/:id        - Claim status");
    console.log("  GET  /api/v1/claims/:id/audit  - Audit trail");
  });

  server.on("close", () => {
    console.log("[API] Server closed, waiting for background runs");
    closeAfterDrain(api, () => container.close()).catch((err: unknown) => {
      console.error(`[API] Shutdown failed: ${errorMessage(err)}`);
    });
  });
  return server;
}

// Run if executed directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  startServer().catch((err: unknown) => {
    console.error("[API] Failed to start:", err);
    process.exit(1);
  });
}
