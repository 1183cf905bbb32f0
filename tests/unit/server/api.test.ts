import { describe, expect, it } from "vitest";
import {
  HttpError,
  closeAfterDrain,
  createApi,
  matchRoute,
  type Api,
  type RouteContext,
} from "../../../src/server/api.js";
import { ClaimQueries } from "../../../src/services/claim-queries.js";
import { createHarness, type Harness } from "../fakes.js";

function setup(): { api: Api; harness: Harness } {
  const harness = createHarness();
  const api = createApi({
    pipeline: harness.pipeline,
    queries: new ClaimQueries(harness.deps.claimRecords, harness.deps.auditLog),
    objectStorage: harness.deps.objectStorage,
    bucketPrefix: "claims",
    backend: "sqlite",
  });
  return { api, harness };
}

/**
 * Resolve and call a route the way the request handler does.
 */
async function call(api: Api, method: string, url: string, body?: unknown): Promise<unknown> {
  const requestUrl = new URL(url, "http://localhost");
  const route = matchRoute(api.routes, method, requestUrl.pathname);
  if (!route) throw new Error(`no route for ${method} ${url}`);
  const ctx: RouteContext = { params: route.params, query: requestUrl.searchParams, body };
  return route.handler(ctx);
}

describe("matchRoute", () => {
  it("matches literal and parameterised paths", () => {
    const { api } = setup();

    expect(matchRoute(api.routes, "GET", "/api/v1/claims")?.params).toEqual({});
    expect(matchRoute(api.routes, "GET", "/api/v1/claims/CLAIM-1")?.params).toEqual({ id: "CLAIM-1" });
    expect(matchRoute(api.routes, "GET", "/api/v1/claims/CLAIM%201/audit")?.params).toEqual({ id: "CLAIM 1" });
  });

  it("rejects unknown paths and methods", () => {
    const { api } = setup();

    expect(matchRoute(api.routes, "GET", "/api/v2/claims")).toBeNull();
    expect(matchRoute(api.routes, "DELETE", "/api/v1/claims/CLAIM-1")).toBeNull();
    expect(matchRoute(api.routes, "POST", "/api/v1/claims")).toBeNull();
  });
});

describe("API routes", () => {
  it("reports health", async () => {
    const { api } = setup();

    expect(await call(api, "GET", "/")).toEqual({ status: "ok", service: "claim-pipeline", backend: "sqlite" });
  });

  it("stores uploads, starts processing and serves the outcome", async () => {
    const { api, harness } = setup();

    const accepted = await call(api, "POST", "/api/v1/claims/upload", {
      files: [{ filename: "../../form.pdf", contentBase64: Buffer.from("%PDF-1.4").toString("base64") }],
    });

    expect(accepted).toMatchObject({ status: "processing" });
    const claimId = typeof accepted === "object" && accepted !== null && "claimId" in accepted ? accepted.claimId : null;
    expect(claimId).toMatch(/^CLAIM-\d{14}$/);
    expect(accepted).toEqual({
      claimId,
      status: "processing",
      files: [{ filename: "form.pdf", bucket: "claims-raw-claims", key: `${String(claimId)}/form.pdf`, size: 8 }],
    });

    const stored = harness.deps.objectStorage.objects.get(`claims-raw-claims/${String(claimId)}/form.pdf`);
    expect(stored?.contentType).toBe("application/pdf");
    expect(stored?.body.toString("utf-8")).toBe("%PDF-1.4");

    await api.drain();

    expect(harness.deps.textExtractor.calls).toEqual([
      { bucket: "claims-raw-claims", key: `${String(claimId)}/form.pdf` },
    ]);
    expect(await call(api, "GET", `/api/v1/claims/${String(claimId)}`)).toMatchObject({
      claimId,
      status: "decided",
      decision: { decision: "APPROVED" },
      auditEntries: 5,
    });

    const audit = await call(api, "GET", `/api/v1/claims/${String(claimId)}/audit`);
    expect(audit).toMatchObject({ claimId });
    expect(audit).toHaveProperty("entries.length", 5);

    const list = await call(api, "GET", "/api/v1/claims?limit=5");
    expect(list).toHaveProperty("count", 1);
  });

  it("keeps an explicit content type", async () => {
    const { api, harness } = setup();

    await call(api, "POST", "/api/v1/claims/upload", {
      files: [{ filename: "scan.bin", contentType: "image/png", contentBase64: "" }],
    });
    await api.drain();

    const [stored] = harness.deps.objectStorage.objects.values();
    expect(stored?.contentType).toBe("image/png");
  });

  it("rejects uploads without files", async () => {
    const { api } = setup();

    await expect(call(api, "POST", "/api/v1/claims/upload", { files: [] })).rejects.toThrow(
      "at least one file is required"
    );
    await expect(call(api, "POST", "/api/v1/claims/upload", {})).rejects.toBeInstanceOf(HttpError);
  });

  it("rejects file names that are only directories", async () => {
    const { api } = setup();

    await expect(
      call(api, "POST", "/api/v1/claims/upload", { files: [{ filename: "..", contentBase64: "" }] })
    ).rejects.toMatchObject({ status: 400, message: "invalid filename: .." });
  });

  it("answers 404 for an unknown claim", async () => {
    const { api } = setup();

    await expect(call(api, "GET", "/api/v1/claims/CLAIM-00000000000000")).rejects.toMatchObject({
      status: 404,
      message: "Claim not found",
    });
  });

  it("validates the list limit", async () => {
    const { api } = setup();

    await expect(call(api, "GET", "/api/v1/claims?limit=0")).rejects.toMatchObject({ status: 400 });
    await expect(call(api, "GET", "/api/v1/claims?limit=abc")).rejects.toMatchObject({ status: 400 });
    expect(await call(api, "GET", "/api/v1/claims")).toEqual({ claims: [], count: 0 });
  });
});

describe("shutdown", () => {
  it("closes storage only after accepted runs have written their trail", async () => {
    const { api, harness } = setup();
    let release = () => {};
    harness.deps.textExtractor.gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    await call(api, "POST", "/api/v1/claims/upload", {
      files: [{ filename: "form.pdf", contentBase64: Buffer.from("%PDF-1.4").toString("base64") }],
    });

    let entriesAtClose: number | null = null;
    const shutdown = closeAfterDrain(api, () => {
      const row = harness.database
        .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM audit_log")
        .get();
      entriesAtClose = row?.n ?? 0;
      harness.database.close();
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(entriesAtClose).toBeNull();
    expect(harness.database.open).toBe(true);

    release();
    await shutdown;

    expect(entriesAtClose).toBe(5);
    expect(harness.database.open).toBe(false);
  });
});
