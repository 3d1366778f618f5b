import assert from "node:assert/strict";
import { after, before, describe, it } from "node:test";
import express, { NextFunction, Request, Response } from "express";
import { SupabaseRestClient } from "../../db/supabase.client";
import { SupabaseRequestError } from "../../shared/errors";
import { SupabaseStorageClient } from "../../storage/supabase-storage.client";
import { listenOnEphemeralPort, RunningServer } from "../support/http";

interface RecordedRequest {
  method: string;
  path: string;
  query: Record<string, unknown>;
  apikey?: string;
  authorization?: string;
  prefer?: string;
  upsert?: string;
  contentType?: string;
  body: unknown;
}

function buildSupabaseStandIn(recorded: RecordedRequest[]): express.Express {
  const app = express();
  app.use(express.json());
  app.use(express.raw({ type: "application/pdf" }));
  app.use((request: Request, _response: Response, next: NextFunction) => {
    recorded.push({
      method: request.method,
      path: request.path,
      query: { ...request.query },
      apikey: request.header("apikey"),
      authorization: request.header("authorization"),
      prefer: request.header("prefer"),
      upsert: request.header("x-upsert"),
      contentType: request.header("content-type"),
      body: Buffer.isBuffer(request.body) ? request.body.length : request.body,
    });
    next();
  });

  app.get("/rest/v1/resumes", (_request: Request, response: Response) => {
    response.json([{ id: 1, resume_text: "Go" }]);
  });
  app.get("/rest/v1/broken", (_request: Request, response: Response) => {
    response.status(500).send("boom");
  });
  app.post("/rest/v1/candidates", (request: Request, response: Response) => {
    response.status(201).json([{ id: "c-1", ...request.body }]);
  });
  app.delete("/rest/v1/candidates", (_request: Request, response: Response) => {
    response.status(204).end();
  });
  app.post("/storage/v1/object/list/cv-pdfs", (_request: Request, response: Response) => {
    response.json([
      { name: "IT", id: null },
      { name: "loose.pdf", id: "f-1" },
      { id: "no-name" },
    ]);
  });
  app.post("/storage/v1/object/cv-pdfs/IT/1.pdf", (_request: Request, response: Response) => {
    response.json({ Key: "cv-pdfs/IT/1.pdf" });
  });
  app.delete("/storage/v1/object/cv-pdfs", (_request: Request, response: Response) => {
    response.json([]);
  });
  return app;
}

describe("Supabase clients against an in-process stand-in", () => {
  const recorded: RecordedRequest[] = [];
  let server: RunningServer;
  let rest: SupabaseRestClient;
  let storage: SupabaseStorageClient;

  before(async () => {
    server = await listenOnEphemeralPort(buildSupabaseStandIn(recorded));
    rest = new SupabaseRestClient({ url: server.baseUrl, apiKey: "test-key" });
    storage = new SupabaseStorageClient({ url: server.baseUrl, apiKey: "test-key", bucket: "cv-pdfs" });
  });

  after(async () => {
    await server.close();
  });

  function lastRequest(): RecordedRequest | undefined {
    return recorded[recorded.length - 1];
  }

  it("selects with columns, filters, order and limit", async () => {
    const rows = await rest.selectMany("resumes", {
      columns: "id,resume_text",
      filters: [{ column: "category", operator: "eq", value: "IT" }],
      orderBy: { column: "id" },
      limit: 10,
    });

    assert.deepEqual(rows, [{ id: 1, resume_text: "Go" }]);
    assert.deepEqual(lastRequest()?.query, {
      select: "id,resume_text",
      category: "eq.IT",
      order: "id.asc",
      limit: "10",
    });
    assert.equal(lastRequest()?.apikey, "test-key");
    assert.equal(lastRequest()?.authorization, "Bearer test-key");
  });

  it("raises SupabaseRequestError on a failed response", async () => {
    await assert.rejects(rest.selectMany("broken"), (error: unknown) => {
      assert.ok(error instanceof SupabaseRequestError);
      assert.equal(error.status, 500);
      assert.equal(error.message, "Supabase select on broken failed: HTTP 500 - boom");
      return true;
    });
  });

  it("inserts and returns the stored representation", async () => {
    const rows = await rest.insert("candidates", { full_name: "Ada Stone" });

    assert.deepEqual(rows, [{ id: "c-1", full_name: "Ada Stone" }]);
    assert.equal(lastRequest()?.prefer, "return=representation");
  });

  it("deletes with an operator filter", async () => {
    await rest.deleteWhere("candidates", {
      column: "id",
      operator: "neq",
      value: "00000000-0000-0000-0000-000000000000",
    });

    assert.equal(lastRequest()?.method, "DELETE");
    assert.deepEqual(lastRequest()?.query, { id: "neq.00000000-0000-0000-0000-000000000000" });
  });

  it("lists, uploads and removes storage objects", async () => {
    assert.deepEqual(await storage.list(), [
      { name: "IT", id: null },
      { name: "loose.pdf", id: "f-1" },
    ]);
    assert.deepEqual(lastRequest()?.body, { prefix: "", limit: 1000, offset: 0 });

    await storage.upload("IT/1.pdf", Buffer.from("%PDF-1.4"), "application/pdf", { upsert: true });
    assert.equal(lastRequest()?.upsert, "true");
    assert.equal(lastRequest()?.contentType, "application/pdf");
    assert.equal(lastRequest()?.body, 8);

    await storage.remove(["IT/1.pdf", "loose.pdf"]);
    assert.equal(lastRequest()?.method, "DELETE");
    assert.deepEqual(lastRequest()?.body, { prefixes: ["IT/1.pdf", "loose.pdf"] });
  });
});
