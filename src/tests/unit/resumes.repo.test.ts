import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { ResumesRepository } from "../../db/repositories/resumes.repo";
import { ColumnFilter, SelectOptions } from "../../db/supabase.client";
import { createRecordingLogger } from "../support/fakes";

class SupabaseStub {
  readonly selects: Array<{ table: string; options?: SelectOptions }> = [];
  readonly inserts: Array<{ table: string; payload: Record<string, unknown> }> = [];
  readonly deletes: Array<{ table: string; filter: ColumnFilter }> = [];

  constructor(private readonly rows: unknown[]) {}

  async selectMany(table: string, options?: SelectOptions): Promise<unknown[]> {
    this.selects.push({ table, options });
    return this.rows;
  }

  async insert(table: string, payload: Record<string, unknown>): Promise<unknown[]> {
    this.inserts.push({ table, payload });
    return [];
  }

  async deleteWhere(table: string, filter: ColumnFilter): Promise<void> {
    this.deletes.push({ table, filter });
  }
}

describe("ResumesRepository", () => {
  it("maps joined rows to candidates and skips rows without a candidate", async () => {
    const stub = new SupabaseStub([
      {
        id: 1,
        resume_text: "Go developer",
        pdf_url: "IT/1.pdf",
        category: "IT",
        candidates: { id: "c-1", full_name: "Ada Stone", email: "ada@example.com", phone_number: null },
      },
      {
        id: 2,
        resume_text: null,
        pdf_url: null,
        category: "HR",
        candidates: [{ id: 42, full_name: "Bo Lane" }],
      },
      { id: 3, resume_text: "orphan", candidates: null },
      "not a row",
    ]);
    const logger = createRecordingLogger();
    const repository = new ResumesRepository(logger, stub);

    const candidates = await repository.fetchCandidates(50);

    assert.deepEqual(candidates, [
      {
        id: "c-1",
        name: "Ada Stone",
        resumeText: "Go developer",
        pdfReference: "IT/1.pdf",
        email: "ada@example.com",
        phoneNumber: null,
        category: "IT",
      },
      {
        id: "42",
        name: "Bo Lane",
        resumeText: null,
        pdfReference: null,
        email: null,
        phoneNumber: null,
        category: "HR",
      },
    ]);
    assert.deepEqual(stub.selects, [
      {
        table: "resumes",
        options: {
          columns: "id,resume_text,pdf_url,category,candidates(id,full_name,email,phone_number)",
          orderBy: { column: "id" },
          limit: 50,
        },
      },
    ]);
    const warnings = logger.entries.filter((entry) => entry.level === "warn");
    assert.deepEqual(warnings, [
      {
        level: "warn",
        message: "Resumes without a linked candidate were skipped",
        meta: { skipped: 2 },
      },
    ]);
  });

  it("keeps resumes whose text is not a string and counts them", async () => {
    const stub = new SupabaseStub([
      { id: 1, resume_text: 1234, category: "IT", candidates: { id: "c-1", full_name: "Ada Stone" } },
      { id: 2, resume_text: "Go", category: "IT", candidates: { id: "c-2", full_name: "Bo Lane" } },
      { id: 3, resume_text: null, category: "IT", candidates: { id: "c-3", full_name: "Cy Park" } },
    ]);
    const logger = createRecordingLogger();
    const repository = new ResumesRepository(logger, stub);

    const candidates = await repository.fetchCandidates(10);

    assert.deepEqual(
      candidates.map((candidate) => [candidate.id, candidate.resumeText]),
      [
        ["c-1", null],
        ["c-2", "Go"],
        ["c-3", null],
      ],
    );
    assert.deepEqual(
      logger.entries.filter((entry) => entry.level === "debug"),
      [
        {
          level: "debug",
          message: "Resumes fetched from Supabase",
          meta: { rows: 3, candidates: 3, nonTextResumes: 1 },
        },
      ],
    );
  });

  it("returns nothing when no client is configured", async () => {
    const repository = new ResumesRepository(createRecordingLogger());

    assert.equal(repository.isEnabled(), false);
    assert.deepEqual(await repository.fetchCandidates(), []);
  });

  it("writes and clears resume rows", async () => {
    const stub = new SupabaseStub([]);
    const repository = new ResumesRepository(createRecordingLogger(), stub);

    await repository.insertResume({
      candidateId: "c-1",
      resumeText: "text",
      pdfUrl: null,
      category: "IT",
    });
    await repository.deleteAll();

    assert.deepEqual(stub.inserts, [
      {
        table: "resumes",
        payload: { candidate_id: "c-1", resume_text: "text", pdf_url: null, category: "IT" },
      },
    ]);
    assert.deepEqual(stub.deletes, [
      { table: "resumes", filter: { column: "id", operator: "gt", value: -1 } },
    ]);
  });
});
