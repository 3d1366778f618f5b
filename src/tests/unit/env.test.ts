import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { loadEnv } from "../../config/env";

describe("loadEnv", () => {
  it("applies defaults when nothing is set", () => {
    const env = loadEnv({});

    assert.equal(env.nodeEnv, "development");
    assert.equal(env.port, 5000);
    assert.equal(env.supabaseUrl, undefined);
    assert.equal(env.supabaseKey, undefined);
    assert.equal(env.storageBucket, "cv-pdfs");
    assert.equal(env.corsOrigin, "http://localhost:3000");
    assert.equal(env.resumeFetchLimit, 3000);
    assert.equal(env.logLevel, "info");
    assert.equal(env.logFile, undefined);
    assert.equal(env.logFileMaxBytes, 10240);
    assert.equal(env.logFileBackups, 10);
  });

  it("reads Supabase settings and falls back to the read key for seeding", () => {
    const env = loadEnv({
      SUPABASE_URL: " https://example.supabase.co/ ",
      SUPABASE_KEY: "test-anon-key",
      LOG_LEVEL: "DEBUG",
      PORT: "8080",
    });

    assert.equal(env.supabaseUrl, "https://example.supabase.co");
    assert.equal(env.supabaseKey, "test-anon-key");
    assert.equal(env.supabaseServiceKey, "test-anon-key");
    assert.equal(env.logLevel, "debug");
    assert.equal(env.port, 8080);
  });

  it("returns a frozen value", () => {
    assert.ok(Object.isFrozen(loadEnv({})));
  });

  it("rejects invalid values with the variable name", () => {
    assert.throws(() => loadEnv({ PORT: "abc" }), { message: "Invalid PORT value: abc" });
    assert.throws(() => loadEnv({ RESUME_FETCH_LIMIT: "0" }), {
      message: "Invalid RESUME_FETCH_LIMIT value: 0",
    });
    assert.throws(() => loadEnv({ LOG_LEVEL: "verbose" }), {
      message: "Invalid LOG_LEVEL value: verbose",
    });
  });
});
