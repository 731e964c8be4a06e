import test from "node:test";
import assert from "node:assert/strict";
import { parseConfig } from "../src/config.js";
import { captureLogs } from "./fakes.js";

function withEnv(vars: Record<string, string | undefined>, fn: () => void): void {
  const saved: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(vars)) {
    saved[key] = process.env[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
  try {
    fn();
  } finally {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  }
}

test("parseConfig fills reconciliation defaults", () => {
  captureLogs();
  withEnv({ MEMWEAVE_DB_PATH: undefined, MEMWEAVE_DIAGNOSTICS_FILE: undefined }, () => {
    const cfg = parseConfig({});
    assert.equal(cfg.topK, 5);
    assert.equal(cfg.matchThreshold, 0.88);
    assert.equal(cfg.duplicateThreshold, 0.97);
    assert.equal(cfg.conflictConfidenceMargin, 0.2);
    assert.equal(cfg.defaultConfidence, 0.8);
    assert.equal(cfg.conflictDetectionEnabled, true);
    assert.equal(cfg.factConcurrency, 4);
    assert.equal(cfg.diagnosticsFile, undefined);
    assert.equal(cfg.diagnosticsMaxBytes, 5 * 1024 * 1024);
    assert.equal(cfg.debug, false);
    assert.ok(cfg.dbPath.endsWith("memories.sqlite"));
  });
});

test("parseConfig expands ${ENV_VAR} in the API key", () => {
  captureLogs();
  withEnv({ TEST_MEMWEAVE_KEY: "test-secret" }, () => {
    assert.equal(parseConfig({ openaiApiKey: "${TEST_MEMWEAVE_KEY}" }).openaiApiKey, "test-secret");
  });
});

test("parseConfig throws when a referenced env var is missing", () => {
  captureLogs();
  withEnv({ TEST_MEMWEAVE_MISSING: undefined }, () => {
    assert.throws(() => parseConfig({ openaiApiKey: "${TEST_MEMWEAVE_MISSING}" }), /TEST_MEMWEAVE_MISSING is not set/);
  });
});

test("parseConfig falls back to OPENAI_API_KEY and MEMWEAVE_DB_PATH", () => {
  captureLogs();
  withEnv({ OPENAI_API_KEY: "test-secret", MEMWEAVE_DB_PATH: "/tmp/memweave-test.sqlite" }, () => {
    const cfg = parseConfig({});
    assert.equal(cfg.openaiApiKey, "test-secret");
    assert.equal(cfg.dbPath, "/tmp/memweave-test.sqlite");
  });
});

test("openaiBaseUrl drops trailing slashes and warns on remote http", () => {
  const { lines } = captureLogs();
  withEnv({ OPENAI_BASE_URL: undefined }, () => {
    assert.equal(parseConfig({ openaiBaseUrl: "http://localhost:11434/v1/" }).openaiBaseUrl, "http://localhost:11434/v1");
    assert.equal(lines.length, 0);
    assert.equal(parseConfig({ openaiBaseUrl: "http://models.example.test/v1" }).openaiBaseUrl, "http://models.example.test/v1");
    assert.equal(lines.filter((l) => l.level === "warn").length, 1);
  });
});

test("openaiBaseUrl rejects unsupported schemes", () => {
  const { lines } = captureLogs();
  withEnv({ OPENAI_BASE_URL: undefined }, () => {
    assert.equal(parseConfig({ openaiBaseUrl: "ftp://models.example.test" }).openaiBaseUrl, undefined);
    assert.match(lines[0]?.msg ?? "", /unsupported URL scheme \(ftp\)/);
  });
});

test("duplicateThreshold is raised to matchThreshold", () => {
  const { lines } = captureLogs();
  const cfg = parseConfig({ matchThreshold: 0.9, duplicateThreshold: 0.8 });
  assert.equal(cfg.duplicateThreshold, 0.9);
  assert.equal(lines.length, 1);
});

test("numeric settings are clamped and bad types ignored", () => {
  captureLogs();
  const cfg = parseConfig({ matchThreshold: 7, topK: "ten", conflictDetectionEnabled: false, debug: true });
  assert.equal(cfg.matchThreshold, 1);
  assert.equal(cfg.duplicateThreshold, 1);
  assert.equal(cfg.topK, 5);
  assert.equal(cfg.conflictDetectionEnabled, false);
  assert.equal(cfg.debug, true);
});
