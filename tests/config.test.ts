import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { loadConfig } from "../src/agent/feeder.js";
import { createStorageTool } from "../src/tools/storage.js";
import { atClock, nextDailyOccurrence, nowIn, parseWallTime } from "../src/tools/time.js";
import { TEST_NOW, TEST_TZ } from "./helpers.js";

test("default config loads without environment overrides", async () => {
  const config = await loadConfig({});
  assert.equal(config.limits.maxToolCalls, 10);
  assert.equal(config.feeder.portionGrams, 17);
  assert.equal(config.scheduler.timezone, "Asia/Shanghai");
  assert.equal(config.llm.apiKey, undefined);
  assert.equal(config.backend, undefined);
});

test("environment variables override the defaults", async () => {
  const config = await loadConfig({
    FEEDER_USER: "tester",
    FEEDER_PASS: "test-secret",
    FEEDER_TIMEOUT_MS: "5000",
    FEEDER_TIMEZONE: "UTC",
    LLM_API_KEY: "test-secret",
    LLM_MODEL: "test-model",
    LLM_TEMPERATURE: "0.5",
    FEEDER_DB_PATH: "./tmp/tasks.sqlite",
    BACKEND_API_BASE_URL: "http://backend.test",
    BATCH_ID: "7"
  });

  assert.equal(config.feeder.user, "tester");
  assert.equal(config.feeder.password, "test-secret");
  assert.equal(config.feeder.timeoutMs, 5000);
  assert.equal(config.scheduler.timezone, "UTC");
  assert.equal(config.llm.model, "test-model");
  assert.equal(config.llm.temperature, 0.5);
  assert.equal(config.storage.dbPath, "./tmp/tasks.sqlite");
  assert.deepEqual(config.backend, { baseUrl: "http://backend.test", timeoutMs: 10_000, batchId: 7, poolId: "4" });
});

test("invalid overrides are rejected", async () => {
  await assert.rejects(loadConfig({ FEEDER_BASE_URL: "not a url" }), { name: "ZodError" });
});

test("history is appended as JSON lines and read newest first", async () => {
  const dir = await mkdtemp(join(tmpdir(), "feeder-history-"));
  const path = join(dir, "nested", "history.jsonl");
  const storage = createStorageTool(path);

  try {
    assert.deepEqual(await storage.listHistory(), []);

    await storage.appendHistory({ ts: "2026-10-18T02:00:00.000Z", type: "feed", input: { n: 1 }, output: {} });
    await storage.appendHistory({ ts: "2026-10-18T02:01:00.000Z", type: "chat", input: { n: 2 }, output: {} });
    await writeFile(path, "not json\n", { flag: "a" });
    await storage.appendHistory({ ts: "2026-10-18T02:02:00.000Z", type: "schedule", input: { n: 3 }, output: {} });

    const events = await storage.listHistory(2);
    assert.deepEqual(
      events.map((event) => event.input.n),
      [3, 2]
    );
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("wall times are read in the configured zone", () => {
  assert.equal(parseWallTime("2026-10-18T15:30:00", TEST_TZ)?.toISOString(), "2026-10-18T07:30:00.000Z");
  assert.equal(parseWallTime("2026-10-18T15:30:00+08:00", TEST_TZ)?.format(), "2026-10-18T15:30:00+08:00");
  assert.equal(parseWallTime("2026-13-01T00:00:00", TEST_TZ), null);
  assert.equal(parseWallTime("tomorrow", TEST_TZ), null);

  const now = nowIn(TEST_TZ, TEST_NOW);
  assert.equal(atClock(now, "07:15:00", TEST_TZ).format(), "2026-10-18T07:15:00+08:00");
  assert.equal(nextDailyOccurrence(atClock(now, "09:59:59", TEST_TZ), now, TEST_TZ).format(), "2026-10-19T09:59:59+08:00");
  assert.equal(nextDailyOccurrence(atClock(now, "10:00:01", TEST_TZ), now, TEST_TZ).format(), "2026-10-18T10:00:01+08:00");
});
