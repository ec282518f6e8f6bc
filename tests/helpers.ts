import type { AgentConfig, AgentContext, AgentTools, ChatModel, Device, HistoryEvent, Logger } from "../src/agent/schema.js";
import { openTaskStore } from "../src/server/db.js";
import { TaskScheduler } from "../src/server/scheduler.js";

// 10:00 on 2026-10-18 in Asia/Shanghai.
export const TEST_NOW = new Date("2026-10-18T02:00:00Z");
export const TEST_TZ = "Asia/Shanghai";

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {}
};

export function testConfig(overrides: { maxToolCalls?: number } = {}): AgentConfig {
  return {
    agent: { name: "FeederAgent", role: "test", mode: "llm" },
    limits: { maxToolCalls: overrides.maxToolCalls ?? 10 },
    feeder: { baseUrl: "http://feeder.test/commonRequest", timeoutMs: 1000, portionGrams: 17 },
    scheduler: { timezone: TEST_TZ, checkIntervalSec: 60 },
    llm: { model: "test-model", temperature: 0 },
    storage: { dbPath: ":memory:", historyPath: "unused.jsonl" }
  };
}

type FeederTools = AgentTools["feeder"];

export interface FakeFeeder extends FeederTools {
  feeds: Array<{ deviceId: string; count: number }>;
  failNextFeed(error: Error): void;
}

export function createFakeFeeder(
  devices: Device[] = [
    { devID: "dev-001", devName: "AI2" },
    { devID: "dev-002", devName: "Koi Pond" }
  ]
): FakeFeeder {
  const feeds: Array<{ deviceId: string; count: number }> = [];
  let pendingFailure: Error | null = null;

  return {
    feeds,
    failNextFeed(error) {
      pendingFailure = error;
    },
    async feed(deviceId, count) {
      if (pendingFailure) {
        const error = pendingFailure;
        pendingFailure = null;
        throw error;
      }
      feeds.push({ deviceId, count });
    },
    async listDevices() {
      return devices;
    },
    async deviceStatus(deviceId) {
      return devices.some((device) => device.devID === deviceId) ? { devID: deviceId, online: true } : null;
    }
  };
}

type StorageTools = AgentTools["storage"];

export interface MemoryStorage extends StorageTools {
  events: HistoryEvent[];
}

export function createMemoryStorage(): MemoryStorage {
  const events: HistoryEvent[] = [];
  return {
    events,
    async appendHistory(event) {
      events.push(event);
    },
    async listHistory(limit = 50) {
      return events.slice(-limit).reverse();
    }
  };
}

export interface TestHarness {
  context: AgentContext;
  clock: { current: Date };
  feeder: FakeFeeder;
  storage: MemoryStorage;
  uploads: Array<Parameters<NonNullable<AgentTools["records"]>["sendFeedRecord"]>[0]>;
}

export function createHarness(
  options: { llm?: ChatModel | null; devices?: Device[]; maxToolCalls?: number; withRecords?: boolean } = {}
): TestHarness {
  const clock = { current: TEST_NOW };
  const now = () => clock.current;
  const feeder = createFakeFeeder(options.devices);
  const storage = createMemoryStorage();
  const uploads: TestHarness["uploads"] = [];

  const context: AgentContext = {
    config: testConfig({ maxToolCalls: options.maxToolCalls }),
    llm: options.llm ?? null,
    now,
    scheduler: new TaskScheduler({ timezone: TEST_TZ, checkIntervalMs: 60_000, logger: silentLogger, now }),
    tools: {
      feeder,
      records: options.withRecords
        ? {
            async sendFeedRecord(record) {
              uploads.push(record);
            }
          }
        : null,
      tasks: openTaskStore(":memory:", now),
      storage,
      logger: silentLogger
    }
  };

  return { context, clock, feeder, storage, uploads };
}
