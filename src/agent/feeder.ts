import { readFile } from "node:fs/promises";
import { createFeederApi } from "../tools/feederApi.js";
import { makeOpenAiChatModel } from "../tools/llm.js";
import { createLogger } from "../tools/logger.js";
import { createRecordUploader } from "../tools/records.js";
import { createStorageTool } from "../tools/storage.js";
import { openTaskStore } from "../server/db.js";
import { TaskScheduler } from "../server/scheduler.js";
import { configSchema, type AgentConfig, type AgentContext } from "./schema.js";

function numberFrom(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function applyEnv(config: AgentConfig, env: NodeJS.ProcessEnv): AgentConfig {
  const backendUrl = env.BACKEND_API_BASE_URL || config.backend?.baseUrl;

  return {
    ...config,
    feeder: {
      ...config.feeder,
      baseUrl: env.FEEDER_BASE_URL || config.feeder.baseUrl,
      timeoutMs: numberFrom(env.FEEDER_TIMEOUT_MS) ?? config.feeder.timeoutMs,
      user: env.FEEDER_USER || config.feeder.user,
      password: env.FEEDER_PASS || config.feeder.password
    },
    scheduler: {
      ...config.scheduler,
      timezone: env.FEEDER_TIMEZONE || config.scheduler.timezone
    },
    llm: {
      ...config.llm,
      model: env.LLM_MODEL || config.llm.model,
      temperature: numberFrom(env.LLM_TEMPERATURE) ?? config.llm.temperature,
      baseUrl: env.LLM_BASE_URL || config.llm.baseUrl,
      apiKey: env.LLM_API_KEY || config.llm.apiKey
    },
    storage: {
      ...config.storage,
      dbPath: env.FEEDER_DB_PATH || config.storage.dbPath
    },
    backend: backendUrl
      ? {
          baseUrl: backendUrl,
          timeoutMs: config.backend?.timeoutMs ?? 10_000,
          batchId: numberFrom(env.BATCH_ID) ?? config.backend?.batchId ?? 2,
          poolId: env.POOL_ID || config.backend?.poolId || "4"
        }
      : undefined
  };
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AgentConfig> {
  const configUrl = new URL("../config/default.json", import.meta.url);
  const raw: unknown = JSON.parse(await readFile(configUrl, "utf8"));
  return configSchema.parse(applyEnv(configSchema.parse(raw), env));
}

export async function createFeederContext(env: NodeJS.ProcessEnv = process.env): Promise<AgentContext> {
  const config = await loadConfig(env);
  const logger = createLogger(env.FEEDER_LOG_LEVEL);
  const now = () => new Date();

  const llm = config.llm.apiKey
    ? makeOpenAiChatModel({
        apiKey: config.llm.apiKey,
        baseUrl: config.llm.baseUrl,
        model: config.llm.model,
        temperature: config.llm.temperature
      })
    : null;
  if (!llm) {
    logger.info("LLM_API_KEY not set; requests go through the rule-based router");
  }

  return {
    config,
    llm,
    now,
    scheduler: new TaskScheduler({
      timezone: config.scheduler.timezone,
      checkIntervalMs: config.scheduler.checkIntervalSec * 1000,
      logger: createLogger(env.FEEDER_LOG_LEVEL, "scheduler"),
      now
    }),
    tools: {
      feeder: createFeederApi({
        baseUrl: config.feeder.baseUrl,
        user: config.feeder.user,
        password: config.feeder.password,
        timeoutMs: config.feeder.timeoutMs,
        logger: createLogger(env.FEEDER_LOG_LEVEL, "feeder-api")
      }),
      records: config.backend
        ? createRecordUploader({ ...config.backend, logger: createLogger(env.FEEDER_LOG_LEVEL, "records") })
        : null,
      tasks: openTaskStore(config.storage.dbPath, now),
      storage: createStorageTool(config.storage.historyPath),
      logger
    }
  };
}

export async function closeFeederContext(context: AgentContext): Promise<void> {
  await context.scheduler.stop();
  context.tools.tasks.close();
}
