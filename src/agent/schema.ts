import { z } from "zod";
import type { TaskScheduler } from "../server/scheduler.js";

export interface WorkflowResult<T = Record<string, unknown>> {
  human: string;
  data: T;
}

/** Result handed back to the model (and HTTP callers) for every tool call. */
export type ToolOutcome = { success: boolean; message: string } & Record<string, unknown>;

export const taskModeSchema = z.enum(["once", "daily"]);
export type TaskMode = z.infer<typeof taskModeSchema>;

export const taskStatusSchema = z.enum(["pending", "running", "completed", "failed", "cancelled"]);
export type TaskStatus = z.infer<typeof taskStatusSchema>;

export type OperationStatus =
  | "success"
  | "failed"
  | "pending"
  | "timeout"
  | "device_offline"
  | "invalid_params";

export const configSchema = z.object({
  agent: z.object({
    name: z.string(),
    role: z.string(),
    mode: z.enum(["llm", "rules"])
  }),
  limits: z.object({
    maxToolCalls: z.number().int().positive()
  }),
  feeder: z.object({
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive(),
    portionGrams: z.number().positive(),
    user: z.string().optional(),
    password: z.string().optional()
  }),
  scheduler: z.object({
    timezone: z.string(),
    checkIntervalSec: z.number().positive()
  }),
  llm: z.object({
    model: z.string(),
    temperature: z.number().min(0).max(2),
    baseUrl: z.string().url().optional(),
    apiKey: z.string().optional()
  }),
  storage: z.object({
    dbPath: z.string(),
    historyPath: z.string()
  }),
  backend: z
    .object({
      baseUrl: z.string().url(),
      timeoutMs: z.number().int().positive(),
      batchId: z.number().int(),
      poolId: z.string()
    })
    .optional()
});

export type AgentConfig = z.infer<typeof configSchema>;

export interface Device {
  devID: string;
  devName: string;
  devType?: string;
  devVersion?: string;
  devTimeZone?: string | number;
  netType?: string | number;
}

export interface TaskRequest {
  device_id: string;
  feed_count: number;
  scheduled_time: string;
}

export interface TaskRecord {
  id: number;
  taskId: string;
  topic: string;
  toolName: string;
  mode: TaskMode;
  request: TaskRequest;
  status: TaskStatus;
  response: Record<string, unknown> | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export type HistoryEventType = "feed" | "schedule" | "task-run" | "chat";

export interface HistoryEvent {
  ts: string;
  type: HistoryEventType;
  input: Record<string, unknown>;
  output: Record<string, unknown>;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: string;
}

export type ChatTurn =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; toolCalls?: ToolCallRequest[] }
  | { role: "tool"; toolCallId: string; content: string };

export type JsonSchemaProperty = {
  type: "string" | "integer" | "number" | "boolean";
  description?: string;
  enum?: string[];
  minimum?: number;
  maximum?: number;
};

export type JsonSchemaObject = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
  additionalProperties: false;
};

export interface ToolSpec {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
}

export interface ChatModel {
  complete(args: {
    messages: ChatTurn[];
    tools: ToolSpec[];
  }): Promise<{ content: string | null; toolCalls: ToolCallRequest[] }>;
}

export interface AgentContext {
  config: AgentConfig;
  tools: AgentTools;
  scheduler: TaskScheduler;
  llm: ChatModel | null;
  now(): Date;
}

export interface AgentTools {
  feeder: {
    feed(deviceId: string, count: number): Promise<void>;
    listDevices(): Promise<Device[]>;
    deviceStatus(deviceId: string): Promise<Record<string, unknown> | null>;
  };
  records: {
    sendFeedRecord(record: {
      feederId: string;
      feedAmountG: number;
      status: "ok" | "warning" | "error";
      notes?: string;
      timestamp?: number;
    }): Promise<void>;
  } | null;
  tasks: {
    insertTask(input: {
      taskId: string;
      topic: string;
      toolName: string;
      mode: TaskMode;
      request: TaskRequest;
      status: TaskStatus;
    }): TaskRecord;
    getTask(taskId: string): TaskRecord | null;
    updateTask(
      taskId: string,
      patch: {
        mode?: TaskMode;
        request?: TaskRequest;
        status?: TaskStatus;
        response?: Record<string, unknown> | null;
        completedAt?: string | null;
      }
    ): boolean;
    listTasks(filter: { topic: string; status?: TaskStatus; limit?: number }): TaskRecord[];
    close(): void;
  };
  storage: {
    appendHistory(event: HistoryEvent): Promise<void>;
    listHistory(limit?: number): Promise<HistoryEvent[]>;
  };
  logger: Logger;
}
