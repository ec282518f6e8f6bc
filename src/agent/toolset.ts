import { z } from "zod";
import type { AgentContext, JsonSchemaObject, JsonSchemaProperty, ToolOutcome, ToolSpec } from "./schema.js";
import {
  createScheduleTaskArgs,
  deleteScheduleTaskArgs,
  deviceInfoArgs,
  feedDeviceArgs,
  listScheduleTasksArgs,
  updateScheduleTaskArgs
} from "./contract.js";
import { errorMessage, errorStatus } from "./errors.js";
import { feedNow } from "../workflows/feedNow.js";
import { getDeviceInfo } from "../workflows/devices.js";
import {
  createScheduleTask,
  deleteScheduleTask,
  listScheduleTasks,
  updateScheduleTask
} from "../workflows/scheduleTasks.js";

export interface RegisteredTool extends ToolSpec {
  /** Validates raw model arguments and runs the tool. Never throws. */
  invoke(context: AgentContext, rawArgs: unknown): Promise<ToolOutcome>;
}

interface ToolDefinition<S extends z.AnyZodObject> {
  name: string;
  description: string;
  input: S;
  run(context: AgentContext, args: z.infer<S>): Promise<ToolOutcome> | ToolOutcome;
}

function describeProperty(schema: z.ZodTypeAny): { property: JsonSchemaProperty; optional: boolean } {
  let inner = schema;
  let optional = false;
  const description = schema.description;

  for (;;) {
    if (inner instanceof z.ZodOptional) {
      optional = true;
      inner = inner.unwrap();
    } else if (inner instanceof z.ZodDefault) {
      optional = true;
      inner = inner.removeDefault();
    } else {
      break;
    }
  }

  const text = description ?? inner.description;
  const withDescription = (property: JsonSchemaProperty): JsonSchemaProperty =>
    text ? { ...property, description: text } : property;

  if (inner instanceof z.ZodString) {
    return { property: withDescription({ type: "string" }), optional };
  }
  if (inner instanceof z.ZodNumber) {
    const property: JsonSchemaProperty = { type: inner.isInt ? "integer" : "number" };
    if (inner.minValue !== null) property.minimum = inner.minValue;
    if (inner.maxValue !== null) property.maximum = inner.maxValue;
    return { property: withDescription(property), optional };
  }
  if (inner instanceof z.ZodEnum) {
    const options: string[] = [...inner.options];
    return { property: withDescription({ type: "string", enum: options }), optional };
  }
  if (inner instanceof z.ZodBoolean) {
    return { property: withDescription({ type: "boolean" }), optional };
  }
  throw new Error(`Unsupported argument type: ${inner._def.typeName}`);
}

export function toJsonSchema(schema: z.AnyZodObject): JsonSchemaObject {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    const { property, optional } = describeProperty(value);
    properties[key] = property;
    if (!optional) required.push(key);
  }

  return { type: "object", properties, required, additionalProperties: false };
}

export function defineTool<S extends z.AnyZodObject>(definition: ToolDefinition<S>): RegisteredTool {
  return {
    name: definition.name,
    description: definition.description,
    parameters: toJsonSchema(definition.input),

    async invoke(context: AgentContext, rawArgs: unknown): Promise<ToolOutcome> {
      const parsed = definition.input.safeParse(rawArgs);
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
          .join("; ");
        return {
          success: false,
          status: "invalid_params",
          message: `invalid arguments for ${definition.name}: ${detail}`
        };
      }

      try {
        return await definition.run(context, parsed.data);
      } catch (error) {
        context.tools.logger.error(`Tool ${definition.name} failed: ${errorMessage(error)}`);
        return { success: false, status: errorStatus(error), message: errorMessage(error) };
      }
    }
  };
}

export const FEEDER_TOOLS: RegisteredTool[] = [
  defineTool({
    name: "feed_device",
    description: "立即控制喂食设备喂食。用户请求中没有明确时间时使用。",
    input: feedDeviceArgs,
    run: async (context, args) =>
      (await feedNow(context, { deviceId: args.device_id, feedCount: args.feed_count })).data
  }),
  defineTool({
    name: "create_schedule_task",
    description: "创建定时喂食任务。用户请求中有明确时间或循环词（每天、每日）时使用。",
    input: createScheduleTaskArgs,
    run: async (context, args) =>
      (
        await createScheduleTask(context, {
          deviceId: args.device_id,
          feedCount: args.feed_count,
          scheduledTime: args.scheduled_time,
          mode: args.mode
        })
      ).data
  }),
  defineTool({
    name: "list_schedule_tasks",
    description: "查看定时喂食任务列表，可按状态或设备筛选。",
    input: listScheduleTasksArgs,
    run: (context, args) => listScheduleTasks(context, { status: args.status, deviceId: args.device_id }).data
  }),
  defineTool({
    name: "update_schedule_task",
    description: "修改待执行的定时喂食任务，只需提供要修改的字段。",
    input: updateScheduleTaskArgs,
    run: async (context, args) =>
      (
        await updateScheduleTask(context, {
          taskId: args.task_id,
          deviceId: args.device_id,
          feedCount: args.feed_count,
          scheduledTime: args.scheduled_time,
          mode: args.mode
        })
      ).data
  }),
  defineTool({
    name: "delete_schedule_task",
    description: "删除（取消）定时喂食任务。",
    input: deleteScheduleTaskArgs,
    run: async (context, args) => (await deleteScheduleTask(context, args.task_id)).data
  }),
  defineTool({
    name: "get_device_info",
    description: "查询喂食设备的详细信息。",
    input: deviceInfoArgs,
    run: async (context, args) => (await getDeviceInfo(context, args.device_id)).data
  })
];

export function findTool(name: string): RegisteredTool | null {
  return FEEDER_TOOLS.find((tool) => tool.name === name) ?? null;
}

export function toolSpecs(): ToolSpec[] {
  return FEEDER_TOOLS.map(({ name, description, parameters }) => ({ name, description, parameters }));
}
