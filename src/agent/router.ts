import { feedNow } from "../workflows/feedNow.js";
import { resolveDevice } from "../workflows/devices.js";
import { recordHistory } from "../workflows/history.js";
import { createScheduleTask, deleteScheduleTask, listScheduleTasks } from "../workflows/scheduleTasks.js";
import { classifyRequest } from "./intent.js";
import { runAgent, type AgentEvent } from "./loop.js";
import type { AgentContext, WorkflowResult } from "./schema.js";

export type ChatResult = WorkflowResult<{
  command: string;
  parsedIntent: string;
  workflow?: string;
  payload?: Record<string, unknown>;
  result?: Record<string, unknown>;
}>;

const HELP =
  "没有识别到喂食指令。试试: 给AI2喂2份 | 下午3点30给AI2喂2份 | 每天早上8点给AI2喂3份 | 查看定时任务 | 删除任务 <任务ID>";

async function routeByRules(context: AgentContext, command: string): Promise<ChatResult> {
  const intent = classifyRequest(command, {
    now: context.now(),
    timezone: context.config.scheduler.timezone
  });

  if (intent.kind === "unknown") {
    return { human: HELP, data: { command, parsedIntent: "unknown" } };
  }

  if (intent.kind === "list-tasks") {
    const result = listScheduleTasks(context);
    return {
      human: result.human,
      data: { command, parsedIntent: "list-tasks", workflow: "list-schedule-tasks", result: result.data }
    };
  }

  if (intent.kind === "delete-task") {
    if (!intent.taskId) {
      return {
        human: "请提供要删除的任务ID。例如: 删除任务 <任务ID>",
        data: { command, parsedIntent: "delete-task" }
      };
    }

    const result = await deleteScheduleTask(context, intent.taskId);
    return {
      human: result.human,
      data: {
        command,
        parsedIntent: "delete-task",
        workflow: "delete-schedule-task",
        payload: { taskId: intent.taskId },
        result: result.data
      }
    };
  }

  const { device, message } = await resolveDevice(context, intent.deviceName);
  if (!device) {
    return { human: message, data: { command, parsedIntent: intent.kind } };
  }

  if (intent.kind === "feed") {
    const payload = { deviceId: device.devID, feedCount: intent.feedCount };
    const result = await feedNow(context, { ...payload, deviceName: device.devName });
    return {
      human: result.human,
      data: { command, parsedIntent: "feed", workflow: "feed-device", payload, result: result.data }
    };
  }

  if (!intent.scheduledTime) {
    return {
      human: "请说明具体的喂食时间，例如: 明天早上8点给AI2喂2份",
      data: { command, parsedIntent: "schedule" }
    };
  }

  const payload = {
    deviceId: device.devID,
    feedCount: intent.feedCount,
    scheduledTime: intent.scheduledTime,
    mode: intent.mode
  };
  const result = await createScheduleTask(context, payload);
  return {
    human: result.human,
    data: { command, parsedIntent: "schedule", workflow: "create-schedule-task", payload, result: result.data }
  };
}

/**
 * Answers one user request: through the LLM agent loop when a model is
 * configured, otherwise through the rule-based classifier.
 */
export async function routeAgentCommand(
  context: AgentContext,
  command: string,
  options: { onEvent?: (event: AgentEvent) => void } = {}
): Promise<ChatResult> {
  let routed: ChatResult;

  if (context.llm && context.config.agent.mode === "llm") {
    const run = await runAgent(context, command, { onEvent: options.onEvent });
    routed = {
      human: run.reply,
      data: {
        command,
        parsedIntent: "llm",
        workflow: "agent-loop",
        result: { steps: run.steps, limitReached: run.limitReached }
      }
    };
  } else {
    routed = await routeByRules(context, command);
  }

  await recordHistory(
    context,
    "chat",
    { command },
    { parsedIntent: routed.data.parsedIntent, workflow: routed.data.workflow ?? null, reply: routed.human }
  );
  return routed;
}
