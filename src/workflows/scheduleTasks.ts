import { randomUUID } from "node:crypto";
import { z } from "zod";
import type {
  AgentContext,
  OperationStatus,
  TaskMode,
  TaskRecord,
  TaskRequest,
  TaskStatus,
  WorkflowResult
} from "../agent/schema.js";
import { FEED_COUNT_MAX, FEED_COUNT_MIN, isValidFeedCount, TIMESTAMP_FORMAT } from "../agent/contract.js";
import { errorMessage } from "../agent/errors.js";
import type { TaskRun } from "../server/scheduler.js";
import { formatDisplayTime, formatWallTime, nowIn, parseWallTime, type Moment } from "../tools/time.js";
import { feedNow } from "./feedNow.js";
import { recordHistory } from "./history.js";

export const SCHEDULED_FEED_TOPIC = "scheduled-feed";
const FEED_TOOL_NAME = "feed_device";
const LIST_LIMIT = 50;
const KEPT_EXECUTIONS = 10;

export type ScheduleOutcome = {
  success: boolean;
  status: OperationStatus;
  message: string;
  task_id?: string;
  device_id?: string;
  feed_count?: number;
  scheduled_time?: string;
  mode?: TaskMode;
};

export type TaskSummary = {
  task_id: string;
  device_id: string;
  feed_count: number;
  scheduled_time: string;
  mode: TaskMode;
  status: TaskStatus;
  created_at: string;
  completed_at: string | null;
  next_run: string | null;
};

export type TaskListOutcome = {
  success: boolean;
  tasks: TaskSummary[];
  message: string;
};

const STATUS_LABELS: Record<TaskStatus, string> = {
  pending: "待执行",
  running: "执行中",
  completed: "已完成",
  failed: "失败",
  cancelled: "已取消"
};

const executionSchema = z.record(z.unknown());
const executionsSchema = z.object({ executions: z.array(executionSchema) }).passthrough();

function fail(
  status: OperationStatus,
  message: string,
  extra: Pick<ScheduleOutcome, "task_id"> = {}
): WorkflowResult<ScheduleOutcome> {
  return { human: message, data: { success: false, status, message, ...extra } };
}

function countError(feedCount: number): string {
  return `喂食份数必须在${FEED_COUNT_MIN}-${FEED_COUNT_MAX}之间，当前: ${feedCount}`;
}

function modeLabel(mode: TaskMode): string {
  return mode === "daily" ? "每天" : "一次";
}

function schedule(context: AgentContext, taskId: string, request: TaskRequest, at: Moment, mode: TaskMode): void {
  context.scheduler.add({
    taskId,
    deviceId: request.device_id,
    feedCount: request.feed_count,
    scheduledTime: at,
    mode,
    execute: (run) => runScheduledFeed(context, run)
  });
}

function summarize(context: AgentContext, record: TaskRecord): TaskSummary {
  const { timezone } = context.config.scheduler;
  const at = parseWallTime(record.request.scheduled_time, timezone);

  return {
    task_id: record.taskId,
    device_id: record.request.device_id,
    feed_count: record.request.feed_count,
    scheduled_time: at ? formatWallTime(at) : record.request.scheduled_time,
    mode: record.mode,
    status: record.status,
    created_at: record.createdAt,
    completed_at: record.completedAt,
    next_run: context.scheduler.get(record.taskId)?.nextRun ?? null
  };
}

export async function createScheduleTask(
  context: AgentContext,
  args: { deviceId: string; feedCount: number; scheduledTime: string; mode: TaskMode }
): Promise<WorkflowResult<ScheduleOutcome>> {
  const { logger } = context.tools;
  const { timezone } = context.config.scheduler;

  if (!isValidFeedCount(args.feedCount)) {
    return fail("invalid_params", countError(args.feedCount));
  }

  const at = parseWallTime(args.scheduledTime, timezone);
  if (!at) {
    return fail("invalid_params", `时间格式错误，应为 ${TIMESTAMP_FORMAT}，当前: ${args.scheduledTime}`);
  }

  const now = nowIn(timezone, context.now());
  if (args.mode === "once" && !at.isAfter(now)) {
    return fail("invalid_params", `定时时间必须在未来，当前时间: ${formatDisplayTime(now)}`);
  }

  const taskId = randomUUID();
  const request: TaskRequest = {
    device_id: args.deviceId,
    feed_count: args.feedCount,
    scheduled_time: at.format()
  };

  try {
    context.tools.tasks.insertTask({
      taskId,
      topic: SCHEDULED_FEED_TOPIC,
      toolName: FEED_TOOL_NAME,
      mode: args.mode,
      request,
      status: "pending"
    });
  } catch (error) {
    logger.error(`Could not store task ${taskId}: ${errorMessage(error)}`);
    return fail("failed", `创建定时任务失败: ${errorMessage(error)}`);
  }

  schedule(context, taskId, request, at, args.mode);

  const repeat = args.mode === "daily" ? "，每天执行" : "";
  const message =
    `定时喂食任务创建成功！计划执行时间: ${formatDisplayTime(at)} (${timezone})，` +
    `设备: ${args.deviceId}，喂食份数: ${args.feedCount}份${repeat}`;
  const data: ScheduleOutcome = {
    success: true,
    status: "pending",
    message,
    task_id: taskId,
    device_id: args.deviceId,
    feed_count: args.feedCount,
    scheduled_time: formatWallTime(at),
    mode: args.mode
  };

  await recordHistory(context, "schedule", { ...args }, data);
  return { human: message, data };
}

export async function updateScheduleTask(
  context: AgentContext,
  args: { taskId: string; deviceId?: string; feedCount?: number; scheduledTime?: string; mode?: TaskMode }
): Promise<WorkflowResult<ScheduleOutcome>> {
  const { timezone } = context.config.scheduler;
  const record = context.tools.tasks.getTask(args.taskId);

  if (!record) {
    return fail("invalid_params", `任务不存在: ${args.taskId}`, { task_id: args.taskId });
  }
  if (record.status !== "pending") {
    return fail("failed", `只能修改待执行的任务，当前状态: ${STATUS_LABELS[record.status]}`, {
      task_id: args.taskId
    });
  }
  if (args.feedCount !== undefined && !isValidFeedCount(args.feedCount)) {
    return fail("invalid_params", countError(args.feedCount), { task_id: args.taskId });
  }

  let at = parseWallTime(record.request.scheduled_time, timezone);
  if (args.scheduledTime !== undefined) {
    at = parseWallTime(args.scheduledTime, timezone);
    if (!at) {
      return fail("invalid_params", `时间格式错误，应为 ${TIMESTAMP_FORMAT}，当前: ${args.scheduledTime}`, {
        task_id: args.taskId
      });
    }
  }
  if (!at) {
    return fail("failed", `任务时间无效: ${record.request.scheduled_time}`, { task_id: args.taskId });
  }

  const mode = args.mode ?? record.mode;
  const timeChanged = args.scheduledTime !== undefined || args.mode !== undefined;
  if (timeChanged && mode === "once" && !at.isAfter(nowIn(timezone, context.now()))) {
    return fail("invalid_params", "定时时间必须在未来", { task_id: args.taskId });
  }

  const request: TaskRequest = {
    device_id: args.deviceId ?? record.request.device_id,
    feed_count: args.feedCount ?? record.request.feed_count,
    scheduled_time: at.format()
  };

  if (!context.tools.tasks.updateTask(args.taskId, { request, mode })) {
    return fail("failed", `更新任务失败: ${args.taskId}`, { task_id: args.taskId });
  }

  if (context.scheduler.get(args.taskId)) {
    context.scheduler.update(args.taskId, {
      deviceId: request.device_id,
      feedCount: request.feed_count,
      scheduledTime: at,
      mode
    });
  } else {
    schedule(context, args.taskId, request, at, mode);
  }

  const message =
    `定时任务已更新: 设备 ${request.device_id}，${request.feed_count}份，` +
    `时间 ${formatDisplayTime(at)}，${modeLabel(mode)}`;
  const data: ScheduleOutcome = {
    success: true,
    status: "pending",
    message,
    task_id: args.taskId,
    device_id: request.device_id,
    feed_count: request.feed_count,
    scheduled_time: formatWallTime(at),
    mode
  };

  await recordHistory(context, "schedule", { action: "update", ...args }, data);
  return { human: message, data };
}

export async function deleteScheduleTask(
  context: AgentContext,
  taskId: string
): Promise<WorkflowResult<ScheduleOutcome>> {
  const record = context.tools.tasks.getTask(taskId);
  if (!record) {
    return fail("invalid_params", `任务不存在: ${taskId}`, { task_id: taskId });
  }

  context.tools.tasks.updateTask(taskId, { status: "cancelled" });
  if (context.scheduler.get(taskId)) {
    context.scheduler.remove(taskId);
  }

  const message = `定时任务已删除: ${taskId}`;
  const data: ScheduleOutcome = { success: true, status: "success", message, task_id: taskId };
  await recordHistory(context, "schedule", { action: "delete", taskId }, data);
  return { human: message, data };
}

export function listScheduleTasks(
  context: AgentContext,
  args: { status?: TaskStatus; deviceId?: string; limit?: number } = {}
): WorkflowResult<TaskListOutcome> {
  const records = context.tools.tasks
    .listTasks({ topic: SCHEDULED_FEED_TOPIC, status: args.status, limit: args.limit ?? LIST_LIMIT })
    .filter((record) => !args.deviceId || record.request.device_id === args.deviceId);
  const tasks = records.map((record) => summarize(context, record));

  if (tasks.length === 0) {
    const message = "暂无定时喂食任务";
    return { human: message, data: { success: true, tasks, message } };
  }

  const lines = tasks.map(
    (task, index) =>
      `${index + 1}. [${STATUS_LABELS[task.status]}] 设备: ${task.device_id}，${task.feed_count}份，` +
      `时间: ${task.scheduled_time.replace("T", " ")}，${modeLabel(task.mode)}\n   ID: ${task.task_id}`
  );
  const message = `共 ${tasks.length} 个定时任务:\n${lines.join("\n")}`;
  return { human: message, data: { success: true, tasks, message } };
}

export function getScheduleTask(context: AgentContext, taskId: string): TaskSummary | null {
  const record = context.tools.tasks.getTask(taskId);
  return record && record.topic === SCHEDULED_FEED_TOPIC ? summarize(context, record) : null;
}

/**
 * Re-registers pending tasks after a restart. One-off tasks whose time has
 * passed are marked failed instead of being run late.
 */
export function loadPendingTasks(context: AgentContext): number {
  const { logger } = context.tools;
  const { timezone } = context.config.scheduler;
  const now = nowIn(timezone, context.now());
  const records = context.tools.tasks.listTasks({
    topic: SCHEDULED_FEED_TOPIC,
    status: "pending",
    limit: 1000
  });

  let loaded = 0;
  for (const record of records) {
    const at = parseWallTime(record.request.scheduled_time, timezone);
    if (!at) {
      logger.warn(`Task ${record.taskId} has an invalid time: ${record.request.scheduled_time}`);
      context.tools.tasks.updateTask(record.taskId, {
        status: "failed",
        response: { error: "invalid scheduled time", scheduled_time: record.request.scheduled_time }
      });
      continue;
    }

    if (record.mode === "once" && !at.isAfter(now)) {
      logger.warn(`Task ${record.taskId} expired at ${at.format()}`);
      context.tools.tasks.updateTask(record.taskId, {
        status: "failed",
        response: { error: "task time has passed", scheduled_time: at.format(), checked_at: now.format() }
      });
      continue;
    }

    schedule(context, record.taskId, record.request, at, record.mode);
    loaded += 1;
  }

  logger.info(`Loaded ${loaded} pending task(s)`);
  return loaded;
}

/** Runs one scheduled feed and writes its outcome back to the task record. */
export async function runScheduledFeed(context: AgentContext, run: TaskRun): Promise<boolean> {
  const { logger } = context.tools;
  const before = context.tools.tasks.getTask(run.taskId);
  if (before?.status !== "pending") {
    logger.warn(`Skipping task ${run.taskId}: status is ${before?.status ?? "missing"}`);
    return false;
  }

  const result = await feedNow(context, { deviceId: run.deviceId, feedCount: run.feedCount });
  const executedAt = nowIn(context.config.scheduler.timezone, context.now()).format();
  const execution: Record<string, unknown> = {
    success: result.data.success,
    device_id: run.deviceId,
    feed_count: run.feedCount,
    executed_at: executedAt
  };
  if (!result.data.success) {
    execution.error = result.data.message;
  }

  // A task cancelled while its feed was in flight keeps its cancelled status.
  const current = context.tools.tasks.getTask(run.taskId);
  if (current?.status !== "pending") {
    logger.warn(`Task ${run.taskId} became ${current?.status ?? "missing"} during its run; outcome not stored`);
  } else if (run.mode === "daily") {
    const previous = executionsSchema.safeParse(current.response);
    const executions = [...(previous.success ? previous.data.executions : []), execution].slice(-KEPT_EXECUTIONS);
    context.tools.tasks.updateTask(run.taskId, { response: { executions } });
  } else {
    context.tools.tasks.updateTask(run.taskId, {
      status: result.data.success ? "completed" : "failed",
      response: execution,
      completedAt: result.data.success ? context.now().toISOString() : null
    });
  }

  await recordHistory(context, "task-run", { taskId: run.taskId, mode: run.mode }, execution);
  return result.data.success;
}
