import { z } from "zod";
import { taskModeSchema, taskStatusSchema } from "./schema.js";

export const FEED_COUNT_MIN = 1;
export const FEED_COUNT_MAX = 10;
export const TIMESTAMP_FORMAT = "YYYY-MM-DDTHH:MM:SS";

const feedCountMessage = `feed_count must be between ${FEED_COUNT_MIN} and ${FEED_COUNT_MAX}`;

const deviceId = z.string().trim().min(1).describe("设备ID，从可用设备列表中按设备名称查得");

const feedCount = z
  .number()
  .int()
  .min(FEED_COUNT_MIN, feedCountMessage)
  .max(FEED_COUNT_MAX, feedCountMessage)
  .describe("喂食份数，每份约17g，范围1-10份");

const scheduledTime = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/, `scheduled_time must use ${TIMESTAMP_FORMAT}`)
  .describe(`计划执行时间，格式 ${TIMESTAMP_FORMAT}`);

const taskId = z.string().trim().min(1).describe("定时任务ID");

export const feedDeviceArgs = z.object({
  device_id: deviceId,
  feed_count: feedCount
});

export const createScheduleTaskArgs = z.object({
  device_id: deviceId,
  feed_count: feedCount,
  scheduled_time: scheduledTime,
  mode: taskModeSchema.describe("once 为一次性任务，daily 为每天循环")
});

export const listScheduleTasksArgs = z.object({
  status: taskStatusSchema.optional().describe("按任务状态筛选"),
  device_id: deviceId.optional()
});

export const updateScheduleTaskArgs = z.object({
  task_id: taskId,
  device_id: deviceId.optional(),
  feed_count: feedCount.optional(),
  scheduled_time: scheduledTime.optional(),
  mode: taskModeSchema.optional().describe("once 为一次性任务，daily 为每天循环")
});

export const deleteScheduleTaskArgs = z.object({
  task_id: taskId
});

export const deviceInfoArgs = z.object({
  device_id: deviceId
});

export type FeedDeviceArgs = z.infer<typeof feedDeviceArgs>;
export type CreateScheduleTaskArgs = z.infer<typeof createScheduleTaskArgs>;
export type ListScheduleTasksArgs = z.infer<typeof listScheduleTasksArgs>;
export type UpdateScheduleTaskArgs = z.infer<typeof updateScheduleTaskArgs>;
export type DeleteScheduleTaskArgs = z.infer<typeof deleteScheduleTaskArgs>;

export function isValidFeedCount(count: number): boolean {
  return Number.isInteger(count) && count >= FEED_COUNT_MIN && count <= FEED_COUNT_MAX;
}
