import type { AgentContext, OperationStatus, WorkflowResult } from "../agent/schema.js";
import { FEED_COUNT_MAX, FEED_COUNT_MIN, isValidFeedCount } from "../agent/contract.js";
import { errorMessage, errorStatus } from "../agent/errors.js";
import { recordHistory } from "./history.js";

export type FeedOutcome = {
  success: boolean;
  status: OperationStatus;
  device_id: string;
  feed_count: number;
  feed_amount_g?: number;
  message: string;
};

export async function feedNow(
  context: AgentContext,
  args: { deviceId: string; feedCount: number; deviceName?: string }
): Promise<WorkflowResult<FeedOutcome>> {
  const { logger } = context.tools;
  const { deviceId, feedCount } = args;

  if (!isValidFeedCount(feedCount)) {
    const message = `喂食份数必须在${FEED_COUNT_MIN}-${FEED_COUNT_MAX}之间，当前: ${feedCount}`;
    return {
      human: message,
      data: { success: false, status: "invalid_params", device_id: deviceId, feed_count: feedCount, message }
    };
  }

  logger.info(`Feeding now: device=${deviceId}, count=${feedCount}`);

  try {
    await context.tools.feeder.feed(deviceId, feedCount);
  } catch (error) {
    logger.error(`Feed failed for ${deviceId}: ${errorMessage(error)}`);
    const message = `喂食失败: ${errorMessage(error)}`;
    const data: FeedOutcome = {
      success: false,
      status: errorStatus(error),
      device_id: deviceId,
      feed_count: feedCount,
      message
    };
    await recordHistory(context, "feed", { deviceId, feedCount }, data);
    return { human: message, data };
  }

  const feedAmountG = feedCount * context.config.feeder.portionGrams;
  const message = `成功喂食 ${feedCount} 份（约 ${feedAmountG.toFixed(1)}g）`;

  if (context.tools.records) {
    try {
      await context.tools.records.sendFeedRecord({
        feederId: args.deviceName || deviceId,
        feedAmountG,
        status: "ok",
        timestamp: context.now().getTime()
      });
    } catch (error) {
      logger.warn(`Feed record upload failed for ${deviceId}: ${errorMessage(error)}`);
    }
  }

  const data: FeedOutcome = {
    success: true,
    status: "success",
    device_id: deviceId,
    feed_count: feedCount,
    feed_amount_g: feedAmountG,
    message
  };
  await recordHistory(context, "feed", { deviceId, feedCount }, data);

  return { human: message, data };
}
