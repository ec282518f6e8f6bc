import { errorMessage, FeederApiError } from "../agent/errors.js";
import type { AgentTools, Logger } from "../agent/schema.js";

export interface RecordUploaderOptions {
  baseUrl: string;
  timeoutMs: number;
  batchId: number;
  poolId: string;
  logger: Logger;
  attempts?: number;
  retryDelayMs?: number;
  fetchImpl?: typeof fetch;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Uploads feed records to the farm backend (`POST /api/data/feeders`). */
export function createRecordUploader(options: RecordUploaderOptions): NonNullable<AgentTools["records"]> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const attempts = Math.max(1, options.attempts ?? 3);
  const retryDelayMs = options.retryDelayMs ?? 2_000;
  const url = `${options.baseUrl.replace(/\/$/, "")}/api/data/feeders`;

  async function postOnce(body: Record<string, unknown>): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const res = await fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal
      });
      if (!res.ok) {
        throw new FeederApiError(`Backend HTTP ${res.status}`);
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  return {
    async sendFeedRecord(record) {
      const body: Record<string, unknown> = {
        feeder_id: record.feederId,
        batch_id: options.batchId,
        pool_id: options.poolId,
        status: record.status,
        feed_amount_g: record.feedAmountG
      };
      if (record.notes) body.notes = record.notes;
      if (record.timestamp) body.timestamp = record.timestamp;

      let lastError: unknown;
      for (let attempt = 1; attempt <= attempts; attempt += 1) {
        try {
          await postOnce(body);
          options.logger.info(`Feed record uploaded for ${record.feederId}`);
          return;
        } catch (error) {
          lastError = error;
          if (attempt < attempts) {
            options.logger.warn(
              `Feed record upload attempt ${attempt} failed: ${errorMessage(error)}; retrying`
            );
            await sleep(retryDelayMs);
          }
        }
      }

      throw lastError instanceof Error ? lastError : new FeederApiError(String(lastError));
    }
  };
}
