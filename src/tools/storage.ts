import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { AgentTools, HistoryEvent } from "../agent/schema.js";

const historyEventSchema = z.object({
  ts: z.string(),
  type: z.enum(["feed", "schedule", "task-run", "chat"]),
  input: z.record(z.unknown()),
  output: z.record(z.unknown())
});

function isHistoryEvent(value: unknown): value is HistoryEvent {
  return historyEventSchema.safeParse(value).success;
}

export function createStorageTool(historyPath = "./data/feeder_history.jsonl"): AgentTools["storage"] {
  return {
    async appendHistory(event: HistoryEvent): Promise<void> {
      await mkdir(dirname(historyPath), { recursive: true });
      await appendFile(historyPath, `${JSON.stringify(event)}\n`, "utf8");
    },

    async listHistory(limit = 50): Promise<HistoryEvent[]> {
      let raw: string;
      try {
        raw = await readFile(historyPath, "utf8");
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
        throw error;
      }

      const parsed = raw
        .split("\n")
        .map((line) => line.trim())
        .filter(Boolean)
        .map((line): unknown => {
          try {
            return JSON.parse(line);
          } catch {
            return null;
          }
        })
        .filter(isHistoryEvent);

      return parsed.slice(-limit).reverse();
    }
  };
}
