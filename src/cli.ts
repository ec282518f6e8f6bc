#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import { closeFeederContext, createFeederContext } from "./agent/feeder.js";
import { routeAgentCommand } from "./agent/router.js";
import {
  taskModeSchema,
  taskStatusSchema,
  type AgentContext,
  type TaskMode,
  type TaskStatus,
  type WorkflowResult
} from "./agent/schema.js";
import { feedNow } from "./workflows/feedNow.js";
import { listDevices, resolveDevice } from "./workflows/devices.js";
import {
  createScheduleTask,
  deleteScheduleTask,
  listScheduleTasks,
  updateScheduleTask
} from "./workflows/scheduleTasks.js";

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function parseMode(value: string): TaskMode {
  const mode = taskModeSchema.safeParse(value);
  if (!mode.success) {
    throw new InvalidArgumentError("Expected once or daily.");
  }
  return mode.data;
}

function parseStatus(value: string): TaskStatus {
  const status = taskStatusSchema.safeParse(value);
  if (!status.success) {
    throw new InvalidArgumentError(`Expected one of: ${taskStatusSchema.options.join(", ")}.`);
  }
  return status.data;
}

function print(result: WorkflowResult<unknown>): void {
  console.log(result.human);
  console.log("\nJSON:\n", JSON.stringify(result.data, null, 2));
}

async function withContext(run: (context: AgentContext) => Promise<void>): Promise<void> {
  const context = await createFeederContext();
  try {
    await run(context);
  } finally {
    await closeFeederContext(context);
  }
}

async function deviceIdFor(context: AgentContext, device: string): Promise<string> {
  const { device: match, message } = await resolveDevice(context, device);
  if (!match) {
    throw new Error(message);
  }
  return match.devID;
}

async function main(): Promise<void> {
  const program = new Command();
  program
    .name("feeder")
    .description("Feeder agent: smart feeder control from natural language")
    .version("0.1.0");

  program
    .command("feed")
    .description("Feed now")
    .requiredOption("--device <name>", "Device name or id")
    .option("--count <n>", "Portions (1-10)", parseInteger, 1)
    .action(async (opts: { device: string; count: number }) => {
      await withContext(async (context) => {
        const deviceId = await deviceIdFor(context, opts.device);
        print(await feedNow(context, { deviceId, feedCount: opts.count, deviceName: opts.device }));
      });
    });

  program
    .command("schedule")
    .description("Create a scheduled feed")
    .requiredOption("--device <name>", "Device name or id")
    .requiredOption("--time <time>", "Wall time, YYYY-MM-DDTHH:MM:SS")
    .option("--count <n>", "Portions (1-10)", parseInteger, 1)
    .option("--mode <mode>", "once or daily", parseMode, "once")
    .action(async (opts: { device: string; time: string; count: number; mode: TaskMode }) => {
      await withContext(async (context) => {
        const deviceId = await deviceIdFor(context, opts.device);
        print(
          await createScheduleTask(context, {
            deviceId,
            feedCount: opts.count,
            scheduledTime: opts.time,
            mode: opts.mode
          })
        );
      });
    });

  const tasks = program.command("tasks").description("Manage scheduled feeds");

  tasks
    .command("list")
    .description("List scheduled feeds, newest first")
    .option("--status <status>", "Filter by status", parseStatus)
    .option("--device <id>", "Filter by device id")
    .action(async (opts: { status?: TaskStatus; device?: string }) => {
      await withContext(async (context) => {
        print(listScheduleTasks(context, { status: opts.status, deviceId: opts.device }));
      });
    });

  tasks
    .command("update")
    .description("Change a pending scheduled feed")
    .argument("<taskId>", "Task id")
    .option("--device <id>", "New device id")
    .option("--count <n>", "New portions (1-10)", parseInteger)
    .option("--time <time>", "New wall time, YYYY-MM-DDTHH:MM:SS")
    .option("--mode <mode>", "once or daily", parseMode)
    .action(
      async (
        taskId: string,
        opts: { device?: string; count?: number; time?: string; mode?: TaskMode }
      ) => {
        await withContext(async (context) => {
          print(
            await updateScheduleTask(context, {
              taskId,
              deviceId: opts.device,
              feedCount: opts.count,
              scheduledTime: opts.time,
              mode: opts.mode
            })
          );
        });
      }
    );

  tasks
    .command("delete")
    .description("Cancel a scheduled feed")
    .argument("<taskId>", "Task id")
    .action(async (taskId: string) => {
      await withContext(async (context) => {
        print(await deleteScheduleTask(context, taskId));
      });
    });

  program
    .command("devices")
    .description("List devices on the feeder cloud account")
    .action(async () => {
      await withContext(async (context) => {
        print(await listDevices(context));
      });
    });

  program
    .command("chat")
    .description("Send one natural-language request")
    .argument("<query...>", "Request text, e.g. 每天早上8点给AI2喂3份")
    .action(async (words: string[]) => {
      await withContext(async (context) => {
        print(await routeAgentCommand(context, words.join(" ")));
      });
    });

  program
    .command("history")
    .description("Show recent feed, schedule and chat events")
    .option("--limit <n>", "Number of events", parseInteger, 20)
    .action(async (opts: { limit: number }) => {
      await withContext(async (context) => {
        const events = await context.tools.storage.listHistory(opts.limit);
        console.log(JSON.stringify(events, null, 2));
      });
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
