import type { Logger, TaskMode } from "../agent/schema.js";
import { errorMessage } from "../agent/errors.js";
import { nextDailyOccurrence, nowIn, type Moment } from "../tools/time.js";

export interface TaskRun {
  taskId: string;
  deviceId: string;
  feedCount: number;
  mode: TaskMode;
}

/** Resolves true when the run succeeded. Throwing counts as a failed run. */
export type TaskRunner = (run: TaskRun) => Promise<boolean>;

export interface ScheduledTaskInput {
  taskId: string;
  deviceId: string;
  feedCount: number;
  scheduledTime: Moment;
  mode: TaskMode;
  execute: TaskRunner;
}

interface ScheduledTask extends ScheduledTaskInput {
  nextRun: Moment | null;
  lastRun: Moment | null;
  runCount: number;
  successCount: number;
  failureCount: number;
  lastError: string | null;
  isRunning: boolean;
}

export interface ScheduledTaskInfo {
  taskId: string;
  deviceId: string;
  feedCount: number;
  scheduledTime: string;
  mode: TaskMode;
  nextRun: string | null;
  lastRun: string | null;
  runCount: number;
  successCount: number;
  failureCount: number;
  lastError: string | null;
  isRunning: boolean;
}

export interface TaskSchedulerOptions {
  timezone: string;
  checkIntervalMs: number;
  logger: Logger;
  now?: () => Date;
}

export class TaskScheduler {
  private readonly tasks = new Map<string, ScheduledTask>();
  private readonly inFlight = new Map<string, Promise<void>>();
  private timer: NodeJS.Timeout | null = null;
  private readonly now: () => Date;

  constructor(private readonly options: TaskSchedulerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get size(): number {
    return this.tasks.size;
  }

  private current(): Moment {
    return nowIn(this.options.timezone, this.now());
  }

  private initialNextRun(scheduledTime: Moment, mode: TaskMode): Moment {
    if (mode === "daily") {
      return nextDailyOccurrence(scheduledTime, this.current(), this.options.timezone);
    }
    return scheduledTime;
  }

  add(input: ScheduledTaskInput): boolean {
    if (this.tasks.has(input.taskId)) {
      this.options.logger.warn(`Task already scheduled: ${input.taskId}`);
      return false;
    }

    const scheduledTime = input.scheduledTime.tz(this.options.timezone);
    const task: ScheduledTask = {
      ...input,
      scheduledTime,
      nextRun: this.initialNextRun(scheduledTime, input.mode),
      lastRun: null,
      runCount: 0,
      successCount: 0,
      failureCount: 0,
      lastError: null,
      isRunning: false
    };

    this.tasks.set(task.taskId, task);
    this.options.logger.info(`Task scheduled: ${task.taskId}, next run ${task.nextRun?.format()}`);
    return true;
  }

  remove(taskId: string): boolean {
    if (!this.tasks.delete(taskId)) {
      this.options.logger.warn(`Task not scheduled: ${taskId}`);
      return false;
    }

    this.options.logger.info(`Task unscheduled: ${taskId}`);
    return true;
  }

  update(
    taskId: string,
    patch: { deviceId?: string; feedCount?: number; scheduledTime?: Moment; mode?: TaskMode }
  ): boolean {
    const task = this.tasks.get(taskId);
    if (!task) {
      this.options.logger.warn(`Task not scheduled: ${taskId}`);
      return false;
    }

    if (patch.deviceId !== undefined) task.deviceId = patch.deviceId;
    if (patch.feedCount !== undefined) task.feedCount = patch.feedCount;
    if (patch.scheduledTime !== undefined) {
      task.scheduledTime = patch.scheduledTime.tz(this.options.timezone);
    }
    if (patch.mode !== undefined) task.mode = patch.mode;
    if (patch.scheduledTime !== undefined || patch.mode !== undefined) {
      task.nextRun = this.initialNextRun(task.scheduledTime, task.mode);
    }

    this.options.logger.info(`Task updated: ${taskId}`);
    return true;
  }

  get(taskId: string): ScheduledTaskInfo | null {
    const task = this.tasks.get(taskId);
    return task ? describe(task) : null;
  }

  list(): ScheduledTaskInfo[] {
    return Array.from(this.tasks.values()).map(describe);
  }

  start(): void {
    if (this.timer) {
      this.options.logger.warn("Scheduler already running");
      return;
    }

    this.timer = setInterval(() => {
      this.runDueTasks().catch((error) => {
        this.options.logger.error(`Scheduler tick failed: ${errorMessage(error)}`);
      });
    }, this.options.checkIntervalMs);
    this.timer.unref();

    this.options.logger.info(
      `Scheduler started (timezone ${this.options.timezone}, every ${this.options.checkIntervalMs}ms)`
    );
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.options.logger.info("Scheduler stopped");
    }
    await Promise.allSettled(this.inFlight.values());
  }

  /** Starts every due task that is not already running and waits for those runs. */
  async runDueTasks(): Promise<void> {
    const now = this.current();
    const started: Promise<void>[] = [];

    for (const task of this.tasks.values()) {
      if (task.nextRun && !task.nextRun.isAfter(now) && !task.isRunning) {
        const run = this.execute(task, now).finally(() => this.inFlight.delete(task.taskId));
        this.inFlight.set(task.taskId, run);
        started.push(run);
      }
    }

    await Promise.all(started);
  }

  private async execute(task: ScheduledTask, startedAt: Moment): Promise<void> {
    const { logger } = this.options;
    task.isRunning = true;
    task.lastRun = startedAt;
    task.runCount += 1;
    logger.info(`Running task ${task.taskId}: device=${task.deviceId}, count=${task.feedCount}`);

    try {
      const ok = await task.execute({
        taskId: task.taskId,
        deviceId: task.deviceId,
        feedCount: task.feedCount,
        mode: task.mode
      });

      if (ok) {
        task.successCount += 1;
        task.lastError = null;
      } else {
        task.failureCount += 1;
        task.lastError = "run reported failure";
        logger.error(`Task ${task.taskId} reported failure`);
      }
    } catch (error) {
      task.failureCount += 1;
      task.lastError = errorMessage(error);
      logger.error(`Task ${task.taskId} threw: ${task.lastError}`);
    } finally {
      task.isRunning = false;
      task.nextRun =
        task.mode === "daily"
          ? nextDailyOccurrence(task.scheduledTime, this.current(), this.options.timezone)
          : null;

      if (task.nextRun) {
        logger.info(`Task ${task.taskId} next run ${task.nextRun.format()}`);
      } else if (this.tasks.get(task.taskId) === task) {
        this.tasks.delete(task.taskId);
        logger.info(`One-off task ${task.taskId} finished`);
      }
    }
  }
}

function describe(task: ScheduledTask): ScheduledTaskInfo {
  return {
    taskId: task.taskId,
    deviceId: task.deviceId,
    feedCount: task.feedCount,
    scheduledTime: task.scheduledTime.format(),
    mode: task.mode,
    nextRun: task.nextRun ? task.nextRun.format() : null,
    lastRun: task.lastRun ? task.lastRun.format() : null,
    runCount: task.runCount,
    successCount: task.successCount,
    failureCount: task.failureCount,
    lastError: task.lastError,
    isRunning: task.isRunning
  };
}
