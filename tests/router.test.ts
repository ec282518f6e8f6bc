import test from "node:test";
import assert from "node:assert/strict";

import { routeAgentCommand } from "../src/agent/router.js";
import type { ChatModel } from "../src/agent/schema.js";
import { createHarness } from "./helpers.js";

test("without a model, an immediate feed goes through the rules", async () => {
  const { context, feeder, storage } = createHarness();
  const routed = await routeAgentCommand(context, "给AI2喂2份");

  assert.equal(routed.human, "成功喂食 2 份（约 34.0g）");
  assert.equal(routed.data.parsedIntent, "feed");
  assert.equal(routed.data.workflow, "feed-device");
  assert.deepEqual(routed.data.payload, { deviceId: "dev-001", feedCount: 2 });
  assert.deepEqual(feeder.feeds, [{ deviceId: "dev-001", count: 2 }]);
  assert.deepEqual(
    storage.events.map((event) => event.type),
    ["feed", "chat"]
  );
  assert.deepEqual(storage.events[1].output, {
    parsedIntent: "feed",
    workflow: "feed-device",
    reply: "成功喂食 2 份（约 34.0g）"
  });
});

test("a recurring request creates a daily task", async () => {
  const { context } = createHarness();
  const routed = await routeAgentCommand(context, "每天早上8点给AI2喂3份");

  assert.equal(routed.data.parsedIntent, "schedule");
  assert.deepEqual(routed.data.payload, {
    deviceId: "dev-001",
    feedCount: 3,
    scheduledTime: "2026-10-18T08:00:00",
    mode: "daily"
  });

  const [task] = context.scheduler.list();
  assert.equal(task.mode, "daily");
  assert.equal(task.nextRun, "2026-10-19T08:00:00+08:00");
});

test("the rules ask for what is missing", async () => {
  const { context } = createHarness();

  assert.equal(
    (await routeAgentCommand(context, "明天给AI2喂2份")).human,
    "请说明具体的喂食时间，例如: 明天早上8点给AI2喂2份"
  );
  assert.equal(
    (await routeAgentCommand(context, "给虾喂1份")).human,
    "找不到设备「虾」，可用设备: AI2、Koi Pond"
  );
  assert.equal((await routeAgentCommand(context, "取消任务")).human, "请提供要删除的任务ID。例如: 删除任务 <任务ID>");

  const unknown = await routeAgentCommand(context, "你好");
  assert.equal(unknown.data.parsedIntent, "unknown");
  assert.ok(unknown.human.startsWith("没有识别到喂食指令。"));
});

test("tasks can be listed and deleted through the rules", async () => {
  const { context } = createHarness();
  assert.equal((await routeAgentCommand(context, "查看定时任务")).human, "暂无定时喂食任务");

  await routeAgentCommand(context, "下午6点给AI2喂1份");
  const [task] = context.scheduler.list();
  assert.ok(task);

  const deleted = await routeAgentCommand(context, `删除任务 ${task.taskId}`);
  assert.equal(deleted.data.parsedIntent, "delete-task");
  assert.equal(deleted.human, `定时任务已删除: ${task.taskId}`);
  assert.equal(context.tools.tasks.getTask(task.taskId)?.status, "cancelled");
});

test("with a model configured, requests go through the agent loop", async () => {
  const model: ChatModel = {
    async complete() {
      return { content: "好的", toolCalls: [] };
    }
  };
  const { context } = createHarness({ llm: model });

  const routed = await routeAgentCommand(context, "给AI2喂2份");
  assert.equal(routed.human, "好的");
  assert.equal(routed.data.parsedIntent, "llm");
  assert.deepEqual(routed.data.result, { steps: [], limitReached: false });

  context.config.agent.mode = "rules";
  const ruled = await routeAgentCommand(context, "给AI2喂2份");
  assert.equal(ruled.data.parsedIntent, "feed");
});

test("an out-of-range count is refused, not trimmed to fit", async () => {
  const { context, feeder } = createHarness();

  assert.equal((await routeAgentCommand(context, "给AI2喂110份")).human, "喂食份数必须在1-10之间，当前: 110");
  assert.equal((await routeAgentCommand(context, "给AI2喂一百份")).human, "喂食份数必须在1-10之间，当前: 100");
  assert.deepEqual(feeder.feeds, []);
});

test("cancelling a task by its time asks for the id and schedules nothing", async () => {
  const { context } = createHarness({ devices: [{ devID: "dev-001", devName: "AI2" }] });
  const routed = await routeAgentCommand(context, "取消明天早上8点的喂食任务");

  assert.equal(routed.human, "请提供要删除的任务ID。例如: 删除任务 <任务ID>");
  assert.equal(routed.data.parsedIntent, "delete-task");
  assert.equal(context.scheduler.size, 0);
  assert.deepEqual(context.tools.tasks.listTasks({ topic: "scheduled-feed" }), []);
});
