import test from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import { z } from "zod";

import type { AgentContext, ChatModel } from "../src/agent/schema.js";
import { createApp } from "../src/server/app.js";
import { createScheduleTask } from "../src/workflows/scheduleTasks.js";
import { createHarness } from "./helpers.js";

async function withServer(context: AgentContext, run: (base: string) => Promise<void>): Promise<void> {
  const server = createApp(context).listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  assert.ok(address && typeof address === "object");

  try {
    await run(`http://127.0.0.1:${address.port}`);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  }
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body)
  });
}

test("service info and health", async () => {
  const { context } = createHarness();
  await withServer(context, async (base) => {
    assert.deepEqual(await (await fetch(`${base}/`)).json(), {
      service: "FeederAgent",
      version: "0.1.0",
      status: "running"
    });
    assert.deepEqual(await (await fetch(`${base}/health`)).json(), {
      status: "healthy",
      llm: false,
      scheduler: { running: false, tasks: 0 }
    });
  });
});

test("chat answers with the routed reply", async () => {
  const { context } = createHarness();
  await withServer(context, async (base) => {
    const res = await postJson(`${base}/api/v1/chat`, { query: "给AI2喂2份", session_id: "s-1" });
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), {
      success: true,
      session_id: "s-1",
      result: "成功喂食 2 份（约 34.0g）",
      error: null
    });
  });
});

test("chat rejects bad bodies", async () => {
  const { context } = createHarness();
  await withServer(context, async (base) => {
    const missing = await postJson(`${base}/api/v1/chat`, {});
    assert.equal(missing.status, 400);
    assert.deepEqual(await missing.json(), { error: "query: Required" });

    const malformed = await fetch(`${base}/api/v1/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{bad"
    });
    assert.equal(malformed.status, 400);
    assert.deepEqual(await malformed.json(), { error: "request body is not valid JSON" });
  });
});

test("chat reports unexpected failures as 500", async () => {
  const { context } = createHarness();
  context.tools.tasks.listTasks = () => {
    throw new Error("db closed");
  };

  await withServer(context, async (base) => {
    const res = await postJson(`${base}/api/v1/chat`, { query: "查看定时任务", session_id: "s-2" });
    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), { success: false, session_id: "s-2", result: null, error: "db closed" });
  });
});

test("chat stream sends start, tool events and done", async () => {
  const replies = [
    {
      content: null,
      toolCalls: [{ id: "call-1", name: "feed_device", arguments: '{"device_id":"dev-001","feed_count":1}' }]
    },
    { content: "已喂食", toolCalls: [] }
  ];
  const model: ChatModel = {
    async complete() {
      const next = replies.shift();
      if (!next) throw new Error("script exhausted");
      return next;
    }
  };
  const { context } = createHarness({ llm: model });

  await withServer(context, async (base) => {
    const res = await postJson(`${base}/api/v1/chat/stream`, { query: "给AI2喂1份", session_id: "s-3" });
    assert.equal(res.headers.get("content-type"), "text/event-stream");

    const events: unknown[] = (await res.text())
      .split("\n\n")
      .filter((frame) => frame.startsWith("data: "))
      .map((frame) => JSON.parse(frame.slice("data: ".length)));

    assert.deepEqual(
      events.map((event) => (event && typeof event === "object" && "type" in event ? event.type : null)),
      ["start", "tool_call", "tool_result", "done"]
    );
    assert.deepEqual(events[3], { type: "done", reply: "已喂食", session_id: "s-3" });
  });
});

test("device routes list tools, devices and status", async () => {
  const { context } = createHarness();
  await withServer(context, async (base) => {
    const tools = z
      .object({ tools: z.array(z.object({ name: z.string() })) })
      .parse(await (await fetch(`${base}/api/v1/device/tools`)).json());
    assert.equal(tools.tools.length, 6);

    const devices = z
      .object({ devices: z.array(z.unknown()) })
      .parse(await (await fetch(`${base}/api/v1/device/status`)).json());
    assert.deepEqual(devices.devices, [
      { devID: "dev-001", devName: "AI2" },
      { devID: "dev-002", devName: "Koi Pond" }
    ]);

    const status = await fetch(`${base}/api/v1/device/status?device_id=dev-001`);
    assert.equal(status.status, 200);
    assert.equal(z.object({ message: z.string() }).parse(await status.json()).message, "设备 dev-001 状态: 在线");

    const unknown = await fetch(`${base}/api/v1/device/status?device_id=dev-404`);
    assert.equal(unknown.status, 502);
  });
});

test("task routes list, show and delete tasks", async () => {
  const { context } = createHarness();
  const created = await createScheduleTask(context, {
    deviceId: "dev-001",
    feedCount: 2,
    scheduledTime: "2026-10-18T15:30:00",
    mode: "once"
  });
  const taskId = created.data.task_id;
  assert.ok(taskId);

  await withServer(context, async (base) => {
    const list = z
      .object({ tasks: z.array(z.object({ task_id: z.string() })) })
      .parse(await (await fetch(`${base}/api/v1/tasks?status=pending`)).json());
    assert.equal(list.tasks.length, 1);
    assert.equal(list.tasks[0].task_id, taskId);

    assert.equal((await fetch(`${base}/api/v1/tasks?status=bogus`)).status, 400);

    const shown = z
      .object({ task: z.object({ status: z.string() }), scheduled: z.object({ nextRun: z.string() }) })
      .parse(await (await fetch(`${base}/api/v1/tasks/${taskId}`)).json());
    assert.equal(shown.task.status, "pending");
    assert.equal(shown.scheduled.nextRun, "2026-10-18T15:30:00+08:00");

    const deleted = await fetch(`${base}/api/v1/tasks/${taskId}`, { method: "DELETE" });
    assert.equal(deleted.status, 200);
    assert.equal(context.tools.tasks.getTask(taskId)?.status, "cancelled");

    assert.equal((await fetch(`${base}/api/v1/tasks/nope`, { method: "DELETE" })).status, 404);
    assert.equal((await fetch(`${base}/api/v1/tasks/nope`)).status, 404);
  });
});

test("history route returns recent events", async () => {
  const { context } = createHarness();
  await withServer(context, async (base) => {
    await postJson(`${base}/api/v1/chat`, { query: "给AI2喂2份" });

    const history = z
      .object({ items: z.array(z.object({ type: z.string() })) })
      .parse(await (await fetch(`${base}/api/v1/history?limit=1`)).json());
    assert.equal(history.items.length, 1);
    assert.equal(history.items[0].type, "chat");

    assert.equal((await fetch(`${base}/api/v1/history?limit=0`)).status, 400);
  });
});
