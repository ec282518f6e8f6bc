import test from "node:test";
import assert from "node:assert/strict";

import { classifyRequest, hasTimeReference, parseNumber } from "../src/agent/intent.js";
import { TEST_NOW, TEST_TZ } from "./helpers.js";

const options = { now: TEST_NOW, timezone: TEST_TZ };

test("request without a time is an immediate feed", () => {
  assert.deepEqual(classifyRequest("给AI2喂2份", options), {
    kind: "feed",
    deviceName: "AI2",
    feedCount: 2
  });
});

test("clock time in the afternoon is a one-off task on the same day", () => {
  assert.deepEqual(classifyRequest("在下午3点30给AI2喂2份", options), {
    kind: "schedule",
    deviceName: "AI2",
    feedCount: 2,
    mode: "once",
    scheduledTime: "2026-10-18T15:30:00"
  });
});

test("recurrence word makes a daily task", () => {
  assert.deepEqual(classifyRequest("每天早上8点给AI2喂3份", options), {
    kind: "schedule",
    deviceName: "AI2",
    feedCount: 3,
    mode: "daily",
    scheduledTime: "2026-10-18T08:00:00"
  });
});

test("day word moves a one-off task to that day", () => {
  const intent = classifyRequest("明天早上8点给AI2喂2份", options);
  assert.equal(intent.kind, "schedule");
  assert.equal(intent.kind === "schedule" && intent.scheduledTime, "2026-10-19T08:00:00");
});

test("bare clock time already past today rolls to tomorrow", () => {
  const intent = classifyRequest("早上8点给AI2喂2份", options);
  assert.equal(intent.kind === "schedule" && intent.scheduledTime, "2026-10-19T08:00:00");
});

test("relative offsets count from now", () => {
  const minutes = classifyRequest("30分钟后给AI2喂1份", options);
  assert.equal(minutes.kind === "schedule" && minutes.scheduledTime, "2026-10-18T10:30:00");

  const hours = classifyRequest("两小时后给AI2喂1份", options);
  assert.equal(hours.kind === "schedule" && hours.scheduledTime, "2026-10-18T12:00:00");
});

test("Chinese numerals work for clock and count", () => {
  assert.deepEqual(classifyRequest("下午三点半给AI2喂两份", options), {
    kind: "schedule",
    deviceName: "AI2",
    feedCount: 2,
    mode: "once",
    scheduledTime: "2026-10-18T15:30:00"
  });
});

test("a day without a clock time leaves the time open", () => {
  assert.deepEqual(classifyRequest("明天给AI2喂2份", options), {
    kind: "schedule",
    deviceName: "AI2",
    feedCount: 2,
    mode: "once",
    scheduledTime: null
  });
});

test("count defaults to one and out-of-range counts are passed through", () => {
  const plain = classifyRequest("给AI2喂食", options);
  assert.equal(plain.kind === "feed" && plain.feedCount, 1);

  const many = classifyRequest("给AI2喂二十份", options);
  assert.equal(many.kind === "feed" && many.feedCount, 20);
});

test("a count is read whole, never from its last digits", () => {
  assert.deepEqual(classifyRequest("给AI2喂110份", options), { kind: "feed", deviceName: "AI2", feedCount: 110 });
  assert.deepEqual(classifyRequest("给AI2喂一百份", options), { kind: "feed", deviceName: "AI2", feedCount: 100 });
  assert.deepEqual(classifyRequest("给AI2喂一二份", options), { kind: "feed", deviceName: "AI2", feedCount: 0 });
});

test("evening twelve o'clock is midnight at the end of that day", () => {
  assert.deepEqual(classifyRequest("今天晚上12点给AI2喂1份", options), {
    kind: "schedule",
    deviceName: "AI2",
    feedCount: 1,
    mode: "once",
    scheduledTime: "2026-10-19T00:00:00"
  });
  const noon = classifyRequest("明天中午12点给AI2喂1份", options);
  assert.equal(noon.kind === "schedule" && noon.scheduledTime, "2026-10-19T12:00:00");
});

test("task management requests", () => {
  assert.deepEqual(classifyRequest("查看定时任务", options), { kind: "list-tasks" });
  assert.deepEqual(classifyRequest("删除任务 3f2a9c1e-0000-4000-8000-000000000001", options), {
    kind: "delete-task",
    taskId: "3f2a9c1e-0000-4000-8000-000000000001"
  });
  assert.deepEqual(classifyRequest("取消任务", options), { kind: "delete-task", taskId: null });
  assert.deepEqual(classifyRequest("查看已取消的任务", options), { kind: "list-tasks" });
  assert.deepEqual(classifyRequest("把每天8点的喂食任务改成10点", options), { kind: "unknown" });
  assert.deepEqual(classifyRequest("今天天气怎么样", options), { kind: "unknown" });
});

test("time reference detection", () => {
  assert.equal(hasTimeReference("给AI2喂2份"), false);
  assert.equal(hasTimeReference("每天给AI2喂"), true);
  assert.equal(hasTimeReference("18:30喂一次"), true);
  assert.equal(hasTimeReference("后天喂"), true);
});

test("numeral parsing", () => {
  assert.equal(parseNumber("12"), 12);
  assert.equal(parseNumber("十五"), 15);
  assert.equal(parseNumber("二十"), 20);
  assert.equal(parseNumber("两"), 2);
  assert.equal(parseNumber("百"), null);
  assert.equal(parseNumber("一百"), 100);
  assert.equal(parseNumber("一百零五"), 105);
  assert.equal(parseNumber("三五"), null);
});

test("a cancellation that names a time is never a new feed", () => {
  assert.deepEqual(classifyRequest("取消明天早上8点的喂食任务", options), { kind: "delete-task", taskId: null });
  assert.deepEqual(classifyRequest("删除 3f2a9c1e-0000-4000-8000-000000000001 这个喂食任务", options), {
    kind: "delete-task",
    taskId: "3f2a9c1e-0000-4000-8000-000000000001"
  });
});
