import express, { type ErrorRequestHandler, type Express } from "express";
import rateLimit from "express-rate-limit";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { errorMessage } from "../agent/errors.js";
import type { AgentEvent } from "../agent/loop.js";
import { routeAgentCommand } from "../agent/router.js";
import { taskStatusSchema, type AgentContext } from "../agent/schema.js";
import { toolSpecs } from "../agent/toolset.js";
import { getDeviceStatus, listDevices } from "../workflows/devices.js";
import { deleteScheduleTask, getScheduleTask, listScheduleTasks } from "../workflows/scheduleTasks.js";

const VERSION = "0.1.0";

const chatBodySchema = z.object({
  query: z.string().trim().min(1, "query is required"),
  session_id: z.string().trim().min(1).optional()
});

const taskQuerySchema = z.object({
  status: taskStatusSchema.optional(),
  device_id: z.string().trim().min(1).optional()
});

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "invalid request";
}

export function createApp(context: AgentContext): Express {
  const { logger } = context.tools;
  const app = express();
  app.set("trust proxy", 1);
  app.use(express.json());

  const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: 120,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "too many requests; slow down" }
  });

  app.use("/api", apiLimiter);

  app.get("/", (_req, res) => {
    res.json({ service: context.config.agent.name, version: VERSION, status: "running" });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      llm: context.llm !== null,
      scheduler: { running: context.scheduler.running, tasks: context.scheduler.size }
    });
  });

  app.post("/api/v1/chat", async (req, res) => {
    const body = chatBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: firstIssue(body.error) });
    }

    const sessionId = body.data.session_id ?? randomUUID();
    try {
      const routed = await routeAgentCommand(context, body.data.query);
      return res.json({ success: true, session_id: sessionId, result: routed.human, error: null });
    } catch (error) {
      logger.error(`Chat failed: ${errorMessage(error)}`);
      return res
        .status(500)
        .json({ success: false, session_id: sessionId, result: null, error: errorMessage(error) });
    }
  });

  app.post("/api/v1/chat/stream", async (req, res) => {
    const body = chatBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: firstIssue(body.error) });
    }

    const sessionId = body.data.session_id ?? randomUUID();
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const send = (event: AgentEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    send({ type: "start", query: body.data.query, session_id: sessionId });
    try {
      const routed = await routeAgentCommand(context, body.data.query, { onEvent: send });
      send({ type: "done", reply: routed.human, session_id: sessionId });
    } catch (error) {
      logger.error(`Chat stream failed: ${errorMessage(error)}`);
      send({ type: "error", message: errorMessage(error) });
    }
    return res.end();
  });

  app.get("/api/v1/device/tools", (_req, res) => {
    res.json({ tools: toolSpecs() });
  });

  app.get("/api/v1/device/status", async (req, res) => {
    const deviceId = typeof req.query.device_id === "string" ? req.query.device_id.trim() : "";
    try {
      const result = deviceId ? await getDeviceStatus(context, deviceId) : await listDevices(context);
      return res.status(result.data.success ? 200 : 502).json(result.data);
    } catch (error) {
      return res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.get("/api/v1/tasks", (req, res) => {
    const query = taskQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: firstIssue(query.error) });
    }

    try {
      const result = listScheduleTasks(context, { status: query.data.status, deviceId: query.data.device_id });
      return res.json(result.data);
    } catch (error) {
      return res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.get("/api/v1/tasks/:taskId", (req, res) => {
    const task = getScheduleTask(context, req.params.taskId);
    if (!task) {
      return res.status(404).json({ error: "task not found" });
    }
    return res.json({ task, scheduled: context.scheduler.get(task.task_id) });
  });

  app.delete("/api/v1/tasks/:taskId", async (req, res) => {
    try {
      const result = await deleteScheduleTask(context, req.params.taskId);
      return res.status(result.data.success ? 200 : 404).json(result.data);
    } catch (error) {
      return res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.get("/api/v1/history", async (req, res) => {
    const limit = Number(req.query.limit || 50);
    if (!Number.isInteger(limit) || limit < 1 || limit > 500) {
      return res.status(400).json({ error: "limit must be an integer between 1 and 500" });
    }

    try {
      return res.json({ items: await context.tools.storage.listHistory(limit) });
    } catch (error) {
      return res.status(500).json({ error: errorMessage(error) });
    }
  });

  const handleErrors: ErrorRequestHandler = (error, _req, res, _next) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "request body is not valid JSON" });
      return;
    }
    logger.error(`Unhandled request error: ${errorMessage(error)}`);
    res.status(500).json({ error: errorMessage(error) });
  };
  app.use(handleErrors);

  return app;
}
