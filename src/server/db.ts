import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import {
  taskModeSchema,
  taskStatusSchema,
  type AgentTools,
  type TaskRecord,
  type TaskRequest
} from "../agent/schema.js";

interface TaskRow {
  id: number;
  task_id: string;
  topic: string;
  tool_name: string;
  mode: string;
  request: string;
  status: string;
  response: string | null;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}

const taskRequestSchema = z.object({
  device_id: z.string(),
  feed_count: z.number().int(),
  scheduled_time: z.string()
});

const responseSchema = z.record(z.unknown());

const TASK_COLUMNS =
  "id, task_id, topic, tool_name, mode, request, status, response, created_at, updated_at, completed_at";

function toRecord(row: TaskRow): TaskRecord {
  const request: TaskRequest = taskRequestSchema.parse(JSON.parse(row.request));
  const response = row.response ? responseSchema.parse(JSON.parse(row.response)) : null;

  return {
    id: row.id,
    taskId: row.task_id,
    topic: row.topic,
    toolName: row.tool_name,
    mode: taskModeSchema.parse(row.mode),
    request,
    status: taskStatusSchema.parse(row.status),
    response,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at
  };
}

/**
 * Opens (or creates) the task database. Pass ":memory:" for a throwaway store.
 */
export function openTaskStore(path: string, now: () => Date = () => new Date()): AgentTools["tasks"] {
  const dbPath = path === ":memory:" ? path : resolve(process.cwd(), path);
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  db.exec(`
CREATE TABLE IF NOT EXISTS tasks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  task_id TEXT UNIQUE NOT NULL,
  topic TEXT NOT NULL,
  tool_name TEXT NOT NULL,
  mode TEXT NOT NULL,
  request TEXT NOT NULL,
  status TEXT NOT NULL,
  response TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  completed_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_tasks_topic_status ON tasks (topic, status);
`);

  const selectOne = db.prepare<[string], TaskRow>(`SELECT ${TASK_COLUMNS} FROM tasks WHERE task_id = ?`);

  function getTask(taskId: string): TaskRecord | null {
    const row = selectOne.get(taskId);
    return row ? toRecord(row) : null;
  }

  return {
    insertTask(input) {
      const ts = now().toISOString();
      db.prepare(
        `INSERT INTO tasks (task_id, topic, tool_name, mode, request, status, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        input.taskId,
        input.topic,
        input.toolName,
        input.mode,
        JSON.stringify(input.request),
        input.status,
        ts,
        ts
      );

      const stored = getTask(input.taskId);
      if (!stored) {
        throw new Error(`Failed to store task ${input.taskId}`);
      }
      return stored;
    },

    getTask,

    updateTask(taskId, patch) {
      const sets: string[] = [];
      const values: Array<string | null> = [];

      if (patch.mode !== undefined) {
        sets.push("mode = ?");
        values.push(patch.mode);
      }
      if (patch.request !== undefined) {
        sets.push("request = ?");
        values.push(JSON.stringify(patch.request));
      }
      if (patch.status !== undefined) {
        sets.push("status = ?");
        values.push(patch.status);
      }
      if (patch.response !== undefined) {
        sets.push("response = ?");
        values.push(patch.response === null ? null : JSON.stringify(patch.response));
      }
      if (patch.completedAt !== undefined) {
        sets.push("completed_at = ?");
        values.push(patch.completedAt);
      }

      sets.push("updated_at = ?");
      values.push(now().toISOString());

      const result = db
        .prepare(`UPDATE tasks SET ${sets.join(", ")} WHERE task_id = ?`)
        .run(...values, taskId);
      return result.changes > 0;
    },

    listTasks(filter) {
      const limit = Math.max(1, filter.limit ?? 50);
      const rows = filter.status
        ? db
            .prepare<[string, string, number], TaskRow>(
              `SELECT ${TASK_COLUMNS} FROM tasks WHERE topic = ? AND status = ? ORDER BY created_at DESC, id DESC LIMIT ?`
            )
            .all(filter.topic, filter.status, limit)
        : db
            .prepare<[string, number], TaskRow>(
              `SELECT ${TASK_COLUMNS} FROM tasks WHERE topic = ? ORDER BY created_at DESC, id DESC LIMIT ?`
            )
            .all(filter.topic, limit);

      return rows.map(toRecord);
    },

    close() {
      db.close();
    }
  };
}
