import type { Logger } from "../agent/schema.js";

const levelOrder = ["error", "warn", "info", "debug"] as const;
type Level = (typeof levelOrder)[number];

function canLog(current: Level, target: Level): boolean {
  return levelOrder.indexOf(target) <= levelOrder.indexOf(current);
}

function parseLevel(level: string | undefined): Level {
  const normalized = (level || "").trim().toLowerCase();
  return levelOrder.find((value) => value === normalized) ?? "info";
}

function line(level: Level, scope: string, message: string): string {
  return `${new Date().toISOString()} [${level}] ${scope}: ${message}`;
}

export function createLogger(level: string | undefined, scope = "feeder"): Logger {
  const current = parseLevel(level);

  return {
    debug(message: string) {
      if (canLog(current, "debug")) {
        console.debug(line("debug", scope, message));
      }
    },
    info(message: string) {
      if (canLog(current, "info")) {
        console.log(line("info", scope, message));
      }
    },
    warn(message: string) {
      if (canLog(current, "warn")) {
        console.warn(line("warn", scope, message));
      }
    },
    error(message: string) {
      if (canLog(current, "error")) {
        console.error(line("error", scope, message));
      }
    }
  };
}
