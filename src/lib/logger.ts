// ─── Logging ────────────────────────────────────────────────────────────────

import { createLogger, format, transports, type Logger } from "winston";

export type { Logger };
export type LogLevel = "error" | "warn" | "info" | "debug" | "silent";

const lineFormat = format.printf(({ timestamp, level, message, scope, ...meta }) => {
  const tag = typeof scope === "string" ? ` [${scope}]` : "";
  const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} ${level}${tag} ${String(message)}${rest}`;
});

const root = createLogger({
  level: "info",
  // Vitest sets VITEST in every worker
  silent: process.env.VITEST !== undefined,
  format: format.combine(format.timestamp(), lineFormat),
  transports: [new transports.Console({ stderrLevels: ["error", "warn"] })],
});

export function setLogLevel(level: LogLevel): void {
  if (level === "silent") {
    root.silent = true;
    return;
  }
  root.level = level;
}

export function getLogger(scope: string): Logger {
  return root.child({ scope });
}
