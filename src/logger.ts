import { pino } from "pino";

function levelFromEnv(): string {
  const lvl = String(process.env.LOG_LEVEL ?? "").trim();
  if (lvl) return lvl;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

export const logger = pino({
  level: levelFromEnv(),
  base: { app: "rvm-finder-bot" }
});

export function setLogLevel(level: string): void {
  logger.level = level;
}
