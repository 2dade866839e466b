import { z } from "zod";
import { resolveFromProjectRoot } from "./utils/fs.js";

function normalizeSecret(v: unknown): unknown {
  if (typeof v !== "string") return v;
  const s = v.trim();
  const m1 = s.match(/^["']([\s\S]*)["']$/);
  const v1 = (m1 ? m1[1] : s).trim();
  const m2 = v1.match(/^`([\s\S]*)`$/);
  return (m2 ? m2[1] : v1).trim();
}

function emptyToUndefined(v: unknown): unknown {
  if (typeof v === "string" && v.trim() === "") return undefined;
  return v;
}

const envSchema = z.object({
  BOT_TOKEN: z.preprocess(normalizeSecret, z.string({ required_error: "is required" }).min(1, "is required")),
  TELEGRAM_API_URL: z.preprocess(emptyToUndefined, z.string().url().default("https://api.telegram.org")),
  TELEGRAM_POLL_TIMEOUT_S: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(50).default(30)),

  RVM_DATA_FILE: z.preprocess(emptyToUndefined, z.string().default("data/rvms.csv")),
  DATA_DIR: z.preprocess(emptyToUndefined, z.string().default("data")),

  ONEMAP_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().default("https://www.onemap.gov.sg")),
  HTTP_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1000).max(120000).default(15000)),

  REMINDER_POLL_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1000).max(3_600_000).default(60000)),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
  )
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const env: Record<string, unknown> = { ...source };
  if (!env.BOT_TOKEN && env.TELEGRAM_BOT_TOKEN) env.BOT_TOKEN = env.TELEGRAM_BOT_TOKEN;

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid configuration:\n${issues}`);
  }
  const cfg = parsed.data;
  cfg.RVM_DATA_FILE = resolveFromProjectRoot(cfg.RVM_DATA_FILE);
  cfg.DATA_DIR = resolveFromProjectRoot(cfg.DATA_DIR);
  return cfg;
}
