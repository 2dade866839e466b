import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { logger } from "../logger.js";
import { atomicWriteJson, safeParseJson } from "../utils/fs.js";
import type { ReminderRecord } from "./types.js";

const reminderSchema = z.object({
  userId: z.string().min(1),
  chatId: z.string().min(1),
  frequency: z.literal("monthly"),
  dayOfMonth: z.number().int().min(1).max(31),
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
  createdAtMs: z.number(),
  lastFiredAtMs: z.number().nullable().default(null),
  attempts: z.number().int().nonnegative().default(0),
  lastError: z.string().optional()
});

function readReminders(filePath: string): ReminderRecord[] {
  if (!fs.existsSync(filePath)) return [];
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed = safeParseJson(raw);
  if (!Array.isArray(parsed)) {
    logger.warn({ filePath }, "reminders file is not a JSON array, starting empty");
    return [];
  }
  const out: ReminderRecord[] = [];
  for (const item of parsed) {
    const r = reminderSchema.safeParse(item);
    if (r.success) out.push(r.data);
    else logger.warn({ filePath, issues: r.error.issues.length }, "skipping malformed reminder");
  }
  return out;
}

export type ReminderInput = Pick<ReminderRecord, "userId" | "chatId" | "frequency" | "dayOfMonth" | "hour" | "minute">;

/** One reminder per user, persisted to `reminders.json` after every change. */
export class ReminderStore {
  readonly filePath: string;
  private readonly reminders = new Map<string, ReminderRecord>();

  constructor(dataDir: string) {
    this.filePath = path.join(dataDir, "reminders.json");
    for (const r of readReminders(this.filePath)) {
      this.reminders.set(r.userId, r);
    }
  }

  get(userId: string): ReminderRecord | undefined {
    const r = this.reminders.get(userId);
    return r ? { ...r } : undefined;
  }

  listAll(): ReminderRecord[] {
    return [...this.reminders.values()].map((r) => ({ ...r }));
  }

  upsert(input: ReminderInput, nowMs = Date.now()): ReminderRecord {
    const rem: ReminderRecord = {
      ...input,
      createdAtMs: nowMs,
      lastFiredAtMs: null,
      attempts: 0
    };
    this.reminders.set(rem.userId, rem);
    this.flush();
    return { ...rem };
  }

  remove(userId: string): boolean {
    const existed = this.reminders.delete(userId);
    if (existed) this.flush();
    return existed;
  }

  private current(userId: string, createdAtMs: number): ReminderRecord | undefined {
    const rem = this.reminders.get(userId);
    return rem && rem.createdAtMs === createdAtMs ? rem : undefined;
  }

  /** No-op when the user's reminder was replaced or removed since `createdAtMs`. */
  markFired(userId: string, createdAtMs: number, atMs: number): void {
    const rem = this.current(userId, createdAtMs);
    if (!rem) return;
    rem.lastFiredAtMs = atMs;
    rem.attempts = 0;
    rem.lastError = undefined;
    this.flush();
  }

  markFailed(userId: string, createdAtMs: number, error: string): void {
    const rem = this.current(userId, createdAtMs);
    if (!rem) return;
    rem.attempts += 1;
    rem.lastError = error || "send_failed";
    this.flush();
  }

  flush(): void {
    atomicWriteJson(this.filePath, [...this.reminders.values()]);
  }
}
