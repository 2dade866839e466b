import { logger } from "../logger.js";
import type { SendMessage } from "../types.js";
import { errorMessage } from "../utils/async.js";
import { isReminderDue } from "./schedule.js";
import type { ReminderStore } from "./store.js";

export const REMINDER_TEXT =
  "♻️ It's time to recycle! Don't forget to bring your bottles and cans to the nearest RVM. Use /find to locate one.";

export class ReminderScheduler {
  private timer?: NodeJS.Timeout;
  private running = false;

  constructor(
    private readonly store: ReminderStore,
    private readonly sendFn: (msg: SendMessage) => Promise<void>,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => void this.tick(), this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  /** Sends every due reminder once; failed sends stay due for the next tick. */
  async tick(now: Date = new Date()): Promise<number> {
    if (this.running) return 0;
    this.running = true;
    let sent = 0;
    try {
      const due = this.store.listAll().filter((r) => isReminderDue(r, now));
      for (const rem of due) {
        try {
          await this.sendFn({ target: { chatId: rem.chatId }, text: REMINDER_TEXT });
          this.store.markFired(rem.userId, rem.createdAtMs, now.getTime());
          sent += 1;
          logger.info({ userId: rem.userId, chatId: rem.chatId }, "reminder sent");
        } catch (err) {
          logger.warn({ err, userId: rem.userId, attempts: rem.attempts + 1 }, "reminder send failed, will retry");
          this.store.markFailed(rem.userId, rem.createdAtMs, errorMessage(err));
        }
      }
    } catch (err) {
      logger.error({ err }, "reminder tick failed");
    } finally {
      this.running = false;
    }
    return sent;
  }
}
