import { z } from "zod";
import type { AppConfig } from "../../config.js";
import { TransportError } from "../../errors.js";
import { logger } from "../../logger.js";
import type { ChatEvent, ChatTransport, ReplyMarkup, SendMessage } from "../../types.js";
import { errorMessage, sleep } from "../../utils/async.js";
import { parseCommand, splitChatText } from "../../utils/text.js";

const MAX_MESSAGE_CHARS = 4096;

const telegramIdSchema = z.union([z.number(), z.string()]).transform((v) => String(v));

const messageSchema = z.object({
  message_id: z.number(),
  date: z.number(),
  chat: z.object({ id: telegramIdSchema }),
  from: z.object({ id: telegramIdSchema }).optional(),
  text: z.string().optional(),
  location: z.object({ latitude: z.number(), longitude: z.number() }).optional()
});

const updateSchema = z.object({
  update_id: z.number(),
  message: messageSchema.optional(),
  callback_query: z
    .object({
      id: z.string(),
      from: z.object({ id: telegramIdSchema }),
      data: z.string().optional(),
      message: z.object({ chat: z.object({ id: telegramIdSchema }) }).optional()
    })
    .optional()
});

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional()
});

const botInfoSchema = z.object({ id: z.number(), username: z.string().optional() });

export type TelegramUpdate = z.infer<typeof updateSchema>;
export type BotInfo = z.infer<typeof botInfoSchema>;

type TelegramConfig = Pick<AppConfig, "BOT_TOKEN" | "TELEGRAM_API_URL" | "TELEGRAM_POLL_TIMEOUT_S" | "HTTP_TIMEOUT_MS">;

/** Converts a Bot API update into a ChatEvent; null for updates the bot doesn't act on. */
export function toChatEvent(u: TelegramUpdate): ChatEvent | null {
  if (u.callback_query) {
    const cq = u.callback_query;
    return {
      platform: "telegram",
      updateId: u.update_id,
      chatId: cq.message?.chat.id ?? cq.from.id,
      userId: cq.from.id,
      input: { kind: "callback", data: cq.data ?? "" },
      callbackQueryId: cq.id,
      timestampMs: Date.now()
    };
  }

  const m = u.message;
  if (!m) return null;
  const base = {
    platform: "telegram" as const,
    updateId: u.update_id,
    chatId: m.chat.id,
    userId: m.from?.id ?? m.chat.id,
    timestampMs: m.date * 1000
  };
  if (m.location) {
    return { ...base, input: { kind: "location", coords: { latitude: m.location.latitude, longitude: m.location.longitude } } };
  }
  if (typeof m.text === "string") {
    const cmd = parseCommand(m.text);
    if (cmd) return { ...base, input: { kind: "command", name: cmd.name, args: cmd.args } };
    return { ...base, input: { kind: "text", text: m.text } };
  }
  return null;
}

export function toReplyMarkup(markup: ReplyMarkup): Record<string, unknown> {
  switch (markup.kind) {
    case "keyboard":
      return {
        keyboard: markup.rows.map((row) => row.map((text) => ({ text }))),
        one_time_keyboard: true,
        resize_keyboard: true
      };
    case "requestLocation":
      return {
        keyboard: [[{ text: markup.label, request_location: true }]],
        one_time_keyboard: true,
        resize_keyboard: true
      };
    case "remove":
      return { remove_keyboard: true };
  }
}

export class TelegramClient implements ChatTransport {
  private readonly baseUrl: string;
  private readonly inflight = new Set<AbortController>();
  private polling = false;
  private stopped = new AbortController();
  private loop?: Promise<void>;
  private offset = 0;

  constructor(
    private readonly config: TelegramConfig,
    private readonly fetchFn: typeof fetch = fetch
  ) {
    const apiUrl = config.TELEGRAM_API_URL.replace(/\/+$/, "");
    this.baseUrl = `${apiUrl}/bot${config.BOT_TOKEN}`;
  }

  async getMe(): Promise<BotInfo> {
    return this.callApi("getMe", {}, botInfoSchema, this.config.HTTP_TIMEOUT_MS);
  }

  async send(msg: SendMessage): Promise<void> {
    const chunks = splitChatText(msg.text, MAX_MESSAGE_CHARS);
    for (let i = 0; i < chunks.length; i++) {
      const last = i === chunks.length - 1;
      const params: Record<string, unknown> = {
        chat_id: msg.target.chatId,
        text: chunks[i],
        disable_web_page_preview: true
      };
      if (msg.html) params.parse_mode = "HTML";
      if (last && msg.markup) params.reply_markup = toReplyMarkup(msg.markup);
      await this.callApi("sendMessage", params, z.unknown(), this.config.HTTP_TIMEOUT_MS);
    }
  }

  async answerCallback(callbackQueryId: string): Promise<void> {
    await this.callApi("answerCallbackQuery", { callback_query_id: callbackQueryId }, z.unknown(), this.config.HTTP_TIMEOUT_MS);
  }

  /** Starts long polling; events are handed to `onEvent` one at a time, in update order. */
  connect(onEvent: (evt: ChatEvent) => Promise<void>): void {
    if (this.polling) return;
    this.polling = true;
    this.stopped = new AbortController();
    this.loop = this.pollLoop(onEvent);
  }

  async disconnect(): Promise<void> {
    this.polling = false;
    this.stopped.abort();
    for (const c of this.inflight) c.abort();
    await this.loop;
    this.loop = undefined;
  }

  private async pollLoop(onEvent: (evt: ChatEvent) => Promise<void>): Promise<void> {
    let failures = 0;
    logger.debug({ offset: this.offset }, "Telegram polling started");
    while (this.polling) {
      let updates: unknown[];
      try {
        updates = await this.callApi(
          "getUpdates",
          {
            offset: this.offset,
            timeout: this.config.TELEGRAM_POLL_TIMEOUT_S,
            allowed_updates: ["message", "callback_query"]
          },
          z.array(z.unknown()),
          this.config.TELEGRAM_POLL_TIMEOUT_S * 1000 + this.config.HTTP_TIMEOUT_MS
        );
        failures = 0;
      } catch (err) {
        if (!this.polling) break;
        failures += 1;
        const backoffMs = Math.min(30_000, 1000 * 2 ** Math.min(failures - 1, 5));
        logger.error({ err, failures, backoffMs }, "Telegram getUpdates failed");
        await sleep(backoffMs, this.stopped.signal);
        continue;
      }

      for (const raw of updates) {
        const parsed = updateSchema.safeParse(raw);
        if (!parsed.success) {
          const id = z.object({ update_id: z.number() }).safeParse(raw);
          if (id.success) this.offset = Math.max(this.offset, id.data.update_id + 1);
          logger.debug({ issues: parsed.error.issues.length }, "skipping unrecognised update");
          continue;
        }
        this.offset = Math.max(this.offset, parsed.data.update_id + 1);
        const evt = toChatEvent(parsed.data);
        if (!evt) continue;
        try {
          await onEvent(evt);
        } catch (err) {
          logger.error({ err, updateId: evt.updateId }, "Handle event failed");
        }
      }
    }
    logger.debug("Telegram polling stopped");
  }

  private async callApi<S extends z.ZodTypeAny>(
    method: string,
    params: Record<string, unknown>,
    resultSchema: S,
    timeoutMs: number
  ): Promise<z.infer<S>> {
    const controller = new AbortController();
    this.inflight.add(controller);
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await this.fetchFn(`${this.baseUrl}/${method}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(params),
        signal: controller.signal
      });
      const body = apiResponseSchema.safeParse(await res.json().catch(() => undefined));
      if (!body.success) throw new TransportError(`Telegram ${method} failed: HTTP ${res.status} with unexpected body`);
      if (!res.ok || !body.data.ok) {
        const code = body.data.error_code ?? res.status;
        throw new TransportError(`Telegram ${method} failed: ${code} ${body.data.description ?? ""}`.trim());
      }
      const result = resultSchema.safeParse(body.data.result);
      if (!result.success) throw new TransportError(`Telegram ${method} returned an unexpected result`);
      return result.data;
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError(`Telegram ${method} failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
      this.inflight.delete(controller);
    }
  }
}
