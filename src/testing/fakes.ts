import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { GeocodeError, TransportError } from "../errors.js";
import type { Geocoder } from "../geocode/oneMap.js";
import { parseRvmCsv, serializeRvmCsv } from "../rvm/csv.js";
import type { RvmStorage } from "../rvm/storage.js";
import type { RvmRecord } from "../rvm/types.js";
import type { ChatEvent, ChatInput, ChatTransport, Coordinates, SendMessage } from "../types.js";

export const ABC_CSV = [
  "id,name,address,latitude,longitude,status",
  "A,Alpha Mall,1 Alpha Road,1.30,103.80,Working",
  "B,Bravo Club,2 Bravo Street,1.31,103.81,Working",
  "C,Charlie Station,3 Charlie Avenue,1.35,103.90,Working",
  ""
].join("\n");

/** Serialized table held in memory; counts writes. */
export class MemoryStorage implements RvmStorage {
  readonly location = "memory";
  writes = 0;
  failWrites = false;

  constructor(public text: string) {}

  read(): RvmRecord[] {
    return parseRvmCsv(this.text);
  }

  write(records: readonly RvmRecord[]): void {
    if (this.failWrites) throw new Error("disk full");
    this.text = serializeRvmCsv(records);
    this.writes += 1;
  }
}

export class FakeGeocoder implements Geocoder {
  readonly queries: string[] = [];

  constructor(private readonly places: Record<string, Coordinates>) {}

  async geocode(query: string): Promise<Coordinates> {
    this.queries.push(query);
    const hit = this.places[query.trim().toLowerCase()];
    if (!hit) throw new GeocodeError(`no results for "${query}"`);
    return hit;
  }
}

export class RecordingTransport implements ChatTransport {
  readonly sent: SendMessage[] = [];
  readonly answered: string[] = [];
  failNext = 0;

  async send(msg: SendMessage): Promise<void> {
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new TransportError("Telegram sendMessage failed: 403 Forbidden: bot was blocked by the user");
    }
    this.sent.push(msg);
  }

  async answerCallback(callbackQueryId: string): Promise<void> {
    this.answered.push(callbackQueryId);
  }

  texts(): string[] {
    return this.sent.map((m) => m.text);
  }

  clear(): void {
    this.sent.length = 0;
  }
}

let nextUpdateId = 1;

export function chatEvent(input: ChatInput, opts: { userId?: string; chatId?: string } = {}): ChatEvent {
  const userId = opts.userId ?? "u1";
  return {
    platform: "telegram",
    updateId: nextUpdateId++,
    chatId: opts.chatId ?? userId,
    userId,
    input,
    timestampMs: Date.now()
  };
}

export const text = (t: string): ChatInput => ({ kind: "text", text: t });
export const command = (name: string, args = ""): ChatInput => ({ kind: "command", name, args });
export const location = (latitude: number, longitude: number): ChatInput => ({
  kind: "location",
  coords: { latitude, longitude }
});

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}
