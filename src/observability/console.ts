import type { ChatEvent, ChatInput, SendTarget } from "../types.js";
import { brief } from "../utils/text.js";

function describeInput(input: ChatInput): string {
  switch (input.kind) {
    case "command":
      return `/${input.name}${input.args ? ` ${input.args}` : ""}`;
    case "text":
      return input.text;
    case "location":
      return `[location ${input.coords.latitude},${input.coords.longitude}]`;
    case "callback":
      return `[callback ${input.data}]`;
  }
}

export function printInbound(evt: ChatEvent): void {
  console.log(`RX c=${evt.chatId} u=${evt.userId} : ${brief(describeInput(evt.input))}`);
}

export function printOutbound(target: SendTarget, text: string): void {
  console.log(`TX c=${target.chatId} : ${brief(text)}`);
}

export function printError(context: string, err: unknown): void {
  const msg = err instanceof Error ? err.message : String(err);
  console.log(`ERR ${context} : ${msg}`);
}
