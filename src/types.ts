export type Coordinates = { latitude: number; longitude: number };

export type ChatInput =
  | { kind: "command"; name: string; args: string }
  | { kind: "text"; text: string }
  | { kind: "location"; coords: Coordinates }
  | { kind: "callback"; data: string };

export type ChatEvent = {
  platform: "telegram";
  updateId: number;
  chatId: string;
  userId: string;
  input: ChatInput;
  callbackQueryId?: string;
  timestampMs: number;
};

export type ReplyMarkup =
  | { kind: "keyboard"; rows: string[][] }
  | { kind: "requestLocation"; label: string }
  | { kind: "remove" };

export type Reply = {
  text: string;
  html?: boolean;
  markup?: ReplyMarkup;
};

export type SendTarget = { chatId: string };

export type SendMessage = Reply & { target: SendTarget };

export interface ChatTransport {
  send(msg: SendMessage): Promise<void>;
  answerCallback?(callbackQueryId: string): Promise<void>;
}
