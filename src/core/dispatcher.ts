import { logger } from "../logger.js";
import { printError, printInbound, printOutbound } from "../observability/console.js";
import type { ChatEvent, ChatTransport, SendTarget } from "../types.js";
import { advance, IDLE, type FlowDeps, type FlowState, type Step } from "./conversation.js";
import { GENERIC_ERROR_TEXT } from "./format.js";

function sessionKey(chatId: string, userId: string): string {
  return `${chatId}:${userId}`;
}

export type DispatcherOptions = { trace?: boolean };

/**
 * Owns the per-user session map and is the error boundary for everything
 * downstream of an inbound event: a failing flow is logged, the user gets a
 * generic notice and the session drops back to idle.
 */
export class Dispatcher {
  private readonly sessions = new Map<string, FlowState>();
  private readonly trace: boolean;

  constructor(
    private readonly transport: ChatTransport,
    private readonly deps: FlowDeps,
    opts: DispatcherOptions = {}
  ) {
    this.trace = opts.trace ?? true;
  }

  stateOf(chatId: string, userId: string): FlowState {
    return this.sessions.get(sessionKey(chatId, userId)) ?? IDLE;
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  async handle(evt: ChatEvent): Promise<void> {
    const key = sessionKey(evt.chatId, evt.userId);
    const state = this.sessions.get(key) ?? IDLE;
    if (this.trace) printInbound(evt);

    let step: Step;
    try {
      step = await advance(state, evt.input, { userId: evt.userId, chatId: evt.chatId }, this.deps);
    } catch (err) {
      logger.error(
        {
          err,
          userId: evt.userId,
          chatId: evt.chatId,
          flow: state.flow,
          awaiting: "awaiting" in state ? state.awaiting : undefined
        },
        "flow failed"
      );
      if (this.trace) printError("flow", err);
      step = { state: IDLE, replies: [{ text: GENERIC_ERROR_TEXT, markup: { kind: "remove" } }] };
    }

    if (step.state.flow === "idle") this.sessions.delete(key);
    else this.sessions.set(key, step.state);

    if (evt.callbackQueryId && this.transport.answerCallback) {
      try {
        await this.transport.answerCallback(evt.callbackQueryId);
      } catch (err) {
        logger.warn({ err, chatId: evt.chatId }, "answerCallback failed");
      }
    }

    const target = { chatId: evt.chatId };
    for (const reply of step.replies) {
      try {
        await this.transport.send({ ...reply, target });
        if (this.trace) printOutbound(target, reply.text);
      } catch (err) {
        logger.error({ err, userId: evt.userId, chatId: evt.chatId }, "reply send failed");
        if (this.trace) printError("send", err);
        if (reply.text !== GENERIC_ERROR_TEXT) await this.sendGenericError(target);
        break;
      }
    }
  }

  private async sendGenericError(target: SendTarget): Promise<void> {
    try {
      await this.transport.send({ text: GENERIC_ERROR_TEXT, markup: { kind: "remove" }, target });
    } catch (err) {
      logger.warn({ err, chatId: target.chatId }, "generic error notice not delivered");
    }
  }
}
