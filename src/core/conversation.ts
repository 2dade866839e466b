import { GeocodeError, NotFoundError, ValidationError } from "../errors.js";
import { parseStatus } from "../rvm/csv.js";
import { isValidCoordinates } from "../rvm/geo.js";
import type { RvmDataset } from "../rvm/dataset.js";
import type { RvmRecord, RvmStatus } from "../rvm/types.js";
import { nextFireTime, parseDayOfMonth, parseTimeOfDay } from "../reminders/schedule.js";
import { REMINDER_TEXT } from "../reminders/scheduler.js";
import type { ReminderStore } from "../reminders/store.js";
import type { ReminderFrequency } from "../reminders/types.js";
import type { ChatInput, Coordinates, Reply } from "../types.js";
import {
  ABOUT_TEXT,
  FREQUENCY_KEYBOARD,
  MAIN_KEYBOARD,
  SHARE_LOCATION,
  STATUS_KEYBOARD,
  WELCOME_TEXT,
  formatDateTimeLocal,
  nearestResultsReply,
  reminderSummary,
  reportConfirmationReply,
  selectionPromptReply
} from "./format.js";

export const NEAREST_COUNT = 3;
export const ALTERNATIVE_COUNT = 2;

export type FlowState =
  | { flow: "idle" }
  | { flow: "finding"; awaiting: "location" }
  | { flow: "reporting"; awaiting: "location" }
  | { flow: "reporting"; awaiting: "selection"; origin: Coordinates; candidateIds: string[] }
  | { flow: "reporting"; awaiting: "status"; origin: Coordinates; candidateIds: string[]; rvmId: string }
  | { flow: "settingReminder"; awaiting: "frequency" }
  | { flow: "settingReminder"; awaiting: "day"; frequency: ReminderFrequency }
  | { flow: "settingReminder"; awaiting: "time"; frequency: ReminderFrequency; dayOfMonth: number };

type FindingState = Extract<FlowState, { flow: "finding" }>;
type ReportingState = Extract<FlowState, { flow: "reporting" }>;
type ReminderState = Extract<FlowState, { flow: "settingReminder" }>;
type FlowInput = Exclude<ChatInput, { kind: "command" }>;

export type FlowContext = { userId: string; chatId: string };

export type FlowDeps = {
  dataset: Pick<RvmDataset, "nearestK" | "findByQuery" | "updateStatus" | "get">;
  reminders: Pick<ReminderStore, "upsert" | "get" | "remove">;
  now?: () => Date;
};

export type Step = { state: FlowState; replies: Reply[] };

export const IDLE: FlowState = { flow: "idle" };

const PROMPTS = {
  find: "To help you find the nearest RVMs, please:\n- Share your location, or\n- Type a location, building name or postal code.",
  geocodeFailed:
    "Sorry, I couldn't understand that location. Please try again with a location, building name or postal code, or share your location.",
  reportLocation: "Sure, let's report the status of an RVM. First, please share your current location.",
  reportLocationAgain: "Please share your current location using the button below so I can find the RVMs near you.",
  selectionAgain: "Please choose one of the RVMs using the buttons below.",
  statusAgain: "Please choose the RVM's current status using the buttons below.",
  noLongerAvailable: "That RVM is no longer available. Please start again with /report.",
  frequency: "Great! Let's set up a reminder. How often would you like to be reminded to recycle your bottles and cans?",
  frequencyAgain: "Currently, only monthly reminders are supported. Please choose Monthly.",
  day: "Okay, you've chosen a monthly reminder. Please enter the day of the month (1-31) that works best for you:",
  dayAgain: "Invalid day. Please enter a valid day of the month (1-31).",
  time: "What time would you like to receive the reminder? Use 24-hour time, e.g. 09:00 or 2230.",
  timeAgain: "Invalid time. Please enter a valid time in 24-hour format, e.g. 09:00 or 2230.",
  idle: "Please use /start to see what I can do.",
  unknownCommand: "Sorry, I don't know that command. Use /start to see what I can do."
} as const;

function textOf(input: FlowInput): string | null {
  if (input.kind === "text") return input.text;
  if (input.kind === "callback") return input.data;
  return null;
}

function stay(state: FlowState, reply: Reply): Step {
  return { state, replies: [reply] };
}

function done(...replies: Reply[]): Step {
  return { state: IDLE, replies };
}

function unreachable(x: never): never {
  throw new Error(`unhandled flow state: ${JSON.stringify(x)}`);
}

/**
 * Advances one user's conversation by a single inbound event. Commands always
 * win and restart from scratch; anything else is routed by the current state.
 */
export async function advance(state: FlowState, input: ChatInput, ctx: FlowContext, deps: FlowDeps): Promise<Step> {
  if (input.kind === "command") return runCommand(input.name, ctx, deps);

  switch (state.flow) {
    case "idle":
      return done({ text: PROMPTS.idle });
    case "finding":
      return advanceFinding(state, input, deps);
    case "reporting":
      return advanceReporting(state, input, deps);
    case "settingReminder":
      return advanceReminder(state, input, ctx, deps);
    default:
      return unreachable(state);
  }
}

function runCommand(name: string, ctx: FlowContext, deps: FlowDeps): Step {
  switch (name) {
    case "start":
      return done({ text: WELCOME_TEXT, html: true, markup: MAIN_KEYBOARD });
    case "about":
      return done({ text: ABOUT_TEXT });
    case "cancel":
      return done({ text: "Cancelled. Use /start whenever you need me again.", markup: { kind: "remove" } });
    case "find":
      return { state: { flow: "finding", awaiting: "location" }, replies: [{ text: PROMPTS.find, markup: SHARE_LOCATION }] };
    case "report":
      return {
        state: { flow: "reporting", awaiting: "location" },
        replies: [{ text: PROMPTS.reportLocation, markup: SHARE_LOCATION }]
      };
    case "set":
      return {
        state: { flow: "settingReminder", awaiting: "frequency" },
        replies: [{ text: PROMPTS.frequency, markup: FREQUENCY_KEYBOARD }]
      };
    case "reminder": {
      const rem = deps.reminders.get(ctx.userId);
      if (!rem) return done({ text: "You don't have a reminder yet. Use /set to create one." });
      const now = deps.now?.() ?? new Date();
      return done({
        text: `Your reminder is set for ${reminderSummary(rem)}.\nNext reminder: ${formatDateTimeLocal(nextFireTime(rem, now))}`
      });
    }
    case "unset":
      return done({
        text: deps.reminders.remove(ctx.userId)
          ? "Your reminder has been removed."
          : "You don't have a reminder to remove."
      });
    default:
      return done({ text: PROMPTS.unknownCommand });
  }
}

async function advanceFinding(state: FindingState, input: FlowInput, deps: FlowDeps): Promise<Step> {
  if (input.kind === "location") {
    if (!isValidCoordinates(input.coords)) return stay(state, { text: PROMPTS.find, markup: SHARE_LOCATION });
    return done(nearestResultsReply(deps.dataset.nearestK(input.coords, NEAREST_COUNT)));
  }

  const query = textOf(input)?.trim();
  if (!query) return stay(state, { text: PROMPTS.find, markup: SHARE_LOCATION });
  try {
    const { results } = await deps.dataset.findByQuery(query, NEAREST_COUNT);
    return done(nearestResultsReply(results));
  } catch (err) {
    if (err instanceof GeocodeError) return stay(state, { text: PROMPTS.geocodeFailed, markup: SHARE_LOCATION });
    throw err;
  }
}

function candidateKeyboard(candidateIds: string[], deps: FlowDeps): Reply["markup"] {
  const rows = candidateIds.flatMap((id) => {
    const r = deps.dataset.get(id);
    return r ? [[r.name]] : [];
  });
  return { kind: "keyboard", rows };
}

function resolveSelection(text: string, candidateIds: string[], deps: FlowDeps): string | null {
  const t = text.trim();
  if (!t) return null;
  const lower = t.toLowerCase();
  for (const id of candidateIds) {
    if (deps.dataset.get(id)?.name.toLowerCase() === lower) return id;
  }
  if (/^\d+$/.test(t)) {
    const idx = Number(t);
    if (idx >= 1 && idx <= candidateIds.length) return candidateIds[idx - 1];
  }
  return candidateIds.includes(t) ? t : null;
}

function parseReportedStatus(text: string): RvmStatus {
  const status = parseStatus(text);
  if (!status || status === "Unknown") throw new ValidationError("status", `"${text.trim()}" is not a status`);
  return status;
}

async function advanceReporting(state: ReportingState, input: FlowInput, deps: FlowDeps): Promise<Step> {
  switch (state.awaiting) {
    case "location": {
      if (input.kind !== "location" || !isValidCoordinates(input.coords)) {
        return stay(state, { text: PROMPTS.reportLocationAgain, markup: SHARE_LOCATION });
      }
      const candidates = deps.dataset.nearestK(input.coords, NEAREST_COUNT);
      if (!candidates.length) return done({ text: "Sorry, there are no RVMs in my records yet.", markup: { kind: "remove" } });
      return {
        state: {
          flow: "reporting",
          awaiting: "selection",
          origin: input.coords,
          candidateIds: candidates.map((c) => c.record.id)
        },
        replies: [selectionPromptReply(candidates)]
      };
    }
    case "selection": {
      const text = textOf(input);
      const rvmId = text === null ? null : resolveSelection(text, state.candidateIds, deps);
      if (!rvmId) {
        return stay(state, { text: PROMPTS.selectionAgain, markup: candidateKeyboard(state.candidateIds, deps) });
      }
      const rvm = deps.dataset.get(rvmId);
      if (!rvm) return done({ text: PROMPTS.noLongerAvailable, markup: { kind: "remove" } });
      return {
        state: { ...state, awaiting: "status", rvmId },
        replies: [{ text: `You've selected the RVM at ${rvm.name}. What's the current status?`, markup: STATUS_KEYBOARD }]
      };
    }
    case "status": {
      const text = textOf(input);
      let status: RvmStatus;
      try {
        status = parseReportedStatus(text ?? "");
      } catch (err) {
        if (err instanceof ValidationError) return stay(state, { text: PROMPTS.statusAgain, markup: STATUS_KEYBOARD });
        throw err;
      }

      let updated: RvmRecord;
      try {
        updated = deps.dataset.updateStatus(state.rvmId, status, deps.now?.() ?? new Date());
      } catch (err) {
        if (err instanceof NotFoundError) return done({ text: PROMPTS.noLongerAvailable, markup: { kind: "remove" } });
        throw err;
      }

      const alternatives =
        status === "NotWorking"
          ? deps.dataset
              .nearestK(state.origin, NEAREST_COUNT)
              .filter((r) => r.record.id !== state.rvmId)
              .slice(0, ALTERNATIVE_COUNT)
          : [];
      return done(reportConfirmationReply(updated.name, status, alternatives));
    }
    default:
      return unreachable(state);
  }
}

function advanceReminder(state: ReminderState, input: FlowInput, ctx: FlowContext, deps: FlowDeps): Step {
  const text = (textOf(input) ?? "").trim();
  switch (state.awaiting) {
    case "frequency":
      if (text.toLowerCase() !== "monthly") return stay(state, { text: PROMPTS.frequencyAgain, markup: FREQUENCY_KEYBOARD });
      return {
        state: { flow: "settingReminder", awaiting: "day", frequency: "monthly" },
        replies: [{ text: PROMPTS.day, markup: { kind: "remove" } }]
      };
    case "day": {
      let dayOfMonth: number;
      try {
        dayOfMonth = parseDayOfMonth(text);
      } catch (err) {
        if (err instanceof ValidationError) return stay(state, { text: PROMPTS.dayAgain });
        throw err;
      }
      return {
        state: { flow: "settingReminder", awaiting: "time", frequency: state.frequency, dayOfMonth },
        replies: [{ text: PROMPTS.time }]
      };
    }
    case "time": {
      let time: { hour: number; minute: number };
      try {
        time = parseTimeOfDay(text);
      } catch (err) {
        if (err instanceof ValidationError) return stay(state, { text: PROMPTS.timeAgain });
        throw err;
      }
      const now = deps.now?.() ?? new Date();
      const rem = deps.reminders.upsert(
        {
          userId: ctx.userId,
          chatId: ctx.chatId,
          frequency: state.frequency,
          dayOfMonth: state.dayOfMonth,
          hour: time.hour,
          minute: time.minute
        },
        now.getTime()
      );
      return done({
        text: `Perfect! Your reminder is all set. ${capitalize(reminderSummary(rem))}, you'll receive this message:\n"${REMINDER_TEXT}"`
      });
    }
    default:
      return unreachable(state);
  }
}

function capitalize(s: string): string {
  return s ? `${s[0].toUpperCase()}${s.slice(1)}` : s;
}
