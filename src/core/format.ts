import { directionsUrl } from "../rvm/geo.js";
import type { RankedRvm, RvmStatus } from "../rvm/types.js";
import type { ReminderRecord } from "../reminders/types.js";
import { formatTimeOfDay } from "../reminders/schedule.js";
import type { Reply, ReplyMarkup } from "../types.js";
import { escapeHtml } from "../utils/text.js";

export const MAIN_KEYBOARD: ReplyMarkup = { kind: "keyboard", rows: [["/find"], ["/report"], ["/set"]] };
export const SHARE_LOCATION: ReplyMarkup = { kind: "requestLocation", label: "Share Location" };
export const STATUS_KEYBOARD: ReplyMarkup = {
  kind: "keyboard",
  rows: [["Working", "Not Working"], ["Full", "Out of Order"], ["Other Issues"]]
};
export const FREQUENCY_KEYBOARD: ReplyMarkup = { kind: "keyboard", rows: [["Monthly"]] };

export const GENERIC_ERROR_TEXT = "An error occurred while processing your request. Please try again later.";

export function statusLabel(status: RvmStatus): string {
  if (status === "Working") return "Working";
  if (status === "NotWorking") return "Not Working";
  return "Unknown";
}

function statusEmoji(status: RvmStatus): string {
  if (status === "Working") return "🟢";
  if (status === "NotWorking") return "🔴";
  return "⚪";
}

export function formatDistance(meters: number): string {
  if (meters < 1000) return `${Math.round(meters)} m`;
  return `${(meters / 1000).toFixed(1)} km`;
}

export function formatRvmEntry(item: RankedRvm): string {
  const r = item.record;
  const lines = [
    `${statusEmoji(r.status)} <b><u>${escapeHtml(r.name)}</u></b> (${formatDistance(item.distanceMeters)})`,
    escapeHtml(r.address)
  ];
  if (r.description.trim()) lines.push(escapeHtml(r.description));
  if (r.hours.trim()) lines.push(`<b>Hours:</b> ${escapeHtml(r.hours)}`);
  lines.push(`<b>Status:</b> ${statusLabel(r.status)}`);
  if (r.nearby.trim() && r.nearby.trim().toLowerCase() !== "none") {
    lines.push(`<b>Nearby bins:</b> ${escapeHtml(r.nearby)}`);
  }
  lines.push(`<b>Get Directions</b>: ${directionsUrl(r)}`);
  return lines.join("\n");
}

export function nearestResultsReply(results: RankedRvm[]): Reply {
  if (!results.length) {
    return { text: "Sorry, there are no RVMs in my records yet.", markup: { kind: "remove" } };
  }
  const heading = results.length === 1 ? "Here is the nearest RVM:" : `Here are the ${results.length} nearest RVMs:`;
  return {
    text: [heading, ...results.map(formatRvmEntry)].join("\n\n"),
    html: true,
    markup: { kind: "remove" }
  };
}

export function selectionPromptReply(candidates: RankedRvm[]): Reply {
  const lines = candidates.map((c, i) => `${i + 1}. ${c.record.name} (${formatDistance(c.distanceMeters)})`);
  return {
    text: [
      `Thanks! Based on your location, here are the ${candidates.length} nearest RVMs:`,
      ...lines,
      "",
      "Which RVM would you like to report on?"
    ].join("\n"),
    markup: { kind: "keyboard", rows: candidates.map((c) => [c.record.name]) }
  };
}

export function reportConfirmationReply(name: string, status: RvmStatus, alternatives: RankedRvm[]): Reply {
  let text = `Thank you for letting us know! The RVM at <u><b>${escapeHtml(name)}</b></u> is currently <u><b>${statusLabel(status)}</b></u>.`;
  if (status === "NotWorking") {
    text += alternatives.length
      ? `\n\nHere are the ${alternatives.length} nearest alternatives:\n\n${alternatives.map(formatRvmEntry).join("\n\n")}`
      : "\n\nThere are no other RVMs nearby in my records.";
  }
  return { text, html: true, markup: { kind: "remove" } };
}

export function formatDateTimeLocal(d: Date): string {
  const pad2 = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ${pad2(d.getHours())}:${pad2(d.getMinutes())}`;
}

export function reminderSummary(rem: Pick<ReminderRecord, "dayOfMonth" | "hour" | "minute">): string {
  const fallback = rem.dayOfMonth > 28 ? " (or the last day of shorter months)" : "";
  return `every month on day ${rem.dayOfMonth}${fallback} at ${formatTimeOfDay(rem)}`;
}

export const WELCOME_TEXT = [
  "<b>Welcome to the RVM Finder!</b>",
  "",
  "I can help you recycle your bottles and cans. What would you like to do?",
  "/find Find the nearest Reverse Vending Machines (RVMs)",
  "/report Report the status of an RVM",
  "/set Set a monthly recycling reminder",
  "/reminder Show your reminder",
  "/unset Remove your reminder",
  "/about About",
  "/cancel Cancel"
].join("\n");

export const ABOUT_TEXT = [
  "Reverse vending machines take back empty plastic drink bottles and aluminium drink cans for recycling.",
  "Under the beverage container return scheme, pre-packaged drinks in bottles and cans carry a refundable deposit that you get back when you return the empty container at a designated return point.",
  "This bot helps you find the nearest machine, check whether it is working and remember to recycle every month."
].join("\n\n");
