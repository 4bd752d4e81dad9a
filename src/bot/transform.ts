/**
 * Bot Module - Pure Transformations
 *
 * Command parsing, pending-argument resolution and reply text.
 * No side effects, no I/O - just data in, data out.
 */
import type { LiveDemand } from "../energy-api/index.js";
import type { BotState, PendingCommand } from "../store/index.js";
import type { BotAlertView, CommandAction, ParsedCommand } from "./schema.js";

// =============================================================================
// Parsing
// =============================================================================

/**
 * Split a slash command into its name and argument.
 * Drops the leading slash and any @botname suffix.
 */
export function parseCommand(text: string): ParsedCommand {
  const trimmed = text.trim();
  const head = trimmed.split(/\s+/, 1)[0] ?? "";
  const arg = trimmed.slice(head.length).trim();
  const name = (head.split("@")[0] ?? "").replace(/^\//, "").toLowerCase();
  return { name, arg };
}

/**
 * Plain text answers a pending command; otherwise it is ignored.
 *
 * @example
 * routeText("1500", "threshold") // "/threshold 1500"
 * routeText("hello", null)       // null
 */
export function routeText(text: string, pending: PendingCommand | null): string | null {
  if (text.startsWith("/")) {
    return text;
  }
  return pending === null ? null : `/${pending} ${text}`;
}

/**
 * Whole positive watts, e.g. "1500". Returns null otherwise.
 */
export function parseWatts(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const watts = Number.parseInt(value, 10);
  return watts > 0 ? watts : null;
}

// =============================================================================
// Dispatch
// =============================================================================

const HELP_TEXT = [
  "Available commands:",
  "  /threshold <watts> - set alert threshold",
  "  /report <watts|off> - set demand report threshold or disable",
  "  /mute - silence all notifications",
  "  /unmute - resume notifications",
  "  /status - show current config + live demand",
  "  /help - show this message",
].join("\n");

function reply(text: string, state: BotState): CommandAction {
  return { kind: "reply", text, state, updates: null };
}

/**
 * Decide what a command does. Every command clears a pending one;
 * a command that lacks its argument sets itself pending instead.
 */
export function decideCommand(command: ParsedCommand, state: BotState): CommandAction {
  const cleared: BotState = { ...state, pendingCommand: null };

  switch (command.name) {
    case "threshold": {
      if (command.arg === "") {
        return reply("Enter threshold in watts:", { ...cleared, pendingCommand: "threshold" });
      }
      const watts = parseWatts(command.arg);
      if (watts === null) {
        return reply("Invalid number. Usage: /threshold <watts>", cleared);
      }
      return {
        kind: "reply",
        text: `Alert threshold set to ${watts}W`,
        state: cleared,
        updates: { ALERT_THRESHOLD_WATTS: String(watts) },
      };
    }

    case "report": {
      if (command.arg === "") {
        return reply("Enter threshold in watts (or 'off'):", {
          ...cleared,
          pendingCommand: "report",
        });
      }
      if (command.arg.toLowerCase() === "off") {
        return {
          kind: "reply",
          text: "Demand reporting disabled",
          state: cleared,
          updates: { REPORT_DEMAND: "false" },
        };
      }
      const watts = parseWatts(command.arg);
      if (watts === null) {
        return reply("Invalid value. Usage: /report <watts|off>", cleared);
      }
      return {
        kind: "reply",
        text: `Demand reporting enabled at ${watts}W threshold`,
        state: cleared,
        updates: {
          REPORT_DEMAND_THRESHOLD_WATTS: String(watts),
          REPORT_DEMAND: "true",
        },
      };
    }

    case "mute":
      return reply("Notifications muted", { ...cleared, muted: true });

    case "unmute":
      return reply("Notifications resumed", { ...cleared, muted: false });

    case "status":
      return { kind: "status", state: cleared };

    case "help":
      return reply(HELP_TEXT, cleared);

    default:
      return reply("Unknown command. Send /help for usage.", cleared);
  }
}

// =============================================================================
// Status
// =============================================================================

export function formatBotStatus(
  view: BotAlertView,
  muted: boolean,
  demand: LiveDemand | null,
): string {
  const lines = [
    "Current config:",
    `  Alert threshold: ${view.demandThresholdWatts.toFixed(0)}W`,
    `  Report demand: ${view.reportDemand ? "on" : "off"}`,
    `  Report threshold: ${view.reportThresholdWatts.toFixed(0)}W`,
    `  Muted: ${muted ? "yes" : "no"}`,
  ];
  if (demand !== null) {
    lines.push(
      `  Live demand: ${demand.demandWatts.toFixed(0)}W at ${demand.readAt.slice(0, 16)}`,
    );
  }
  return lines.join("\n");
}
