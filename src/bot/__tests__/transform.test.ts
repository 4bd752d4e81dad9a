/**
 * Bot Module - Transform Tests
 *
 * Unit tests for command parsing and dispatch.
 */
import { describe, expect, it } from "vitest";

import { INITIAL_BOT_STATE } from "../../store/schema.js";
import {
  decideCommand,
  formatBotStatus,
  parseCommand,
  parseWatts,
  routeText,
} from "../transform.js";

describe("parseCommand", () => {
  it("splits name and argument", () => {
    expect(parseCommand("/threshold 1500")).toEqual({ name: "threshold", arg: "1500" });
  });

  it("strips the bot name suffix and lowercases", () => {
    expect(parseCommand("/Status@EnergyBot")).toEqual({ name: "status", arg: "" });
  });

  it("keeps everything after the first word as the argument", () => {
    expect(parseCommand("  /report   off now ")).toEqual({ name: "report", arg: "off now" });
  });
});

describe("routeText", () => {
  it("passes commands through", () => {
    expect(routeText("/help", "threshold")).toBe("/help");
  });

  it("completes a pending command", () => {
    expect(routeText("1500", "threshold")).toBe("/threshold 1500");
  });

  it("ignores plain text without a pending command", () => {
    expect(routeText("hello", null)).toBeNull();
  });
});

describe("parseWatts", () => {
  it("accepts whole positive numbers", () => {
    expect(parseWatts("1500")).toBe(1500);
  });

  it("rejects everything else", () => {
    expect(parseWatts("15.5")).toBeNull();
    expect(parseWatts("0")).toBeNull();
    expect(parseWatts("-3")).toBeNull();
    expect(parseWatts("lots")).toBeNull();
  });
});

describe("decideCommand", () => {
  it("asks for a missing threshold and marks it pending", () => {
    expect(decideCommand({ name: "threshold", arg: "" }, INITIAL_BOT_STATE)).toEqual({
      kind: "reply",
      text: "Enter threshold in watts:",
      state: { ...INITIAL_BOT_STATE, pendingCommand: "threshold" },
      updates: null,
    });
  });

  it("sets the alert threshold", () => {
    const action = decideCommand(
      { name: "threshold", arg: "1500" },
      { ...INITIAL_BOT_STATE, pendingCommand: "threshold" },
    );

    expect(action).toEqual({
      kind: "reply",
      text: "Alert threshold set to 1500W",
      state: INITIAL_BOT_STATE,
      updates: { ALERT_THRESHOLD_WATTS: "1500" },
    });
  });

  it("rejects a bad threshold", () => {
    const action = decideCommand({ name: "threshold", arg: "abc" }, INITIAL_BOT_STATE);

    expect(action.kind === "reply" && action.text).toBe(
      "Invalid number. Usage: /threshold <watts>",
    );
  });

  it("disables demand reporting", () => {
    const action = decideCommand({ name: "report", arg: "OFF" }, INITIAL_BOT_STATE);

    expect(action.kind === "reply" && action.updates).toEqual({ REPORT_DEMAND: "false" });
  });

  it("enables demand reporting at a threshold", () => {
    const action = decideCommand({ name: "report", arg: "2500" }, INITIAL_BOT_STATE);

    expect(action).toEqual({
      kind: "reply",
      text: "Demand reporting enabled at 2500W threshold",
      state: INITIAL_BOT_STATE,
      updates: { REPORT_DEMAND_THRESHOLD_WATTS: "2500", REPORT_DEMAND: "true" },
    });
  });

  it("mutes and unmutes", () => {
    const muted = decideCommand({ name: "mute", arg: "" }, INITIAL_BOT_STATE);
    expect(muted.state.muted).toBe(true);

    const resumed = decideCommand({ name: "unmute", arg: "" }, muted.state);
    expect(resumed.state.muted).toBe(false);
    expect(resumed.kind === "reply" && resumed.text).toBe("Notifications resumed");
  });

  it("clears a pending command on any other command", () => {
    const action = decideCommand(
      { name: "help", arg: "" },
      { ...INITIAL_BOT_STATE, pendingCommand: "report" },
    );

    expect(action.state.pendingCommand).toBeNull();
  });

  it("routes status to the status action", () => {
    expect(decideCommand({ name: "status", arg: "" }, INITIAL_BOT_STATE).kind).toBe("status");
  });

  it("answers unknown commands with a hint", () => {
    const action = decideCommand({ name: "start", arg: "" }, INITIAL_BOT_STATE);

    expect(action.kind === "reply" && action.text).toBe(
      "Unknown command. Send /help for usage.",
    );
  });
});

describe("formatBotStatus", () => {
  const view = { demandThresholdWatts: 1000, reportDemand: false, reportThresholdWatts: 2000 };

  it("lists the settings", () => {
    expect(formatBotStatus(view, true, null)).toBe(
      [
        "Current config:",
        "  Alert threshold: 1000W",
        "  Report demand: off",
        "  Report threshold: 2000W",
        "  Muted: yes",
      ].join("\n"),
    );
  });

  it("appends live demand when known", () => {
    const text = formatBotStatus(view, false, {
      demandWatts: 850.4,
      readAt: "2024-01-01T12:04:30.000Z",
    });

    expect(text.split("\n").at(-1)).toBe("  Live demand: 850W at 2024-01-01T12:04");
  });
});
