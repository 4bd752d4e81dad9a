/**
 * Notifications Module - Transform Tests
 *
 * Unit tests for pure Bot API helpers.
 */
import { describe, expect, it } from "vitest";

import {
  buildSendMessagePayload,
  buildUpdatesQuery,
  chatIdOf,
  methodUrl,
  nextOffset,
  textOf,
} from "../transform.js";

describe("methodUrl", () => {
  it("puts the token in the bot path segment", () => {
    expect(
      methodUrl({ apiUrl: "https://telegram.test/", botToken: "test-token" }, "sendMessage"),
    ).toBe("https://telegram.test/bottest-token/sendMessage");
  });
});

describe("buildSendMessagePayload", () => {
  it("addresses the configured chat", () => {
    expect(buildSendMessagePayload("42", "hello")).toEqual({
      chat_id: "42",
      text: "hello",
    });
  });
});

describe("buildUpdatesQuery", () => {
  it("omits the offset on the first poll", () => {
    expect(buildUpdatesQuery(null, 30)).toEqual({ timeout: "30" });
  });

  it("includes a known offset", () => {
    expect(buildUpdatesQuery(101, 30)).toEqual({ timeout: "30", offset: "101" });
  });
});

describe("update helpers", () => {
  const update = {
    update_id: 7,
    message: { message_id: 1, chat: { id: 42 }, text: "  /status  " },
  };

  it("reads the chat id as a string", () => {
    expect(chatIdOf(update)).toBe("42");
    expect(chatIdOf({ update_id: 8 })).toBeNull();
  });

  it("trims message text", () => {
    expect(textOf(update)).toBe("/status");
    expect(textOf({ update_id: 8 })).toBe("");
  });
});

describe("nextOffset", () => {
  it("acknowledges the highest update id", () => {
    expect(nextOffset([{ update_id: 5 }, { update_id: 9 }, { update_id: 7 }], null)).toBe(10);
  });

  it("keeps the current offset for an empty batch", () => {
    expect(nextOffset([], 12)).toBe(12);
  });
});
