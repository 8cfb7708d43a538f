/**
 * Notifications Transform Unit Tests
 */
import { describe, expect, test } from "vitest";

import type { PersistentNotification } from "../schema.js";
import {
  buildWahaRequest,
  formatPushText,
  phoneToWhatsAppId,
  removeNotification,
  upsertNotification,
} from "../transform.js";

const note = (id: string, createdAt: number): PersistentNotification => ({
  id,
  title: `Title ${id}`,
  message: `Message ${id}`,
  createdAt,
});

describe("Notifications Transform", () => {
  // ===========================================================================
  // WAHA Request Building
  // ===========================================================================

  describe("buildWahaRequest", () => {
    test("builds request with default session", () => {
      expect(buildWahaRequest("31612345678@c.us", "Hello")).toEqual({
        chatId: "31612345678@c.us",
        text: "Hello",
        session: "default",
      });
    });

    test("uses a custom session", () => {
      expect(buildWahaRequest("x@c.us", "Hi", "home").session).toBe("home");
    });
  });

  describe("phoneToWhatsAppId", () => {
    test.each([
      ["31612345678", "31612345678@c.us"],
      ["+31612345678", "31612345678@c.us"],
      ["+31 6 1234 5678", "31612345678@c.us"],
      ["+31-6-1234-5678", "31612345678@c.us"],
    ])("converts %j", (phone, expected) => {
      expect(phoneToWhatsAppId(phone)).toBe(expected);
    });
  });

  describe("formatPushText", () => {
    test("puts the title in bold above the message", () => {
      expect(formatPushText("AutoLock Failed: Front Door", "Failed to lock x")).toBe(
        "*AutoLock Failed: Front Door*\n\nFailed to lock x",
      );
    });
  });

  // ===========================================================================
  // Persistent Notification List
  // ===========================================================================

  describe("upsertNotification", () => {
    test("adds newest first", () => {
      const list = upsertNotification([note("a", 1)], note("b", 2));

      expect(list.map((n) => n.id)).toEqual(["b", "a"]);
    });

    test("replaces a notification with the same id", () => {
      const list = upsertNotification([note("a", 1), note("b", 2)], note("a", 3));

      expect(list).toEqual([note("a", 3), note("b", 2)]);
    });

    test("does not mutate the input", () => {
      const original = [note("a", 1)];
      upsertNotification(original, note("b", 2));

      expect(original).toEqual([note("a", 1)]);
    });
  });

  describe("removeNotification", () => {
    test("removes by id", () => {
      expect(removeNotification([note("a", 1), note("b", 2)], "a")).toEqual([note("b", 2)]);
    });

    test("leaves the list unchanged for an unknown id", () => {
      expect(removeNotification([note("a", 1)], "zzz")).toEqual([note("a", 1)]);
    });
  });
});
