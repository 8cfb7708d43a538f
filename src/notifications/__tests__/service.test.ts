/**
 * Notifications Service Integration Tests
 *
 * Tests Notification service with mocked WAHA API.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock config before importing service
vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
  getNotificationConfig: vi.fn(() => ({
    serverUrl: "http://waha.test",
    apiKey: "test-api-key",
    phoneNumber: "31612345678",
    timeoutMs: 10000,
  })),
}));

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { getNotificationConfig } from "../../config.js";
// Import after mocks
import {
  clearNotifications,
  createPersistentNotification,
  deliverNotification,
  dismissNotification,
  listNotifications,
  sendNotification,
  sendWhatsAppMessage,
} from "../service.js";

const DEFAULT_WAHA = {
  serverUrl: "http://waha.test",
  apiKey: "test-api-key",
  phoneNumber: "31612345678",
  timeoutMs: 10000,
};

function stubFetchOk() {
  const fetchMock = vi.fn().mockResolvedValue({
    ok: true,
    json: () => Promise.resolve({ id: "msg-1" }),
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof vi.fn>): { chatId: string; text: string } {
  const init: unknown = fetchMock.mock.calls[0]?.[1];
  if (typeof init !== "object" || init === null || !("body" in init)) {
    throw new Error("fetch was not called with a body");
  }
  return JSON.parse(String(init.body));
}

describe("Notifications Service", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(getNotificationConfig).mockReturnValue(DEFAULT_WAHA);
    clearNotifications();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ===========================================================================
  // sendWhatsAppMessage
  // ===========================================================================

  describe("sendWhatsAppMessage", () => {
    test("sends message to WAHA API with correct format", async () => {
      const fetchMock = stubFetchOk();

      const result = await sendWhatsAppMessage("Test message");

      expect(result.isOk()).toBe(true);
      expect(fetchMock).toHaveBeenCalledWith(
        "http://waha.test/api/sendText",
        expect.objectContaining({
          method: "POST",
          headers: expect.objectContaining({
            "Content-Type": "application/json",
            "X-API-Key": "test-api-key",
          }),
        }),
      );
      expect(sentBody(fetchMock)).toEqual({
        chatId: "31612345678@c.us",
        text: "Test message",
        session: "default",
      });
    });

    test("sends to an explicit recipient", async () => {
      const fetchMock = stubFetchOk();

      await sendWhatsAppMessage("Hi", "+44 7000 000000");

      expect(sentBody(fetchMock).chatId).toBe("447000000000@c.us");
    });

    test("omits the API key header when none is configured", async () => {
      vi.mocked(getNotificationConfig).mockReturnValue({ ...DEFAULT_WAHA, apiKey: undefined });
      const fetchMock = stubFetchOk();

      await sendWhatsAppMessage("Hi");

      const init: unknown = fetchMock.mock.calls[0]?.[1];
      expect(init).toMatchObject({
        headers: { Accept: "application/json", "Content-Type": "application/json" },
      });
      expect(JSON.stringify(init)).not.toContain("X-API-Key");
    });

    test("returns NOT_CONFIGURED when WAHA is not configured", async () => {
      vi.mocked(getNotificationConfig).mockReturnValue(null);

      const result = await sendWhatsAppMessage("Test message");

      expect(result._unsafeUnwrapErr().type).toBe("NOT_CONFIGURED");
    });

    test("returns NOT_CONFIGURED without any recipient", async () => {
      vi.mocked(getNotificationConfig).mockReturnValue({
        ...DEFAULT_WAHA,
        phoneNumber: undefined,
      });

      const result = await sendWhatsAppMessage("Test message");

      expect(result._unsafeUnwrapErr().type).toBe("NOT_CONFIGURED");
    });

    test("returns SEND_FAILED when WAHA API returns error", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue({
          ok: false,
          status: 422,
          text: () => Promise.resolve("Session is STOPPED"),
        }),
      );

      const result = await sendWhatsAppMessage("Test message");

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SEND_FAILED",
        message: "WAHA API returned 422: Session is STOPPED",
        statusCode: 422,
      });
    });

    test("returns NETWORK_ERROR when fetch throws", async () => {
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("ECONNREFUSED")));

      const result = await sendWhatsAppMessage("Test message");

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "NETWORK_ERROR",
        message: "ECONNREFUSED",
      });
    });
  });

  // ===========================================================================
  // Persistent Notifications
  // ===========================================================================

  describe("persistent notifications", () => {
    test("replaces a notification with the same id", () => {
      createPersistentNotification(
        { title: "First", message: "one", persistentId: "autolock_front_failure" },
        1000,
      );
      createPersistentNotification(
        { title: "Second", message: "two", persistentId: "autolock_front_failure" },
        2000,
      );

      expect(listNotifications()).toEqual([
        { id: "autolock_front_failure", title: "Second", message: "two", createdAt: 2000 },
      ]);
    });

    test("generates an id when none is given", () => {
      const created = createPersistentNotification({ title: "T", message: "M" }, 5000);

      expect(created.id).toBe("notification_5000_1");
    });

    test("dismisses by id", () => {
      createPersistentNotification({ title: "T", message: "M", persistentId: "a" });

      expect(dismissNotification("a")).toBe(true);
      expect(dismissNotification("a")).toBe(false);
      expect(listNotifications()).toEqual([]);
    });
  });

  // ===========================================================================
  // sendNotification
  // ===========================================================================

  describe("sendNotification", () => {
    const request = {
      title: "AutoLock Failed: Front Door",
      message: "Failed to lock locks/front: Lock call failed: offline",
      persistentId: "autolock_front_failure",
    };

    test("delivers on both channels", async () => {
      const fetchMock = stubFetchOk();

      const report = await deliverNotification(request);

      expect(report).toEqual({ persistent: true, push: true });
      expect(sentBody(fetchMock).text).toBe(
        "*AutoLock Failed: Front Door*\n\nFailed to lock locks/front: Lock call failed: offline",
      );
      expect(listNotifications().map((n) => n.id)).toEqual(["autolock_front_failure"]);
    });

    test("uses the request's push target", async () => {
      const fetchMock = stubFetchOk();

      await sendNotification({ ...request, pushTarget: "+31 600000001" });

      expect(sentBody(fetchMock).chatId).toBe("31600000001@c.us");
    });

    test("reports success when only the persistent channel worked", async () => {
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("timeout")));

      await expect(sendNotification(request)).resolves.toBe(true);
      expect(listNotifications()).toHaveLength(1);
    });

    test("never rejects", async () => {
      vi.mocked(getNotificationConfig).mockImplementation(() => {
        throw new Error("boom");
      });

      await expect(sendNotification(request)).resolves.toBe(false);
    });
  });
});
