/**
 * MQTT Transform Unit Tests
 */
import { describe, expect, it } from "vitest";

import { INITIAL_OBSERVED_STATE } from "../schema.js";
import {
  buildTopicRoutes,
  commandTopic,
  normalizeLockState,
  parseDoorSensorMessage,
  parseLockMessage,
  routeMessage,
} from "../transform.js";

// =============================================================================
// parseLockMessage Tests
// =============================================================================

describe("parseLockMessage", () => {
  it("parses a lock_state report", () => {
    expect(parseLockMessage(JSON.stringify({ lock_state: "locked", battery: 80 }))).toBe(
      "locked",
    );
  });

  it("prefers lock_state over state", () => {
    const payload = JSON.stringify({ lock_state: "not_fully_locked", state: "LOCK" });

    expect(parseLockMessage(payload)).toBe("jammed");
  });

  it("parses a command-style state", () => {
    expect(parseLockMessage(JSON.stringify({ state: "UNLOCK" }))).toBe("unlocked");
  });

  it.each([
    ["locked", "locked"],
    ["UNLOCKED", "unlocked"],
    [" jammed ", "jammed"],
    ['"locked"', "locked"],
  ])("parses plain payload %j", (payload, expected) => {
    expect(parseLockMessage(payload)).toBe(expected);
  });

  it("handles Buffer payload", () => {
    expect(parseLockMessage(Buffer.from('{"lock_state":"unlocked"}'))).toBe("unlocked");
  });

  it("maps unrecognized lock_state values to unknown", () => {
    expect(parseLockMessage(JSON.stringify({ lock_state: "opening" }))).toBe("unknown");
  });

  it.each(["", "garbage", '{"battery": 80}', "42", "[1,2]"])(
    "returns null for %j",
    (payload) => {
      expect(parseLockMessage(payload)).toBeNull();
    },
  );

  it("returns null for non-text payloads", () => {
    expect(parseLockMessage(42)).toBeNull();
  });
});

describe("normalizeLockState", () => {
  it.each([
    ["LOCK", "locked"],
    ["unlock", "unlocked"],
    ["not_fully_locked", "jammed"],
    ["moving", "unknown"],
  ])("maps %s to %s", (value, expected) => {
    expect(normalizeLockState(value)).toBe(expected);
  });
});

// =============================================================================
// parseDoorSensorMessage Tests
// =============================================================================

describe("parseDoorSensorMessage", () => {
  it("reads contact true as closed", () => {
    expect(parseDoorSensorMessage(JSON.stringify({ contact: true, battery: 100 }))).toBe(true);
  });

  it("reads contact false as open", () => {
    expect(parseDoorSensorMessage(JSON.stringify({ contact: false }))).toBe(false);
  });

  it("reads Window 1 as open and 0 as closed", () => {
    expect(parseDoorSensorMessage(JSON.stringify({ Window: 1, Battery: 95 }))).toBe(false);
    expect(parseDoorSensorMessage(JSON.stringify({ Window: 0 }))).toBe(true);
  });

  it.each([
    ["closed", true],
    ["OPEN", false],
    ['"closed"', true],
  ])("parses plain payload %j", (payload, expected) => {
    expect(parseDoorSensorMessage(payload)).toBe(expected);
  });

  it.each(["", "ajar", '{"contact": "yes"}'])("returns null for %j", (payload) => {
    expect(parseDoorSensorMessage(payload)).toBeNull();
  });
});

// =============================================================================
// Routing Tests
// =============================================================================

describe("buildTopicRoutes", () => {
  it("maps lock and sensor topics to their door", () => {
    const routes = buildTopicRoutes([
      { doorId: "front", lockRef: "locks/front", sensorRef: "contacts/front" },
      { doorId: "back", lockRef: "locks/back" },
    ]);

    expect([...routes.entries()]).toEqual([
      ["locks/front", { doorId: "front", kind: "lock" }],
      ["contacts/front", { doorId: "front", kind: "sensor" }],
      ["locks/back", { doorId: "back", kind: "lock" }],
    ]);
  });
});

describe("routeMessage", () => {
  const lockRoute = { doorId: "front", kind: "lock" } as const;
  const sensorRoute = { doorId: "front", kind: "sensor" } as const;

  it("emits a lock event for a new value", () => {
    const routed = routeMessage(INITIAL_OBSERVED_STATE, lockRoute, "unlocked");

    expect(routed.event).toEqual({ type: "LOCK_STATE", state: "unlocked" });
    expect(routed.state.locks).toEqual({ front: "unlocked" });
  });

  it("suppresses a repeated value", () => {
    const first = routeMessage(INITIAL_OBSERVED_STATE, sensorRoute, '{"contact":true}');
    const second = routeMessage(first.state, sensorRoute, '{"contact":true}');

    expect(first.event).toEqual({ type: "DOOR_SENSOR", closed: true });
    expect(second.event).toBeNull();
    expect(second.state).toBe(first.state);
  });

  it("emits again once the value changes", () => {
    const closed = routeMessage(INITIAL_OBSERVED_STATE, sensorRoute, "closed");
    const opened = routeMessage(closed.state, sensorRoute, "open");

    expect(opened.event).toEqual({ type: "DOOR_SENSOR", closed: false });
    expect(opened.state.doors).toEqual({ front: false });
  });

  it("ignores unparseable payloads", () => {
    const routed = routeMessage(INITIAL_OBSERVED_STATE, lockRoute, "???");

    expect(routed).toEqual({ state: INITIAL_OBSERVED_STATE, event: null });
  });
});

describe("commandTopic", () => {
  it("appends the suffix", () => {
    expect(commandTopic("zigbee2mqtt/front_lock", "/set")).toBe("zigbee2mqtt/front_lock/set");
  });
});
