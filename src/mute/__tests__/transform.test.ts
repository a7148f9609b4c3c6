/**
 * Mute Transform Tests
 */
import { describe, expect, test } from "vitest";

import { INITIAL_MUTE_STATE } from "../schema.js";
import {
  formatDeadline,
  isMuteStateClean,
  isMuteStateConsistent,
  toMuteStatus,
} from "../transform.js";

describe("formatDeadline", () => {
  test("renders UTC with second precision", () => {
    expect(formatDeadline(Date.UTC(2025, 2, 1, 12, 10, 0, 250))).toBe(
      "2025-03-01T12:10:00Z",
    );
  });

  test("returns null without a deadline", () => {
    expect(formatDeadline(null)).toBeNull();
  });
});

describe("mute state predicates", () => {
  test("initial state is clean and consistent", () => {
    expect(isMuteStateClean(INITIAL_MUTE_STATE)).toBe(true);
    expect(isMuteStateConsistent(INITIAL_MUTE_STATE)).toBe(true);
    expect(toMuteStatus(INITIAL_MUTE_STATE)).toEqual({
      muted: false,
      expiresAt: null,
    });
  });

  test("muted without a timer is inconsistent", () => {
    const state = { muted: true, deadline: 1000, timerActive: false };

    expect(isMuteStateConsistent(state)).toBe(false);
    expect(isMuteStateClean(state)).toBe(false);
  });
});
