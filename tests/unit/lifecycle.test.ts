import {
  NON_TERMINAL_STATES,
  TERMINAL_STATES,
  canTransition,
  isTerminal,
} from "../../src/types/lifecycle";

describe("job lifecycle", () => {
  test("terminal states have no way out", () => {
    for (const state of TERMINAL_STATES) {
      expect(isTerminal(state)).toBe(true);
      for (const next of [...NON_TERMINAL_STATES, ...TERMINAL_STATES]) {
        expect(canTransition(state, next)).toBe(false);
      }
    }
  });

  test("non-terminal states can always fail or be cancelled", () => {
    for (const state of NON_TERMINAL_STATES) {
      expect(isTerminal(state)).toBe(false);
      expect(canTransition(state, "failed")).toBe(true);
      expect(canTransition(state, "cancelled")).toBe(true);
    }
  });

  test("happy path is strictly sequential", () => {
    expect(canTransition("queued", "building")).toBe(true);
    expect(canTransition("building", "starting")).toBe(true);
    expect(canTransition("starting", "health_checking")).toBe(true);
    expect(canTransition("health_checking", "succeeded")).toBe(true);

    expect(canTransition("queued", "starting")).toBe(false);
    expect(canTransition("building", "succeeded")).toBe(false);
    expect(canTransition("starting", "building")).toBe(false);
    expect(canTransition("queued", "queued")).toBe(false);
  });
});
