import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { IllegalTransitionError } from "../src/errors";
import {
  SYNC_STATUSES,
  assertTransition,
  canTransition,
  isInFlight,
  isSyncStatus,
  isTerminal
} from "../src/sync/stateMachine";

const status = fc.constantFrom(...SYNC_STATUSES);

describe("canTransition", () => {
  it("follows the happy path", () => {
    expect(canTransition("pending", "in_progress")).toBe(true);
    expect(canTransition("in_progress", "cloning")).toBe(true);
    expect(canTransition("cloning", "completed")).toBe(true);
  });

  it("allows failure and reopening edges", () => {
    expect(canTransition("in_progress", "failed")).toBe(true);
    expect(canTransition("cloning", "permanent_failure")).toBe(true);
    expect(canTransition("failed", "pending")).toBe(true);
    expect(canTransition("failed", "permanent_failure")).toBe(true);
  });

  it("forbids skipping steps", () => {
    expect(canTransition("pending", "cloning")).toBe(false);
    expect(canTransition("pending", "completed")).toBe(false);
    expect(canTransition("failed", "in_progress")).toBe(false);
    expect(canTransition("cloning", "cloning")).toBe(false);
  });

  it("never leaves a terminal status", () => {
    fc.assert(
      fc.property(status, status, (from, to) => !isTerminal(from) || !canTransition(from, to))
    );
  });

  it("only reaches completed from cloning", () => {
    fc.assert(
      fc.property(status, (from) => canTransition(from, "completed") === (from === "cloning"))
    );
  });

  it("never moves an in-flight record back to pending", () => {
    fc.assert(
      fc.property(status, (from) => !(isInFlight(from) && canTransition(from, "pending")))
    );
  });

  it("keeps every random walk inside the transition table", () => {
    fc.assert(
      fc.property(fc.array(fc.nat({ max: 100 }), { maxLength: 25 }), (choices) => {
        let current: (typeof SYNC_STATUSES)[number] = "pending";

        for (const choice of choices) {
          const options = SYNC_STATUSES.filter((next) => canTransition(current, next));
          if (options.length === 0) {
            return isTerminal(current);
          }

          const next: (typeof SYNC_STATUSES)[number] = options[choice % options.length] ?? current;
          assertTransition(current, next);
          current = next;
        }

        return true;
      })
    );
  });
});

describe("assertTransition", () => {
  it("throws for an illegal edge", () => {
    expect(() => assertTransition("completed", "pending")).toThrow(IllegalTransitionError);
    expect(() => assertTransition("completed", "pending")).toThrow(
      "Illegal sync status transition completed -> pending"
    );
  });
});

describe("status helpers", () => {
  it("classifies statuses", () => {
    expect(SYNC_STATUSES.filter(isTerminal)).toEqual(["completed", "permanent_failure"]);
    expect(SYNC_STATUSES.filter(isInFlight)).toEqual(["pending", "in_progress", "cloning"]);
    expect(isSyncStatus("cloning")).toBe(true);
    expect(isSyncStatus("done")).toBe(false);
    expect(isSyncStatus(3)).toBe(false);
  });
});
