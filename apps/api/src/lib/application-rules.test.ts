import test from "node:test";
import assert from "node:assert/strict";
import { assertCanDecide, assertCanScore, parseStatus, type ApplicationRecord } from "./application-rules.js";
import { isWorkflowError } from "./errors.js";

function record(overrides: Partial<ApplicationRecord>): ApplicationRecord {
  return {
    id: "app_1",
    applicantId: "u1",
    applicantName: null,
    status: "SUBMITTED",
    answers: [],
    reviewerId: null,
    score: null,
    scale: null,
    decision: null,
    reason: null,
    createdAt: "2026-03-01T10:00:00.000Z",
    submittedAt: "2026-03-01T10:05:00.000Z",
    claimedAt: null,
    scoredAt: null,
    decidedAt: null,
    ...overrides,
  };
}

function code(fn: () => void): string | null {
  try {
    fn();
    return null;
  } catch (error) {
    if (isWorkflowError(error)) {
      return error.code;
    }
    throw error;
  }
}

test("deciding reports a missing score before ownership", () => {
  const claimed = record({ status: "CLAIMED", reviewerId: "x" });

  assert.equal(code(() => assertCanDecide(claimed, "y")), "missing_score");
  assert.equal(code(() => assertCanDecide({ ...claimed, status: "SCORED", score: 3, scale: 5 }, "y")), "not_owner");
  assert.equal(code(() => assertCanDecide({ ...claimed, status: "SCORED", score: 3, scale: 5 }, "x")), null);
  assert.equal(code(() => assertCanDecide({ ...claimed, status: "DENIED", score: 3, scale: 5 }, "y")), "already_decided");
});

test("scores must fall within the scale", () => {
  const claimed = record({ status: "CLAIMED", reviewerId: "x" });

  assert.equal(code(() => assertCanScore(claimed, "x", 0, 5)), null);
  assert.equal(code(() => assertCanScore(claimed, "x", 5, 5)), null);
  assert.equal(code(() => assertCanScore(claimed, "x", 5.5, 5)), "invalid_score");
  assert.equal(code(() => assertCanScore(claimed, "x", Number.NaN, 5)), "invalid_score");
  assert.equal(code(() => assertCanScore(claimed, "y", 99, 5)), "not_owner");
});

test("unknown statuses from storage are refused", () => {
  assert.equal(parseStatus("CLAIMED"), "CLAIMED");
  assert.throws(() => parseStatus("ARCHIVED"), /unknown application status: ARCHIVED/);
});
