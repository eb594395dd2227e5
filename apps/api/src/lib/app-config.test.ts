import test from "node:test";
import assert from "node:assert/strict";
import { fileURLToPath } from "node:url";
import { ZodError } from "zod";
import { loadApplicationConfig, parseApplicationConfig } from "./app-config.js";

test("defaults fill everything but the staff channel", () => {
  const config = parseApplicationConfig({ staffChannelId: "staff" });

  assert.deepEqual(config.questions, ["Question 1?", "Question 2?", "Question 3?", "Question 4?", "Question 5?"]);
  assert.equal(config.cooldownSeconds, 300);
  assert.deepEqual(config.scoreScales, [5, 10, 50, 100]);
  assert.equal(config.reviewerRoleId, null);
  assert.match(config.templates.approved, /\{reason\}/);
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.questions));
});

test("invalid settings are rejected", () => {
  assert.throws(() => parseApplicationConfig({}), ZodError);
  assert.throws(() => parseApplicationConfig({ staffChannelId: "staff", questions: [] }), ZodError);
  assert.throws(() => parseApplicationConfig({ staffChannelId: "staff", scoreScales: [0] }), ZodError);
  assert.throws(() => parseApplicationConfig({ staffChannelId: "staff", cooldownSeconds: -1 }), ZodError);
});

test("the bundled settings file loads", async () => {
  const path = fileURLToPath(new URL("../../config/application.json", import.meta.url));
  const config = await loadApplicationConfig(path);

  assert.equal(config.questions.length, 5);
  assert.equal(config.staffChannelId, "staff-applications");
});
