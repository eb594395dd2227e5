import test from "node:test";
import assert from "node:assert/strict";
import { hmacSha256Hex } from "../lib/hmac.js";
import { buildTestApp, INTERACTIONS_SECRET } from "../test-support.js";

const ada = { id: "u1", displayName: "Ada" };

test("two-question interview ends with one summary and a review card", async () => {
  const { app, transport, post } = await buildTestApp({ questions: ["Why?", "When?"] });

  try {
    const started = await post("/commands", { command: "apply", actor: ada });
    assert.equal(started.statusCode, 201);
    const { applicationId, notice } = started.json();
    assert.match(applicationId, /^app_\d{14}_[0-9a-f]{6}$/);
    assert.equal(notice, "Check your DMs to start the application.");

    const welcome = transport.get("m1");
    assert.equal(welcome?.conversationId, "dm:u1");
    assert.equal(welcome?.content.title, "Staff Application");
    assert.deepEqual(welcome?.content.fields, [{ name: "Application ID", value: applicationId }]);

    const firstPrompt = transport.get("m2");
    assert.equal(firstPrompt?.conversationId, "dm:u1");
    assert.equal(firstPrompt?.content.title, "Question 1 of 2");
    assert.equal(firstPrompt?.content.description, "Why?");

    const first = await post("/messages", { actor: ada, text: "  Because  " });
    assert.deepEqual(first.json(), { status: "answered", applicationId, nextIndex: 1 });
    assert.equal(transport.get("m3")?.content.title, "Question 2 of 2");

    const second = await post("/messages", { actor: ada, text: "Now" });
    assert.deepEqual(second.json(), { status: "submitted", applicationId });

    for (const messageId of ["m1", "m2", "m3"]) {
      assert.equal(transport.get(messageId)?.deleted, true);
    }

    const dm = transport.live("dm:u1");
    assert.equal(dm.length, 1);
    assert.equal(dm[0].messageId, "m4");
    assert.equal(dm[0].content.title, "Application Submitted");
    assert.deepEqual(dm[0].content.fields, [{ name: "Application ID", value: applicationId }]);

    const staff = transport.live("channel:staff");
    assert.equal(staff.length, 1);
    assert.equal(staff[0].content.title, "New Staff Application");
    assert.deepEqual(
      staff[0].content.actions?.map((action) => action.id),
      [`pick:${applicationId}`, `view:${applicationId}`],
    );
    assert.deepEqual(staff[0].content.fields?.[0], { name: "Applicant", value: "Ada (u1)" });
    assert.deepEqual(staff[0].content.fields?.[3], {
      name: "Transcript Preview",
      value: "Q: Why?\nA: Because\n\nQ: When?\nA: Now\n",
    });
  } finally {
    await app.close();
  }
});

test("messages outside an interview are ignored", async () => {
  const { app, transport, post } = await buildTestApp({ questions: ["Only?"] });

  try {
    const before = await post("/messages", { actor: ada, text: "hello?" });
    assert.deepEqual(before.json(), { status: "ignored" });

    await post("/commands", { command: "apply", actor: ada });
    await post("/messages", { actor: ada, text: "yes" });

    const stray = await post("/messages", { actor: ada, text: "one more thing" });
    assert.deepEqual(stray.json(), { status: "ignored" });
    assert.equal(transport.history("dm:u1").length, 3);
  } finally {
    await app.close();
  }
});

test("apply is rejected during the cooldown, then by the active application", async () => {
  let now = new Date("2026-03-01T10:00:00.000Z");
  const { app, post } = await buildTestApp({ cooldownSeconds: 300 }, () => now);

  try {
    const first = await post("/commands", { command: "apply", actor: ada });
    assert.equal(first.statusCode, 201);

    now = new Date("2026-03-01T10:01:00.000Z");
    const cooling = await post("/commands", { command: "apply", actor: ada });
    assert.equal(cooling.statusCode, 429);
    assert.deepEqual(cooling.json(), {
      error: "cooldown_active",
      notice: "Please wait 240s before starting another application.",
      retryAfterSeconds: 240,
    });

    now = new Date("2026-03-01T10:05:01.000Z");
    const duplicate = await post("/commands", { command: "apply", actor: ada });
    assert.equal(duplicate.statusCode, 409);
    assert.deepEqual(duplicate.json(), {
      error: "duplicate_active_application",
      notice: "You already have an application in progress.",
    });
  } finally {
    await app.close();
  }
});

test("apply still starts the application when the first prompt cannot be sent", async () => {
  const { app, transport, applications, post } = await buildTestApp();
  transport.failOn("send");

  try {
    const response = await post("/commands", { command: "apply", actor: ada });

    assert.equal(response.statusCode, 201);
    assert.equal(response.json().notice, "Couldn't DM you. Enable DMs and try again.");
    assert.equal((await applications.findByApplicant("u1"))?.status, "IN_PROGRESS");
  } finally {
    await app.close();
  }
});

test("unsigned and malformed interactions are rejected", async () => {
  const { app, post } = await buildTestApp();

  try {
    const unsigned = await app.inject({
      method: "POST",
      url: "/commands",
      headers: { "content-type": "application/json", "x-signature": "00ff" },
      payload: JSON.stringify({ command: "apply", actor: ada }),
    });
    assert.equal(unsigned.statusCode, 401);
    assert.deepEqual(unsigned.json(), { error: "invalid_signature" });

    const payload = JSON.stringify({ command: "apply", actor: ada });
    const padded = await app.inject({
      method: "POST",
      url: "/commands",
      headers: {
        "content-type": "application/json",
        "x-signature": `${hmacSha256Hex(INTERACTIONS_SECRET, payload)}zz`,
      },
      payload,
    });
    assert.equal(padded.statusCode, 401);

    const unknown = await post("/commands", { command: "resign", actor: ada });
    assert.equal(unknown.statusCode, 400);
    assert.equal(unknown.json().error, "validation_error");
  } finally {
    await app.close();
  }
});

test("transcript and results are sent only to the applicant or a reviewer", async () => {
  const { app, transport, post } = await buildTestApp({ questions: ["Why?"], reviewerRoleId: "staff" });

  try {
    const started = await post("/commands", { command: "apply", actor: ada });
    const { applicationId } = started.json();
    await post("/messages", { actor: ada, text: "Because" });

    const own = await post("/commands", { command: "view-transcript", actor: ada, applicationId });
    assert.deepEqual(own.json(), { status: "sent", notice: "Sent transcript to your DMs." });
    const transcript = transport.live("dm:u1").at(-1);
    assert.equal(transcript?.content.title, `Transcript ${applicationId}`);
    assert.equal(transcript?.content.description, "```\nQ: Why?\nA: Because\n\n```");

    const stranger = await post("/commands", {
      command: "confirm-results",
      actor: { id: "u2" },
      applicationId,
    });
    assert.equal(stranger.statusCode, 403);
    assert.equal(stranger.json().error, "not_authorized");

    const reviewer = await post("/commands", {
      command: "confirm-results",
      actor: { id: "r1", roleIds: ["staff"] },
      applicationId,
    });
    assert.deepEqual(reviewer.json(), { status: "sent", notice: "Sent you a DM with the application summary." });
    assert.equal(transport.live("dm:r1")[0].content.title, `Application ${applicationId}`);

    const missing = await post("/commands", { command: "view-transcript", actor: ada, applicationId: "app_missing" });
    assert.equal(missing.statusCode, 404);
  } finally {
    await app.close();
  }
});
