import test from "node:test";
import assert from "node:assert/strict";
import type { GatewayEnvelope } from "@staff-desk/contracts";
import { GatewayTransport } from "./gateway-transport.js";
import { hmacSha256Hex } from "./hmac.js";

interface CapturedRequest {
  url: string;
  headers: Headers;
  body: string;
}

function fakeGateway(status: number, responseBody: unknown) {
  const requests: CapturedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({
      url: String(input),
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : "",
    });
    return new Response(JSON.stringify(responseBody), { status });
  };
  return { requests, fetchImpl };
}

function envelope(body: string): GatewayEnvelope {
  return JSON.parse(body);
}

test("send posts a signed envelope and returns the gateway message id", async () => {
  const gateway = fakeGateway(200, { message_id: 1234567890 });
  const transport = new GatewayTransport({
    url: "https://gateway.test/intents",
    secret: "test-secret",
    fetchImpl: gateway.fetchImpl,
  });

  const messageId = await transport.send("dm:u1", { title: "Question 1 of 5" });

  assert.equal(messageId, "1234567890");
  assert.equal(gateway.requests.length, 1);

  const [request] = gateway.requests;
  assert.equal(request.url, "https://gateway.test/intents");
  assert.equal(request.headers.get("x-signature"), hmacSha256Hex("test-secret", request.body));

  const sent = envelope(request.body);
  assert.equal(sent.op, "send");
  assert.equal(sent.conversation_id, "dm:u1");
  assert.equal(sent.message_id, null);
  assert.deepEqual(sent.content, { title: "Question 1 of 5" });
  assert.equal(request.headers.get("x-request-id"), sent.request_id);
});

test("edit and delete address the existing message", async () => {
  const gateway = fakeGateway(200, {});
  const transport = new GatewayTransport({ url: "https://gateway.test/intents", secret: "test-secret", fetchImpl: gateway.fetchImpl });

  await transport.edit("channel:staff", "m9", { title: "Staff Application" });
  await transport.delete("dm:u1", "m3");

  const [edit, removal] = gateway.requests.map((request) => envelope(request.body));
  assert.equal(edit.op, "edit");
  assert.equal(edit.message_id, "m9");
  assert.equal(removal.op, "delete");
  assert.equal(removal.message_id, "m3");
  assert.equal(removal.content, null);
});

test("gateway errors surface as rejections", async () => {
  const gateway = fakeGateway(502, { error: "bad_gateway" });
  const transport = new GatewayTransport({ url: "https://gateway.test/intents", secret: "test-secret", fetchImpl: gateway.fetchImpl });

  await assert.rejects(transport.delete("dm:u1", "m3"), /gateway_http_502/);
});
