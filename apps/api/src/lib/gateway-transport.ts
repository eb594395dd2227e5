import { z } from "zod";
import type { GatewayEnvelope, GatewayOp, GatewaySendResponse, MessageContent } from "@staff-desk/contracts";
import { newId } from "./db.js";
import { hmacSha256Hex } from "./hmac.js";
import type { MessageTransport } from "./message-transport.js";

const sendResponseSchema = z.object({
  message_id: z.union([z.string().min(1), z.number()]).transform((value) => String(value)),
});

interface GatewayTransportOptions {
  url: string;
  secret: string;
  fetchImpl?: typeof fetch;
}

/**
 * Forwards message intents to the chat gateway as signed JSON envelopes.
 */
export class GatewayTransport implements MessageTransport {
  private readonly fetchImpl: typeof fetch;

  public constructor(private readonly options: GatewayTransportOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  public async send(conversationId: string, content: MessageContent): Promise<string> {
    const response = await this.post("send", conversationId, null, content);
    const payload: GatewaySendResponse = sendResponseSchema.parse(await response.json());
    return payload.message_id;
  }

  public async edit(conversationId: string, messageId: string, content: MessageContent): Promise<void> {
    await this.post("edit", conversationId, messageId, content);
  }

  public async delete(conversationId: string, messageId: string): Promise<void> {
    await this.post("delete", conversationId, messageId, null);
  }

  private async post(
    op: GatewayOp,
    conversationId: string,
    messageId: string | null,
    content: MessageContent | null,
  ): Promise<Response> {
    const envelope: GatewayEnvelope = {
      request_id: newId(),
      op,
      conversation_id: conversationId,
      message_id: messageId,
      content,
      occurred_at: new Date().toISOString(),
    };
    const body = JSON.stringify(envelope);

    const response = await this.fetchImpl(this.options.url, {
      method: "POST",
      headers: {
        "content-type": "application/json; charset=utf-8",
        "x-request-id": envelope.request_id,
        "x-signature": hmacSha256Hex(this.options.secret, body),
      },
      body,
    });

    if (!response.ok) {
      throw new Error(`gateway_http_${response.status}`);
    }

    return response;
  }
}
