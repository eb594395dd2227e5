import type { MessageContent } from "@staff-desk/contracts";
import type { MessageTransport } from "./message-transport.js";

export interface StoredMessage {
  messageId: string;
  conversationId: string;
  content: MessageContent;
  edits: number;
  deleted: boolean;
}

export type TransportOp = "send" | "edit" | "delete";

export class MemoryTransport implements MessageTransport {
  private readonly messages = new Map<string, StoredMessage>();
  private readonly failing = new Set<TransportOp>();
  private sequence = 0;

  public async send(conversationId: string, content: MessageContent): Promise<string> {
    this.maybeFail("send");
    this.sequence += 1;
    const messageId = `m${this.sequence}`;
    this.messages.set(messageId, {
      messageId,
      conversationId,
      content,
      edits: 0,
      deleted: false,
    });
    return messageId;
  }

  public async edit(_conversationId: string, messageId: string, content: MessageContent): Promise<void> {
    this.maybeFail("edit");
    const message = this.requireLive(messageId);
    message.content = content;
    message.edits += 1;
  }

  public async delete(_conversationId: string, messageId: string): Promise<void> {
    this.maybeFail("delete");
    this.requireLive(messageId).deleted = true;
  }

  public failOn(op: TransportOp, enabled = true): void {
    if (enabled) {
      this.failing.add(op);
    } else {
      this.failing.delete(op);
    }
  }

  public get(messageId: string): StoredMessage | null {
    return this.messages.get(messageId) ?? null;
  }

  /** Messages in send order, including deleted ones. */
  public history(conversationId: string): StoredMessage[] {
    return [...this.messages.values()].filter((message) => message.conversationId === conversationId);
  }

  public live(conversationId: string): StoredMessage[] {
    return this.history(conversationId).filter((message) => !message.deleted);
  }

  private requireLive(messageId: string): StoredMessage {
    const message = this.messages.get(messageId);
    if (!message || message.deleted) {
      throw new Error(`unknown_message:${messageId}`);
    }
    return message;
  }

  private maybeFail(op: TransportOp): void {
    if (this.failing.has(op)) {
      throw new Error(`transport_${op}_failed`);
    }
  }
}
