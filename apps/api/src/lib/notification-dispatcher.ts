import type { MessageContent, MessageRole } from "@staff-desk/contracts";
import type { Logger } from "./logger.js";
import type { MessageTransport } from "./message-transport.js";

export interface DispatchedMessage {
  conversationId: string;
  messageId: string;
}

/**
 * Outbound side of every state transition. Runs after the store has
 * committed, so nothing here may throw: failures are logged and the caller
 * carries on.
 */
export class NotificationDispatcher {
  public constructor(
    private readonly transport: MessageTransport,
    private readonly log: Logger,
  ) {}

  public async send(conversationId: string, role: MessageRole, content: MessageContent): Promise<DispatchedMessage | null> {
    try {
      const messageId = await this.transport.send(conversationId, content);
      return { conversationId, messageId };
    } catch (error) {
      this.log.warn({ err: error, conversationId, role }, "message send failed");
      return null;
    }
  }

  /** Sends a message nobody tracks or cleans up later. */
  public async notify(conversationId: string, content: MessageContent): Promise<boolean> {
    try {
      await this.transport.send(conversationId, content);
      return true;
    } catch (error) {
      this.log.warn({ err: error, conversationId }, "notification send failed");
      return false;
    }
  }

  public async edit(ref: DispatchedMessage, content: MessageContent): Promise<void> {
    try {
      await this.transport.edit(ref.conversationId, ref.messageId, content);
    } catch (error) {
      this.log.warn({ err: error, ...ref }, "message edit failed");
    }
  }

  public async delete(ref: DispatchedMessage): Promise<void> {
    try {
      await this.transport.delete(ref.conversationId, ref.messageId);
    } catch (error) {
      this.log.warn({ err: error, ...ref }, "message delete failed");
    }
  }

  public async deleteMany(refs: readonly DispatchedMessage[]): Promise<void> {
    await Promise.all(refs.map((ref) => this.delete(ref)));
  }
}
