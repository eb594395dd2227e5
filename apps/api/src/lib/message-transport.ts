import type { MessageContent } from "@staff-desk/contracts";

/**
 * Whatever actually talks to the chat platform. Implementations throw on
 * failure; {@link NotificationDispatcher} decides what a failure means.
 */
export interface MessageTransport {
  send(conversationId: string, content: MessageContent): Promise<string>;
  edit(conversationId: string, messageId: string, content: MessageContent): Promise<void>;
  delete(conversationId: string, messageId: string): Promise<void>;
}
