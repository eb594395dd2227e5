import type { MessageContent, MessageRole } from "@staff-desk/contracts";
import type { MessageRef, MessageRefRepo } from "../repos/message-ref-repo.js";
import type { Logger } from "./logger.js";
import type { NotificationDispatcher } from "./notification-dispatcher.js";

export type LiveRole = Extract<MessageRole, "summary" | "result">;

export const LIVE_ROLES: readonly LiveRole[] = ["summary", "result"];

/**
 * Bookkeeping for the messages this service owns in a conversation.
 *
 * A conversation holds any number of question prompts, at most one live
 * summary/result message, and (in the staff channel) one review card per
 * application that is edited in place. A ref is only dropped after its
 * deletion has been requested.
 */
export class MessageLedger {
  public constructor(
    private readonly refs: MessageRefRepo,
    private readonly dispatcher: NotificationDispatcher,
    private readonly log: Logger,
  ) {}

  public async track(
    conversationId: string,
    role: Exclude<MessageRole, LiveRole>,
    content: MessageContent,
    applicationId: string | null,
  ): Promise<MessageRef | null> {
    const sent = await this.dispatcher.send(conversationId, role, content);
    if (!sent) {
      return null;
    }

    return this.refs.add({ conversationId, messageId: sent.messageId, role, applicationId });
  }

  /** Removes whatever summary/result is live in the conversation, then sends the new one. */
  public async replaceLive(
    conversationId: string,
    role: LiveRole,
    content: MessageContent,
    applicationId: string | null,
  ): Promise<MessageRef | null> {
    await this.clear(conversationId, LIVE_ROLES);

    const sent = await this.dispatcher.send(conversationId, role, content);
    if (!sent) {
      return null;
    }

    const ref = await this.refs.add({ conversationId, messageId: sent.messageId, role, applicationId });
    await this.enforceSingleLive(conversationId);
    return ref;
  }

  public async clear(conversationId: string, roles: readonly MessageRole[]): Promise<number> {
    const refs = await this.refs.list(conversationId, roles);
    await this.drop(refs);
    return refs.length;
  }

  public async editCard(applicationId: string, content: MessageContent): Promise<boolean> {
    const card = await this.refs.findByApplication(applicationId, "staff-review-card");
    if (!card) {
      this.log.warn({ applicationId }, "review card not tracked; skipping edit");
      return false;
    }

    await this.dispatcher.edit(card, content);
    return true;
  }

  public async liveRefs(conversationId: string): Promise<MessageRef[]> {
    return this.refs.list(conversationId, LIVE_ROLES);
  }

  // Two replacements racing on one conversation can both land; keep the newest.
  private async enforceSingleLive(conversationId: string): Promise<void> {
    const live = await this.liveRefs(conversationId);
    if (live.length <= 1) {
      return;
    }

    const stale = live.slice(0, -1);
    this.log.warn({ conversationId, stale: stale.map((ref) => ref.messageId) }, "multiple live messages; removing older");
    await this.drop(stale);
  }

  private async drop(refs: readonly MessageRef[]): Promise<void> {
    if (refs.length === 0) {
      return;
    }

    await this.dispatcher.deleteMany(refs);
    await this.refs.remove(refs.map((ref) => ref.id));
  }
}
