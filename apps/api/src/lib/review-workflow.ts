import { dmConversation } from "@staff-desk/contracts";
import type { ApplicationConfig } from "./app-config.js";
import {
  assertCanDecide,
  assertOwner,
  isTerminal,
  type ApplicationRecord,
  type Decision,
} from "./application-rules.js";
import { WorkflowError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { MessageLedger } from "./message-ledger.js";
import type { NotificationDispatcher } from "./notification-dispatcher.js";
import { renderConfirmResults, renderResult, renderReviewCard, renderTranscript } from "./render.js";
import type { ApplicationRepo } from "../repos/application-repo.js";
import { actorLabel, type Actor, type ReviewerPredicate } from "../types/actor.js";

export interface ReviewWorkflowDeps {
  applications: ApplicationRepo;
  ledger: MessageLedger;
  dispatcher: NotificationDispatcher;
  config: ApplicationConfig;
  isReviewer: ReviewerPredicate;
  log: Logger;
}

/**
 * Staff-side claim -> score -> decide. The store enforces every transition
 * atomically; the checks done here first only make sure a rejected action
 * produces no side effects at all.
 */
export class ReviewWorkflow {
  public constructor(private readonly deps: ReviewWorkflowDeps) {}

  public async pick(applicationId: string, actor: Actor): Promise<ApplicationRecord> {
    const app = await this.requireActive(applicationId);
    if (!this.deps.isReviewer(actor)) {
      throw new WorkflowError("not_authorized");
    }

    const claimed = await this.deps.applications.claim(app.id, actor.id);
    this.deps.log.info({ applicationId, reviewerId: actor.id }, "application claimed");

    await this.deps.ledger.editCard(claimed.id, renderReviewCard(claimed, actorLabel(actor)));
    return claimed;
  }

  public async score(applicationId: string, actor: Actor, value: number, scale: number): Promise<ApplicationRecord> {
    const app = await this.requireActive(applicationId);
    assertOwner(app, actor.id);

    if (!this.deps.config.scoreScales.includes(scale)) {
      throw new WorkflowError("invalid_score", `scale must be one of: ${this.deps.config.scoreScales.join(", ")}`);
    }

    const scored = await this.deps.applications.setScore(app.id, actor.id, value, scale);
    this.deps.log.info({ applicationId, reviewerId: actor.id, score: value, scale }, "application scored");

    await this.deps.ledger.editCard(scored.id, renderReviewCard(scored, actorLabel(actor)));
    return scored;
  }

  /** Checked before the reviewer is asked for a reason. */
  public async openDecision(applicationId: string, actor: Actor): Promise<ApplicationRecord> {
    const app = await this.require(applicationId);
    assertCanDecide(app, actor.id);
    return app;
  }

  public async decide(applicationId: string, actor: Actor, decision: Decision, reason: string): Promise<ApplicationRecord> {
    const decided = await this.deps.applications.decide(applicationId, actor.id, decision, reason.trim());
    this.deps.log.info({ applicationId, reviewerId: actor.id, decision }, "application decided");

    const label = actorLabel(actor);
    const template = decision === "APPROVED" ? this.deps.config.templates.approved : this.deps.config.templates.denied;
    const dm = dmConversation(decided.applicantId);

    await this.deps.ledger.editCard(decided.id, renderReviewCard(decided, label));
    await this.deps.ledger.clear(dm, ["question-prompt", "summary"]);
    await this.deps.ledger.replaceLive(dm, "result", renderResult(decided, template, label), decided.id);

    return decided;
  }

  public async viewTranscript(applicationId: string, actor: Actor): Promise<boolean> {
    const app = await this.requireReadable(applicationId, actor);
    return this.deps.dispatcher.notify(dmConversation(actor.id), renderTranscript(app));
  }

  public async confirmResults(applicationId: string, actor: Actor): Promise<boolean> {
    const app = await this.requireReadable(applicationId, actor);
    return this.deps.dispatcher.notify(dmConversation(actor.id), renderConfirmResults(app));
  }

  private async require(applicationId: string): Promise<ApplicationRecord> {
    const app = await this.deps.applications.findById(applicationId);
    if (!app) {
      throw new WorkflowError("not_found", `application ${applicationId} not found`);
    }
    return app;
  }

  private async requireActive(applicationId: string): Promise<ApplicationRecord> {
    const app = await this.require(applicationId);
    if (isTerminal(app.status)) {
      throw new WorkflowError("already_decided");
    }
    return app;
  }

  private async requireReadable(applicationId: string, actor: Actor): Promise<ApplicationRecord> {
    const app = await this.require(applicationId);
    if (app.applicantId !== actor.id && !this.deps.isReviewer(actor)) {
      throw new WorkflowError("not_authorized");
    }
    return app;
  }
}
