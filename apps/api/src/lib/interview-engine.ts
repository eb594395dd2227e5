import { channelConversation, dmConversation } from "@staff-desk/contracts";
import type { ApplicationConfig } from "./app-config.js";
import type { ApplicationRecord } from "./application-rules.js";
import { CooldownActiveError, isWorkflowError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { MessageLedger } from "./message-ledger.js";
import { renderQuestionPrompt, renderReviewCard, renderSummary, renderWelcome } from "./render.js";
import type { ApplicationRepo } from "../repos/application-repo.js";
import type { CooldownRepo } from "../repos/cooldown-repo.js";
import type { Actor } from "../types/actor.js";

export interface InterviewEngineDeps {
  applications: ApplicationRepo;
  cooldowns: CooldownRepo;
  ledger: MessageLedger;
  config: ApplicationConfig;
  log: Logger;
  clock?: () => Date;
}

export type InterviewReply =
  | { status: "ignored" }
  | { status: "answered"; applicationId: string; nextIndex: number }
  | { status: "submitted"; application: ApplicationRecord };

/**
 * Drives the DM interview. Holds no per-applicant state of its own: the
 * current question is always the number of answers already stored, so an
 * interview picks up where it left off after a restart.
 */
export class InterviewEngine {
  private readonly clock: () => Date;

  public constructor(private readonly deps: InterviewEngineDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  public async apply(applicant: Actor): Promise<{ application: ApplicationRecord; prompted: boolean }> {
    const now = this.clock();
    const windowMs = this.deps.config.cooldownSeconds * 1000;
    const last = await this.deps.cooldowns.lastAppliedAt(applicant.id);

    if (last && now.getTime() - last.getTime() < windowMs) {
      const remainingMs = windowMs - (now.getTime() - last.getTime());
      throw new CooldownActiveError(Math.ceil(remainingMs / 1000));
    }

    const app = await this.deps.applications.create({
      applicantId: applicant.id,
      applicantName: applicant.displayName ?? null,
    });
    await this.deps.cooldowns.touch(applicant.id, now);

    this.deps.log.info({ applicationId: app.id, applicantId: applicant.id }, "interview started");

    // The welcome is cleaned up with the prompts once the application is submitted.
    const dm = dmConversation(applicant.id);
    await this.deps.ledger.track(dm, "question-prompt", renderWelcome(app.id), app.id);
    const prompt = await this.deps.ledger.track(
      dm,
      "question-prompt",
      renderQuestionPrompt(app.id, 0, this.deps.config.questions),
      app.id,
    );

    return { application: app, prompted: prompt !== null };
  }

  public async handleMessage(applicant: Actor, text: string): Promise<InterviewReply> {
    const app = await this.deps.applications.findByApplicant(applicant.id);
    if (!app || app.status !== "IN_PROGRESS") {
      return { status: "ignored" };
    }

    const { questions } = this.deps.config;
    const index = app.answers.length;
    if (index >= questions.length) {
      // Every answer is in but submit never landed.
      return this.finish(app);
    }

    let updated: ApplicationRecord;
    try {
      updated = await this.deps.applications.appendAnswer(app.id, index, questions[index], text.trim());
    } catch (error) {
      // Another message for the same question got there first.
      if (isWorkflowError(error) && error.code === "invalid_state") {
        this.deps.log.debug({ applicationId: app.id, index }, "stale answer ignored");
        return { status: "ignored" };
      }
      throw error;
    }

    const nextIndex = index + 1;
    if (nextIndex < questions.length) {
      await this.deps.ledger.track(
        dmConversation(applicant.id),
        "question-prompt",
        renderQuestionPrompt(app.id, nextIndex, questions),
        app.id,
      );
      return { status: "answered", applicationId: app.id, nextIndex };
    }

    return this.finish(updated);
  }

  private async finish(app: ApplicationRecord): Promise<InterviewReply> {
    let submitted: ApplicationRecord;
    try {
      submitted = await this.deps.applications.submit(app.id, this.deps.config.questions.length);
    } catch (error) {
      if (isWorkflowError(error) && error.code === "invalid_state") {
        this.deps.log.debug({ applicationId: app.id }, "application already submitted");
        return { status: "ignored" };
      }
      throw error;
    }

    this.deps.log.info({ applicationId: submitted.id }, "application submitted");

    const dm = dmConversation(submitted.applicantId);
    await this.deps.ledger.clear(dm, ["question-prompt"]);
    await this.deps.ledger.replaceLive(dm, "summary", renderSummary(submitted), submitted.id);
    await this.deps.ledger.track(
      channelConversation(this.deps.config.staffChannelId),
      "staff-review-card",
      renderReviewCard(submitted),
      submitted.id,
    );

    return { status: "submitted", application: submitted };
  }
}
