import type { MessageRole } from "@staff-desk/contracts";
import { newApplicationId, newId } from "../lib/db.js";
import { WorkflowError } from "../lib/errors.js";
import {
  assertCanAppend,
  assertCanClaim,
  assertCanDecide,
  assertCanScore,
  assertCanSubmit,
  isTerminal,
  type ApplicationRecord,
  type Decision,
} from "../lib/application-rules.js";
import type { ApplicationRepo, CreateApplicationInput } from "./application-repo.js";
import type { CooldownRepo } from "./cooldown-repo.js";
import type { MessageRef, MessageRefRepo, NewMessageRef } from "./message-ref-repo.js";

function clone(app: ApplicationRecord): ApplicationRecord {
  return {
    ...app,
    answers: app.answers.map((answer) => ({ ...answer })),
  };
}

// Every method checks and mutates without yielding to the event loop, which
// makes each transition atomic within the process.
export class MemoryApplicationRepo implements ApplicationRepo {
  private readonly applications = new Map<string, ApplicationRecord>();

  public async create(input: CreateApplicationInput): Promise<ApplicationRecord> {
    for (const existing of this.applications.values()) {
      if (existing.applicantId === input.applicantId && !isTerminal(existing.status)) {
        throw new WorkflowError("duplicate_active_application");
      }
    }

    const app: ApplicationRecord = {
      id: newApplicationId(),
      applicantId: input.applicantId,
      applicantName: input.applicantName ?? null,
      status: "IN_PROGRESS",
      answers: [],
      reviewerId: null,
      score: null,
      scale: null,
      decision: null,
      reason: null,
      createdAt: new Date().toISOString(),
      submittedAt: null,
      claimedAt: null,
      scoredAt: null,
      decidedAt: null,
    };

    this.applications.set(app.id, app);
    return clone(app);
  }

  public async appendAnswer(id: string, index: number, questionText: string, text: string): Promise<ApplicationRecord> {
    const app = this.require(id);
    assertCanAppend(app, index);

    app.answers.push({
      index,
      questionText,
      text,
      answeredAt: new Date().toISOString(),
    });

    return clone(app);
  }

  public async submit(id: string, expectedAnswers: number): Promise<ApplicationRecord> {
    const app = this.require(id);
    assertCanSubmit(app, expectedAnswers);

    app.status = "SUBMITTED";
    app.submittedAt = new Date().toISOString();
    return clone(app);
  }

  public async claim(id: string, reviewerId: string): Promise<ApplicationRecord> {
    const app = this.require(id);
    assertCanClaim(app);

    app.status = "CLAIMED";
    app.reviewerId = reviewerId;
    app.claimedAt = new Date().toISOString();
    return clone(app);
  }

  public async setScore(id: string, reviewerId: string, value: number, scale: number): Promise<ApplicationRecord> {
    const app = this.require(id);
    assertCanScore(app, reviewerId, value, scale);

    app.status = "SCORED";
    app.score = value;
    app.scale = scale;
    app.scoredAt = new Date().toISOString();
    return clone(app);
  }

  public async decide(id: string, reviewerId: string, decision: Decision, reason: string): Promise<ApplicationRecord> {
    const app = this.require(id);
    assertCanDecide(app, reviewerId);

    app.status = decision;
    app.decision = decision;
    app.reason = reason;
    app.decidedAt = new Date().toISOString();
    return clone(app);
  }

  public async findById(id: string): Promise<ApplicationRecord | null> {
    const app = this.applications.get(id);
    return app ? clone(app) : null;
  }

  public async findByApplicant(applicantId: string): Promise<ApplicationRecord | null> {
    let latest: ApplicationRecord | null = null;
    for (const app of this.applications.values()) {
      if (app.applicantId === applicantId) {
        latest = app;
      }
    }
    return latest ? clone(latest) : null;
  }

  private require(id: string): ApplicationRecord {
    const app = this.applications.get(id);
    if (!app) {
      throw new WorkflowError("not_found", `application ${id} not found`);
    }
    return app;
  }
}

export class MemoryCooldownRepo implements CooldownRepo {
  private readonly lastApplied = new Map<string, Date>();

  public async lastAppliedAt(applicantId: string): Promise<Date | null> {
    const at = this.lastApplied.get(applicantId);
    return at ? new Date(at.getTime()) : null;
  }

  public async touch(applicantId: string, at: Date): Promise<void> {
    this.lastApplied.set(applicantId, new Date(at.getTime()));
  }
}

export class MemoryMessageRefRepo implements MessageRefRepo {
  private readonly refs = new Map<string, MessageRef>();

  public async add(ref: NewMessageRef): Promise<MessageRef> {
    const record: MessageRef = {
      id: newId(),
      ...ref,
      createdAt: new Date().toISOString(),
    };

    this.refs.set(record.id, record);
    return { ...record };
  }

  public async list(conversationId: string, roles?: readonly MessageRole[]): Promise<MessageRef[]> {
    return [...this.refs.values()]
      .filter((ref) => ref.conversationId === conversationId && (!roles || roles.includes(ref.role)))
      .map((ref) => ({ ...ref }));
  }

  public async findByApplication(applicationId: string, role: MessageRole): Promise<MessageRef | null> {
    let latest: MessageRef | null = null;
    for (const ref of this.refs.values()) {
      if (ref.applicationId === applicationId && ref.role === role) {
        latest = ref;
      }
    }
    return latest ? { ...latest } : null;
  }

  public async remove(ids: readonly string[]): Promise<void> {
    for (const id of ids) {
      this.refs.delete(id);
    }
  }
}
