import { WorkflowError } from "./errors.js";

export const APPLICATION_STATUSES = ["IN_PROGRESS", "SUBMITTED", "CLAIMED", "SCORED", "APPROVED", "DENIED"] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export type Decision = "APPROVED" | "DENIED";

export interface AnswerRecord {
  index: number;
  questionText: string;
  text: string;
  answeredAt: string;
}

export interface ApplicationRecord {
  id: string;
  applicantId: string;
  applicantName: string | null;
  status: ApplicationStatus;
  answers: AnswerRecord[];
  reviewerId: string | null;
  score: number | null;
  scale: number | null;
  decision: Decision | null;
  reason: string | null;
  createdAt: string;
  submittedAt: string | null;
  claimedAt: string | null;
  scoredAt: string | null;
  decidedAt: string | null;
}

export function parseStatus(value: unknown): ApplicationStatus {
  const status = APPLICATION_STATUSES.find((item) => item === value);
  if (!status) {
    throw new Error(`unknown application status: ${String(value)}`);
  }
  return status;
}

export function parseDecision(value: unknown): Decision | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (value === "APPROVED" || value === "DENIED") {
    return value;
  }
  throw new Error(`unknown decision: ${String(value)}`);
}

export function isTerminal(status: ApplicationStatus): boolean {
  return status === "APPROVED" || status === "DENIED";
}

// The checks below are the single source of truth for both repositories.
// They must run against the latest committed row and throw before anything
// is written.

export function assertCanAppend(app: ApplicationRecord, index: number): void {
  if (app.status !== "IN_PROGRESS") {
    throw new WorkflowError("invalid_state", `application ${app.id} is ${app.status}, answers are frozen`);
  }
  if (index !== app.answers.length) {
    throw new WorkflowError("invalid_state", `expected answer ${app.answers.length}, got ${index}`);
  }
}

export function assertCanSubmit(app: ApplicationRecord, expectedAnswers: number): void {
  if (app.status !== "IN_PROGRESS") {
    throw new WorkflowError("invalid_state", `application ${app.id} is already ${app.status}`);
  }
  if (app.answers.length < expectedAnswers) {
    throw new WorkflowError("invalid_state", `${expectedAnswers - app.answers.length} question(s) unanswered`);
  }
}

export function assertCanClaim(app: ApplicationRecord): void {
  if (isTerminal(app.status)) {
    throw new WorkflowError("already_decided");
  }
  if (app.reviewerId !== null) {
    throw new WorkflowError("already_claimed");
  }
  if (app.status !== "SUBMITTED") {
    throw new WorkflowError("invalid_state", `application ${app.id} is ${app.status}`);
  }
}

export function assertOwner(app: ApplicationRecord, reviewerId: string): void {
  if (app.reviewerId === null || app.reviewerId !== reviewerId) {
    throw new WorkflowError("not_owner");
  }
}

export function assertValidScore(value: number, scale: number): void {
  if (!Number.isFinite(value) || !Number.isFinite(scale) || scale <= 0 || value < 0 || value > scale) {
    throw new WorkflowError("invalid_score", `score must be between 0 and ${scale}`);
  }
}

export function assertCanScore(app: ApplicationRecord, reviewerId: string, value: number, scale: number): void {
  if (isTerminal(app.status)) {
    throw new WorkflowError("already_decided");
  }
  assertOwner(app, reviewerId);
  if (app.status !== "CLAIMED") {
    throw new WorkflowError("invalid_state", `application ${app.id} is ${app.status}`);
  }
  assertValidScore(value, scale);
}

export function assertCanDecide(app: ApplicationRecord, reviewerId: string): void {
  if (isTerminal(app.status)) {
    throw new WorkflowError("already_decided");
  }
  if (app.score === null) {
    throw new WorkflowError("missing_score");
  }
  assertOwner(app, reviewerId);
  if (app.status !== "SCORED") {
    throw new WorkflowError("invalid_state", `application ${app.id} is ${app.status}`);
  }
}
