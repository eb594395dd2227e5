import { reviewActionId, type MessageAction, type MessageContent, type MessageField } from "@staff-desk/contracts";
import type { AnswerRecord, ApplicationRecord } from "./application-rules.js";
import { interpolate, truncate } from "./templates.js";

const PREVIEW_LIMIT = 1000;
const DM_TRANSCRIPT_LIMIT = 1900;

export function formatTranscript(answers: readonly AnswerRecord[]): string {
  return answers.map((answer) => `Q: ${answer.questionText}\nA: ${answer.text}\n`).join("\n");
}

function applicantLabel(app: ApplicationRecord): string {
  return app.applicantName ? `${app.applicantName} (${app.applicantId})` : app.applicantId;
}

function scoreLabel(app: ApplicationRecord): string {
  return app.score === null ? "Not scored" : `${app.score}/${app.scale ?? "?"}`;
}

function decisionLabel(app: ApplicationRecord): string {
  if (app.decision === "APPROVED") {
    return "Approved";
  }
  if (app.decision === "DENIED") {
    return "Denied";
  }
  return "Pending";
}

export function renderWelcome(applicationId: string): MessageContent {
  return {
    title: "Staff Application",
    description: "Answer the questions below. Your answers are saved automatically.",
    color: "blurple",
    fields: [{ name: "Application ID", value: applicationId }],
    footer: "Reply to each message with your answer.",
  };
}

export function renderQuestionPrompt(applicationId: string, index: number, questions: readonly string[]): MessageContent {
  return {
    title: `Question ${index + 1} of ${questions.length}`,
    description: questions[index],
    color: "dark_blue",
    footer: `Application ${applicationId}`,
  };
}

export function renderSummary(app: ApplicationRecord): MessageContent {
  return {
    title: "Application Submitted",
    description: "Thank you, your application has been submitted and will be reviewed by staff.",
    color: "green",
    fields: [{ name: "Application ID", value: app.id }],
    footer: "Keep this ID to check your application later.",
  };
}

/**
 * The staff-facing card. One rendering per status; the reviewer label is the
 * acting reviewer's display name, passed in because the card is only ever
 * re-rendered by that reviewer.
 */
export function renderReviewCard(app: ApplicationRecord, reviewerLabel?: string): MessageContent {
  const view: MessageAction = { id: reviewActionId("view", app.id), label: "View Transcript", style: "secondary" };
  const reviewer = reviewerLabel ?? app.reviewerId ?? "";

  if (app.decision !== null) {
    return {
      title: "Staff Application (Final)",
      color: app.decision === "APPROVED" ? "green" : "red",
      fields: [
        { name: "Applicant", value: applicantLabel(app) },
        { name: "Application ID", value: app.id, inline: true },
        { name: "Status", value: decisionLabel(app), inline: true },
        { name: "Score", value: scoreLabel(app), inline: true },
        { name: "Reviewer", value: reviewer, inline: true },
        { name: "Reason", value: app.reason ?? "N/A" },
      ],
      footer: `Application ${app.id}`,
      actions: [view],
    };
  }

  const fields: MessageField[] = [
    { name: "Applicant", value: applicantLabel(app) },
    { name: "Application ID", value: app.id, inline: true },
    { name: "Started", value: app.createdAt, inline: true },
  ];

  if (app.reviewerId !== null) {
    fields.push({ name: "Reviewer", value: reviewer, inline: true });
  }
  if (app.score !== null) {
    fields.push({ name: "Score", value: scoreLabel(app), inline: true });
  }
  fields.push({ name: "Transcript Preview", value: truncate(formatTranscript(app.answers) || "No transcript", PREVIEW_LIMIT) });

  const actions: MessageAction[] =
    app.reviewerId === null
      ? [{ id: reviewActionId("pick", app.id), label: "Pick", style: "primary" }, view]
      : [
          { id: `picked:${app.id}`, label: `Picked by ${reviewer}`, style: "secondary", disabled: true },
          { id: reviewActionId("score", app.id), label: "Score", style: "primary" },
          { id: reviewActionId("approve", app.id), label: "Approve", style: "success" },
          { id: reviewActionId("deny", app.id), label: "Deny", style: "danger" },
          view,
        ];

  return {
    title: app.reviewerId === null ? "New Staff Application" : "Staff Application",
    color: "gold",
    fields,
    footer: `Application ${app.id}`,
    actions,
  };
}

export function renderResult(app: ApplicationRecord, template: string, reviewerLabel: string): MessageContent {
  return {
    title: "Application Result",
    description: interpolate(template, {
      id: app.id,
      reviewer: reviewerLabel,
      score: app.score ?? "N/A",
      scale: app.scale ?? "N/A",
      reason: app.reason ?? "",
    }),
    color: app.decision === "APPROVED" ? "green" : "red",
    fields: [
      { name: "Application ID", value: app.id },
      { name: "Result", value: decisionLabel(app), inline: true },
      { name: "Score", value: scoreLabel(app), inline: true },
      { name: "Reviewer", value: reviewerLabel, inline: true },
    ],
    footer: "Thank you for applying",
  };
}

export function renderTranscript(app: ApplicationRecord): MessageContent {
  return {
    title: `Transcript ${app.id}`,
    description: `\`\`\`\n${truncate(formatTranscript(app.answers) || "No transcript saved", DM_TRANSCRIPT_LIMIT)}\n\`\`\``,
    color: "grey",
  };
}

export function renderConfirmResults(app: ApplicationRecord): MessageContent {
  return {
    title: `Application ${app.id}`,
    color: "blue",
    fields: [
      { name: "Applicant", value: applicantLabel(app) },
      { name: "Started", value: app.createdAt, inline: true },
      { name: "Finished", value: app.submittedAt ?? "N/A", inline: true },
      { name: "Score", value: scoreLabel(app), inline: true },
      { name: "Decision", value: decisionLabel(app), inline: true },
      { name: "Reason", value: app.reason ?? "N/A" },
      {
        name: "Transcript",
        value: `\`\`\`\n${truncate(formatTranscript(app.answers) || "No transcript saved", DM_TRANSCRIPT_LIMIT)}\n\`\`\``,
      },
    ],
  };
}
