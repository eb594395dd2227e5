import type { FastifyReply } from "fastify";
import { ZodError } from "zod";
import { CooldownActiveError, isWorkflowError, type WorkflowError, type WorkflowErrorCode } from "./errors.js";

interface Notice {
  statusCode: number;
  text: string;
}

const NOTICES: Record<WorkflowErrorCode, Notice> = {
  not_found: { statusCode: 404, text: "Application not found." },
  not_authorized: { statusCode: 403, text: "You are not authorized to do that." },
  duplicate_active_application: { statusCode: 409, text: "You already have an application in progress." },
  cooldown_active: { statusCode: 429, text: "Please wait before starting another application." },
  invalid_state: { statusCode: 409, text: "That step is not available for this application right now." },
  already_claimed: { statusCode: 409, text: "Already claimed." },
  not_owner: { statusCode: 403, text: "This application is claimed by another staff member." },
  invalid_score: { statusCode: 409, text: "Score must be a number between 0 and the selected scale." },
  missing_score: { statusCode: 409, text: "Please score the application before making a decision." },
  already_decided: { statusCode: 409, text: "A decision has already been made on this application." },
};

export const DM_UNAVAILABLE = "Couldn't DM you. Enable DMs and try again.";

export function noticeFor(error: WorkflowError): Notice {
  const notice = NOTICES[error.code];
  if (error instanceof CooldownActiveError) {
    return { ...notice, text: `Please wait ${error.retryAfterSeconds}s before starting another application.` };
  }
  return notice;
}

/**
 * Turns validation and workflow failures into a reply for the invoking actor.
 * Anything else is rethrown and ends up as a 500.
 */
export function replyWithError(reply: FastifyReply, error: unknown): FastifyReply {
  if (error instanceof ZodError) {
    return reply.code(400).send({ error: "validation_error", details: error.flatten() });
  }

  if (isWorkflowError(error)) {
    const notice = noticeFor(error);
    return reply.code(notice.statusCode).send({
      error: error.code,
      notice: notice.text,
      ...(error instanceof CooldownActiveError ? { retryAfterSeconds: error.retryAfterSeconds } : {}),
    });
  }

  throw error;
}

export function deliveryReply(delivered: boolean, notice: string): { status: "sent" | "undelivered"; notice: string } {
  return delivered ? { status: "sent", notice } : { status: "undelivered", notice: DM_UNAVAILABLE };
}
