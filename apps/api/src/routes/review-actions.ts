import type { FastifyInstance } from "fastify";
import { requireSignature } from "../lib/auth-guard.js";
import type { Decision } from "../lib/application-rules.js";
import { parseReviewActionInput } from "../lib/interaction-schema.js";
import { deliveryReply, replyWithError } from "../lib/notices.js";

interface ReviewActionRouteDeps {
  interactionsSecret: string;
}

function toDecision(value: "approved" | "denied"): Decision {
  return value === "approved" ? "APPROVED" : "DENIED";
}

export async function registerReviewActionRoutes(app: FastifyInstance, deps: ReviewActionRouteDeps): Promise<void> {
  app.post("/review-actions", { preHandler: [requireSignature(deps.interactionsSecret)] }, async (request, reply) => {
    try {
      const input = parseReviewActionInput(request.body);

      switch (input.action) {
        case "pick": {
          const claimed = await app.review.pick(input.applicationId, input.actor);
          return reply.send({
            status: "claimed",
            applicationId: claimed.id,
            notice: `You claimed ${claimed.id}. You can now Score/Approve/Deny.`,
          });
        }
        case "score": {
          const scored = await app.review.score(input.applicationId, input.actor, input.value, input.scale);
          return reply.send({
            status: "scored",
            applicationId: scored.id,
            notice: `Saved score ${input.value}/${input.scale} for ${scored.id}`,
          });
        }
        case "open-decision": {
          const current = await app.review.openDecision(input.applicationId, input.actor);
          return reply.send({ status: "awaiting_reason", applicationId: current.id, decision: input.decision });
        }
        case "decide": {
          const decided = await app.review.decide(
            input.applicationId,
            input.actor,
            toDecision(input.decision),
            input.reason,
          );
          const label = decided.status === "APPROVED" ? "Approved" : "Denied";
          return reply.send({
            status: decided.status,
            applicationId: decided.id,
            notice: `Decision recorded: ${label} for ${decided.id}`,
          });
        }
        case "view-transcript": {
          const delivered = await app.review.viewTranscript(input.applicationId, input.actor);
          return reply.send(deliveryReply(delivered, "Sent transcript to your DMs."));
        }
      }
    } catch (error) {
      return replyWithError(reply, error);
    }
  });
}
