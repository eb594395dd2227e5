import type { FastifyInstance } from "fastify";
import { requireSignature } from "../lib/auth-guard.js";
import { parseCommandInput } from "../lib/interaction-schema.js";
import { DM_UNAVAILABLE, deliveryReply, replyWithError } from "../lib/notices.js";

interface InteractionRouteDeps {
  interactionsSecret: string;
}

export async function registerCommandRoutes(app: FastifyInstance, deps: InteractionRouteDeps): Promise<void> {
  app.post("/commands", { preHandler: [requireSignature(deps.interactionsSecret)] }, async (request, reply) => {
    try {
      const input = parseCommandInput(request.body);

      switch (input.command) {
        case "apply": {
          const { application, prompted } = await app.interview.apply(input.actor);
          return reply.code(201).send({
            status: "started",
            applicationId: application.id,
            notice: prompted ? "Check your DMs to start the application." : DM_UNAVAILABLE,
          });
        }
        case "view-transcript": {
          const delivered = await app.review.viewTranscript(input.applicationId, input.actor);
          return reply.send(deliveryReply(delivered, "Sent transcript to your DMs."));
        }
        case "confirm-results": {
          const delivered = await app.review.confirmResults(input.applicationId, input.actor);
          return reply.send(deliveryReply(delivered, "Sent you a DM with the application summary."));
        }
      }
    } catch (error) {
      return replyWithError(reply, error);
    }
  });
}
