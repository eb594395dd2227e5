import type { FastifyInstance } from "fastify";
import { requireSignature } from "../lib/auth-guard.js";
import { parseDirectMessageInput } from "../lib/interaction-schema.js";
import { replyWithError } from "../lib/notices.js";

interface MessageRouteDeps {
  interactionsSecret: string;
}

export async function registerMessageRoutes(app: FastifyInstance, deps: MessageRouteDeps): Promise<void> {
  app.post("/messages", { preHandler: [requireSignature(deps.interactionsSecret)] }, async (request, reply) => {
    try {
      const input = parseDirectMessageInput(request.body);
      const result = await app.interview.handleMessage(input.actor, input.text);

      if (result.status === "submitted") {
        return reply.send({ status: "submitted", applicationId: result.application.id });
      }

      return reply.send(result);
    } catch (error) {
      return replyWithError(reply, error);
    }
  });
}
