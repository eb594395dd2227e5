import type { FastifyReply, FastifyRequest } from "fastify";
import type { ReviewerPredicate } from "../types/actor.js";
import { verifyHmacSha256Hex } from "./hmac.js";

export function requireSignature(secret: string) {
  return async function checkSignature(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    const signature = request.headers["x-signature"];
    if (
      typeof signature !== "string" ||
      request.rawBody === undefined ||
      !verifyHmacSha256Hex(secret, request.rawBody, signature)
    ) {
      return reply.code(401).send({ error: "invalid_signature" });
    }
  };
}

/** Without a configured reviewer role every actor may review. */
export function reviewerRolePredicate(reviewerRoleId: string | null): ReviewerPredicate {
  return (actor) => reviewerRoleId === null || actor.roleIds.includes(reviewerRoleId);
}
