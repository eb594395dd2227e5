import type { InterviewEngine } from "../lib/interview-engine.js";
import type { ReviewWorkflow } from "../lib/review-workflow.js";

declare module "fastify" {
  interface FastifyRequest {
    rawBody?: string;
  }

  interface FastifyInstance {
    interview: InterviewEngine;
    review: ReviewWorkflow;
  }
}
