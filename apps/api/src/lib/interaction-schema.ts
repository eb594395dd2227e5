import { z } from "zod";

const actorSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1).optional(),
  roleIds: z.array(z.string().min(1)).default([]),
});

const applicationIdSchema = z.string().min(1);

const commandSchema = z.discriminatedUnion("command", [
  z.object({
    command: z.literal("apply"),
    actor: actorSchema,
  }),
  z.object({
    command: z.literal("view-transcript"),
    actor: actorSchema,
    applicationId: applicationIdSchema,
  }),
  z.object({
    command: z.literal("confirm-results"),
    actor: actorSchema,
    applicationId: applicationIdSchema,
  }),
]);

const directMessageSchema = z.object({
  actor: actorSchema,
  text: z.string().min(1),
});

const decisionSchema = z.enum(["approved", "denied"]);

// Form fields arrive as strings; a blank one is not a zero.
const numericSchema = z.union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())]);

const reviewActionSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("pick"),
    actor: actorSchema,
    applicationId: applicationIdSchema,
  }),
  z.object({
    action: z.literal("score"),
    actor: actorSchema,
    applicationId: applicationIdSchema,
    value: numericSchema,
    scale: numericSchema.pipe(z.number().int()),
  }),
  z.object({
    action: z.literal("open-decision"),
    actor: actorSchema,
    applicationId: applicationIdSchema,
    decision: decisionSchema,
  }),
  z.object({
    action: z.literal("decide"),
    actor: actorSchema,
    applicationId: applicationIdSchema,
    decision: decisionSchema,
    reason: z.string().trim().min(1).max(1000),
  }),
  z.object({
    action: z.literal("view-transcript"),
    actor: actorSchema,
    applicationId: applicationIdSchema,
  }),
]);

export type CommandInput = z.infer<typeof commandSchema>;
export type DirectMessageInput = z.infer<typeof directMessageSchema>;
export type ReviewActionInput = z.infer<typeof reviewActionSchema>;

export function parseCommandInput(input: unknown): CommandInput {
  return commandSchema.parse(input);
}

export function parseDirectMessageInput(input: unknown): DirectMessageInput {
  return directMessageSchema.parse(input);
}

export function parseReviewActionInput(input: unknown): ReviewActionInput {
  return reviewActionSchema.parse(input);
}
