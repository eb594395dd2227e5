import { readFile } from "node:fs/promises";
import { z } from "zod";

const DEFAULT_QUESTION_COUNT = 5;

const configSchema = z.object({
  questions: z
    .array(z.string().trim().min(1))
    .min(1)
    .default(Array.from({ length: DEFAULT_QUESTION_COUNT }, (_, i) => `Question ${i + 1}?`)),
  cooldownSeconds: z.number().int().min(0).default(300),
  templates: z
    .object({
      approved: z
        .string()
        .min(1)
        .default(
          "Congrats! Your application (ID {id}) has been approved. Reviewer: {reviewer}. Score: {score}/{scale}. Reason: {reason}",
        ),
      denied: z
        .string()
        .min(1)
        .default(
          "We're sorry, your application (ID {id}) has been denied. Reviewer: {reviewer}. Score: {score}/{scale}. Reason: {reason}",
        ),
    })
    .default({}),
  scoreScales: z.array(z.number().int().positive()).min(1).default([5, 10, 50, 100]),
  reviewerRoleId: z.string().min(1).nullable().default(null),
  staffChannelId: z.string().min(1),
});

export type ApplicationConfigInput = z.input<typeof configSchema>;

export interface ApplicationConfig {
  readonly questions: readonly string[];
  readonly cooldownSeconds: number;
  readonly templates: Readonly<{ approved: string; denied: string }>;
  readonly scoreScales: readonly number[];
  readonly reviewerRoleId: string | null;
  readonly staffChannelId: string;
}

/**
 * Validates and freezes a settings snapshot. The engine and workflow keep the
 * snapshot they were built with for their whole lifetime.
 */
export function parseApplicationConfig(input: unknown): ApplicationConfig {
  const parsed = configSchema.parse(input);
  return Object.freeze({
    questions: Object.freeze([...parsed.questions]),
    cooldownSeconds: parsed.cooldownSeconds,
    templates: Object.freeze({ ...parsed.templates }),
    scoreScales: Object.freeze([...parsed.scoreScales]),
    reviewerRoleId: parsed.reviewerRoleId,
    staffChannelId: parsed.staffChannelId,
  });
}

export async function loadApplicationConfig(path: string): Promise<ApplicationConfig> {
  const raw = await readFile(path, "utf8");
  return parseApplicationConfig(JSON.parse(raw));
}
