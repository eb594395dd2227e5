import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(8080),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATABASE_URL: z.string().url().optional(),
  GATEWAY_URL: z.string().url().optional(),
  GATEWAY_SECRET: z.string().min(8).default("dev-gateway-secret"),
  INTERACTIONS_SECRET: z.string().min(8).default("dev-interactions-secret"),
  APPLICATION_CONFIG_PATH: z.string().min(1).default("config/application.json"),
});

export type AppEnv = z.infer<typeof envSchema>;

export function getEnv(input: NodeJS.ProcessEnv): AppEnv {
  return envSchema.parse(input);
}
