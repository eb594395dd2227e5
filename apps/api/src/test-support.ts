import type { FastifyInstance, LightMyRequestResponse } from "fastify";
import { pino } from "pino";
import { parseApplicationConfig, type ApplicationConfigInput } from "./lib/app-config.js";
import type { AppEnv } from "./lib/env.js";
import { hmacSha256Hex } from "./lib/hmac.js";
import { MemoryTransport } from "./lib/memory-transport.js";
import { MemoryApplicationRepo, MemoryCooldownRepo, MemoryMessageRefRepo } from "./repos/memory-repos.js";
import { buildApp } from "./server.js";

export const INTERACTIONS_SECRET = "test-interactions-secret";

export const silentLogger = pino({ level: "silent" });

export const testEnv: AppEnv = {
  NODE_ENV: "test",
  PORT: 8080,
  LOG_LEVEL: "silent",
  DATABASE_URL: undefined,
  GATEWAY_URL: undefined,
  GATEWAY_SECRET: "test-gateway-secret",
  INTERACTIONS_SECRET,
  APPLICATION_CONFIG_PATH: "config/application.json",
};

export interface TestHarness {
  app: FastifyInstance;
  transport: MemoryTransport;
  applications: MemoryApplicationRepo;
  messageRefs: MemoryMessageRefRepo;
  post(url: string, body: unknown): Promise<LightMyRequestResponse>;
}

export async function buildTestApp(
  config: Partial<ApplicationConfigInput> = {},
  clock?: () => Date,
): Promise<TestHarness> {
  const transport = new MemoryTransport();
  const applications = new MemoryApplicationRepo();
  const messageRefs = new MemoryMessageRefRepo();

  const app = await buildApp({
    env: testEnv,
    config: parseApplicationConfig({ staffChannelId: "staff", ...config }),
    repos: {
      applications,
      cooldowns: new MemoryCooldownRepo(),
      messageRefs,
    },
    transport,
    clock,
  });

  return {
    app,
    transport,
    applications,
    messageRefs,
    post: (url, body) => signedPost(app, url, body),
  };
}

export function signedPost(app: FastifyInstance, url: string, body: unknown): Promise<LightMyRequestResponse> {
  const payload = JSON.stringify(body);
  return app.inject({
    method: "POST",
    url,
    headers: {
      "content-type": "application/json",
      "x-signature": hmacSha256Hex(INTERACTIONS_SECRET, payload),
    },
    payload,
  });
}
