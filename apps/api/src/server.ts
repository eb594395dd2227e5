import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import type { AppEnv } from "./lib/env.js";
import { getEnv } from "./lib/env.js";
import { createDbPool } from "./lib/db.js";
import { loadApplicationConfig, type ApplicationConfig } from "./lib/app-config.js";
import { reviewerRolePredicate } from "./lib/auth-guard.js";
import { GatewayTransport } from "./lib/gateway-transport.js";
import { InterviewEngine } from "./lib/interview-engine.js";
import { MemoryTransport } from "./lib/memory-transport.js";
import { MessageLedger } from "./lib/message-ledger.js";
import type { MessageTransport } from "./lib/message-transport.js";
import { NotificationDispatcher } from "./lib/notification-dispatcher.js";
import { ReviewWorkflow } from "./lib/review-workflow.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerCommandRoutes } from "./routes/commands.js";
import { registerMessageRoutes } from "./routes/messages.js";
import { registerReviewActionRoutes } from "./routes/review-actions.js";
import { PgApplicationRepo } from "./repos/application-repo.js";
import { PgCooldownRepo } from "./repos/cooldown-repo.js";
import { PgMessageRefRepo } from "./repos/message-ref-repo.js";
import { MemoryApplicationRepo, MemoryCooldownRepo, MemoryMessageRefRepo } from "./repos/memory-repos.js";
import type { ApplicationRepo } from "./repos/application-repo.js";
import type { CooldownRepo } from "./repos/cooldown-repo.js";
import type { MessageRefRepo } from "./repos/message-ref-repo.js";

interface AppDependencies {
  env?: AppEnv;
  config?: ApplicationConfig;
  repos?: {
    applications: ApplicationRepo;
    cooldowns: CooldownRepo;
    messageRefs: MessageRefRepo;
  };
  transport?: MessageTransport;
  clock?: () => Date;
}

export async function buildApp(deps: AppDependencies = {}): Promise<FastifyInstance> {
  const env = deps.env ?? getEnv(process.env);
  const config = deps.config ?? (await loadApplicationConfig(env.APPLICATION_CONFIG_PATH));

  const app = Fastify({
    logger: { level: env.LOG_LEVEL },
  });

  await app.register(cors, {
    origin: false,
  });

  await app.register(helmet);

  // Signatures are computed over the exact bytes the gateway sent.
  app.removeContentTypeParser("application/json");
  app.addContentTypeParser("application/json", { parseAs: "string" }, (request, body, done) => {
    const raw = typeof body === "string" ? body : body.toString("utf8");
    request.rawBody = raw;

    if (raw.length === 0) {
      done(null, undefined);
      return;
    }

    try {
      done(null, JSON.parse(raw));
    } catch {
      done(Object.assign(new Error("invalid_json"), { statusCode: 400 }), undefined);
    }
  });

  const repos = deps.repos ?? (() => {
    if (env.DATABASE_URL) {
      const db = createDbPool(env.DATABASE_URL);
      app.addHook("onClose", async () => {
        await db.end();
      });
      return {
        applications: new PgApplicationRepo(db),
        cooldowns: new PgCooldownRepo(db),
        messageRefs: new PgMessageRefRepo(db),
      };
    }

    app.log.warn("DATABASE_URL is not set; using in-memory repositories.");

    return {
      applications: new MemoryApplicationRepo(),
      cooldowns: new MemoryCooldownRepo(),
      messageRefs: new MemoryMessageRefRepo(),
    };
  })();

  const transport = deps.transport ?? (() => {
    if (env.GATEWAY_URL) {
      return new GatewayTransport({ url: env.GATEWAY_URL, secret: env.GATEWAY_SECRET });
    }

    app.log.warn("GATEWAY_URL is not set; outbound messages stay in memory.");
    return new MemoryTransport();
  })();

  const dispatcher = new NotificationDispatcher(transport, app.log);
  const ledger = new MessageLedger(repos.messageRefs, dispatcher, app.log);

  app.decorate(
    "interview",
    new InterviewEngine({
      applications: repos.applications,
      cooldowns: repos.cooldowns,
      ledger,
      config,
      log: app.log,
      clock: deps.clock,
    }),
  );

  app.decorate(
    "review",
    new ReviewWorkflow({
      applications: repos.applications,
      ledger,
      dispatcher,
      config,
      isReviewer: reviewerRolePredicate(config.reviewerRoleId),
      log: app.log,
    }),
  );

  const routeDeps = { interactionsSecret: env.INTERACTIONS_SECRET };

  await registerHealthRoutes(app);
  await registerCommandRoutes(app, routeDeps);
  await registerMessageRoutes(app, routeDeps);
  await registerReviewActionRoutes(app, routeDeps);

  return app;
}
