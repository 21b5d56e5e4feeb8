import Fastify, { type FastifyInstance } from "fastify";

import { loadAppConfig } from "./config/env.js";
import { DEFAULT_CHAT_OPTIONS } from "./config/models.js";
import { createLogger, type Logger } from "./lib/logger.js";
import { createChatRuntime, type ChatRuntime } from "./lib/runtime.js";
import { registerChatRoute } from "./routes/chat.js";
import { registerChatStreamRoute } from "./routes/chat-stream.js";
import { registerHealthRoute } from "./routes/health.js";
import type { AppConfig } from "./types/config.js";

export async function buildServer(options?: {
  config?: AppConfig;
  logger?: Logger;
  runtime?: ChatRuntime;
}): Promise<FastifyInstance> {
  const config = options?.config ?? loadAppConfig();
  const logger = options?.logger ?? createLogger(config.debug);
  const runtime = options?.runtime ?? (await createChatRuntime(config, logger));
  const auth = config.apiAuthToken ? { apiAuthToken: config.apiAuthToken } : {};

  const app = Fastify({
    logger: false,
  });

  await registerHealthRoute(app, {
    model: config.chatOptions.model ?? DEFAULT_CHAT_OPTIONS.model,
    location: config.vertex.location,
  });
  await registerChatStreamRoute({
    app,
    runtime,
    logger,
    debug: config.debug,
    ...auth,
  });
  await registerChatRoute({
    app,
    runtime,
    logger,
    ...auth,
  });

  app.addHook("onClose", async () => {
    await runtime.close();
  });

  return app;
}

async function start(): Promise<void> {
  const config = loadAppConfig();
  const logger = createLogger(config.debug);
  const app = await buildServer({ config, logger });

  try {
    await app.listen({
      host: "0.0.0.0",
      port: config.port,
    });
    logger.info("Server started", {
      port: config.port,
      projectId: config.vertex.projectId,
      location: config.vertex.location,
      model: config.chatOptions.model,
    });
  } catch (error) {
    logger.error("Failed to start server", {
      error,
    });
    process.exitCode = 1;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void start();
}
