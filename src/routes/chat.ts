import type { FastifyInstance } from "fastify";

import { AdapterError, VertexApiError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type { ChatRuntime } from "../lib/runtime.js";
import { chatRequestSchema, isAuthorized } from "./chat-request.js";

export async function registerChatRoute(options: {
  app: FastifyInstance;
  runtime: ChatRuntime;
  logger: Logger;
  apiAuthToken?: string;
}): Promise<void> {
  const { app, runtime, logger, apiAuthToken } = options;

  app.post("/api/chat", async (request, reply) => {
    if (apiAuthToken && !isAuthorized(request, apiAuthToken)) {
      return reply.code(401).send({
        error: "Unauthorized",
      });
    }

    const bodyResult = chatRequestSchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.code(400).send({
        error: "Invalid request body",
        issues: bodyResult.error.issues,
      });
    }

    try {
      const { threadId, response } = await runtime.complete(bodyResult.data);
      return reply.header("x-thread-id", threadId).send(response);
    } catch (error) {
      logger.error("Chat request failed", { error });
      const statusCode = error instanceof VertexApiError && error.statusCode < 500 ? error.statusCode : 502;
      return reply.code(statusCode).send({
        error: error instanceof Error ? error.message : String(error),
        code: error instanceof AdapterError ? error.code : "CHAT_FAILED",
      });
    }
  });
}
