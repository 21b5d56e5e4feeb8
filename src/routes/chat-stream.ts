import { randomUUID } from "node:crypto";

import type { FastifyInstance } from "fastify";

import type { Logger } from "../lib/logger.js";
import type { ChatRuntime } from "../lib/runtime.js";
import { toSseFrame } from "../streams/chat-events.js";
import { chatRequestSchema, isAuthorized } from "./chat-request.js";

export async function registerChatStreamRoute(options: {
  app: FastifyInstance;
  runtime: ChatRuntime;
  logger: Logger;
  debug: boolean;
  apiAuthToken?: string;
}): Promise<void> {
  const { app, runtime, logger, debug, apiAuthToken } = options;

  app.post("/api/chat/stream", async (request, reply) => {
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

    const body = bodyResult.data;
    const threadId = body.threadId?.trim() || randomUUID();
    const abortController = new AbortController();

    reply.hijack();
    reply.raw.writeHead(200, {
      "Content-Type": "text/event-stream; charset=utf-8",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
      "X-Thread-Id": threadId,
    });

    const heartbeat = setInterval(() => {
      if (!reply.raw.destroyed) {
        reply.raw.write(": ping\n\n");
      }
    }, 15_000);

    reply.raw.on("close", () => {
      if (!reply.raw.writableFinished) {
        abortController.abort();
      }
      clearInterval(heartbeat);
    });

    try {
      for await (const event of runtime.run({
        ...body,
        threadId,
        signal: abortController.signal,
      })) {
        if (event.type === "debug" && !debug) {
          continue;
        }

        if (!reply.raw.destroyed) {
          reply.raw.write(toSseFrame(event));
        }
      }
    } catch (error) {
      logger.error("SSE request failed", {
        error,
      });
      if (!reply.raw.destroyed) {
        reply.raw.write(
          toSseFrame({
            type: "error",
            message: error instanceof Error ? error.message : String(error),
            code: "SSE_ROUTE_FAILED",
          }),
        );
        reply.raw.write(
          toSseFrame({
            type: "done",
            finishReason: "error",
          }),
        );
      }
    } finally {
      clearInterval(heartbeat);
      if (!reply.raw.destroyed) {
        reply.raw.end();
      }
    }
  });
}
