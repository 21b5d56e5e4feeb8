import type { FastifyRequest } from "fastify";
import { z } from "zod";

export const chatRequestSchema = z
  .object({
    input: z.string().optional(),
    toolResults: z
      .array(
        z.object({
          toolUseId: z.string().min(1),
          content: z.string(),
          isError: z.boolean().optional(),
        }),
      )
      .optional(),
    threadId: z.string().optional(),
    system: z.string().optional(),
    model: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional(),
  })
  .refine((body) => Boolean(body.input?.trim()) || Boolean(body.toolResults?.length), {
    message: "Either input or toolResults is required",
    path: ["input"],
  });

export function isAuthorized(request: FastifyRequest, token: string): boolean {
  const header = request.headers.authorization;
  if (!header) {
    return false;
  }

  const [scheme, value] = header.split(" ");
  return scheme === "Bearer" && value === token;
}
