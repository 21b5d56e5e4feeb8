import type { FastifyInstance } from "fastify";

export async function registerHealthRoute(
  app: FastifyInstance,
  info: { model: string; location: string },
): Promise<void> {
  app.get("/healthz", async () => {
    return {
      ok: true,
      model: info.model,
      location: info.location,
      timestamp: new Date().toISOString(),
    };
  });
}
