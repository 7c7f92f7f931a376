/**
 * GET /health: liveness plus a credential count.
 */

import type { FastifyInstance } from "fastify";
import type { CredentialRegistry } from "../registry/credential-registry.js";

export function healthRoutes(app: FastifyInstance, registry: CredentialRegistry): void {
  app.get("/health", async (_request, reply) => {
    return reply.send({ status: "ok", timestamp: Date.now(), credentials: registry.size() });
  });
}
