/**
 * POST /mint: receiver redeems an authority signature for a credential.
 *
 * The envelope caller must be the receiver. Fee is debited inside the
 * same ledger transaction that creates the credential.
 */

import type { FastifyInstance } from "fastify";
import { MINT_OP, MintRequestV1, parseU64 } from "@kycbound/protocol";
import { authenticate } from "../auth.js";
import type { RouteContext } from "./context.js";

export function mintRoutes(app: FastifyInstance, ctx: RouteContext): void {
  app.post<{ Body: MintRequestV1 }>(
    "/mint",
    { schema: { body: MintRequestV1 } },
    async (request) => {
      const body = request.body;
      const caller = await authenticate(body, MINT_OP, ctx.auth);
      const { payload } = body;

      const { key, fee } = await ctx.orchestrator.mint(caller, {
        receiver: payload.receiver,
        metadata: payload.metadata,
        expiry: parseU64("expiry", payload.expiry),
        duration: parseU64("duration", payload.duration),
        tier: payload.tier,
        signature: payload.signature,
      });
      return { key, fee: fee.toString() };
    },
  );
}
