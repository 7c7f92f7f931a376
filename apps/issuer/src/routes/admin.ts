/**
 * Admin routes: issuer config and credential mutations.
 *
 *   POST /admin/public-key
 *   POST /admin/fee-rate
 *   POST /admin/price-feed
 *   POST /admin/credentials/:identity/verified
 *   POST /admin/credentials/:identity/expiry
 *   POST /admin/credentials/:identity/metadata
 *
 * Every body is a signed envelope; the authority rejects non-admin callers.
 */

import type { FastifyInstance } from "fastify";
import {
  ADMIN_OPS,
  InvalidInputError,
  SetExpiryV1,
  SetFeeRateV1,
  SetMetadataV1,
  SetPriceFeedV1,
  SetPublicKeyV1,
  SetVerifiedV1,
  parseU64,
} from "@kycbound/protocol";
import { authenticate } from "../auth.js";
import { credentialView, issuerView } from "../views.js";
import type { RouteContext } from "./context.js";

interface IdentityParams {
  identity: string;
}

/** The path names the credential; the signed payload must agree. */
function samePath(params: IdentityParams, identity: string): void {
  if (params.identity !== identity) {
    throw new InvalidInputError("identity", "path and signed payload disagree");
  }
}

export function adminRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { orchestrator, authority } = ctx;

  // ── Issuer config ──────────────────────────────────────────────

  app.post<{ Body: SetPublicKeyV1 }>(
    "/admin/public-key",
    { schema: { body: SetPublicKeyV1 } },
    async (request) => {
      const caller = await authenticate(request.body, ADMIN_OPS.setPublicKey, ctx.auth);
      await orchestrator.setPublicKey(caller, request.body.payload.public_key);
      return issuerView(authority.snapshot());
    },
  );

  app.post<{ Body: SetFeeRateV1 }>(
    "/admin/fee-rate",
    { schema: { body: SetFeeRateV1 } },
    async (request) => {
      const caller = await authenticate(request.body, ADMIN_OPS.setFeeRate, ctx.auth);
      const feePerYear = parseU64("fee_per_year", request.body.payload.fee_per_year);
      await orchestrator.setFeeRate(caller, feePerYear);
      return issuerView(authority.snapshot());
    },
  );

  app.post<{ Body: SetPriceFeedV1 }>(
    "/admin/price-feed",
    { schema: { body: SetPriceFeedV1 } },
    async (request) => {
      const caller = await authenticate(request.body, ADMIN_OPS.setPriceFeed, ctx.auth);
      await orchestrator.setPriceFeed(caller, request.body.payload.price_feed_id);
      return issuerView(authority.snapshot());
    },
  );

  // ── Credential mutations ───────────────────────────────────────

  app.post<{ Params: IdentityParams; Body: SetVerifiedV1 }>(
    "/admin/credentials/:identity/verified",
    { schema: { body: SetVerifiedV1 } },
    async (request) => {
      const caller = await authenticate(request.body, ADMIN_OPS.setVerified, ctx.auth);
      const { identity, verified } = request.body.payload;
      samePath(request.params, identity);
      return credentialView(await orchestrator.setVerified(caller, identity, verified));
    },
  );

  app.post<{ Params: IdentityParams; Body: SetExpiryV1 }>(
    "/admin/credentials/:identity/expiry",
    { schema: { body: SetExpiryV1 } },
    async (request) => {
      const caller = await authenticate(request.body, ADMIN_OPS.setExpiry, ctx.auth);
      const { identity } = request.body.payload;
      samePath(request.params, identity);
      const expiry = parseU64("expiry", request.body.payload.expiry);
      return credentialView(await orchestrator.setExpiry(caller, identity, expiry));
    },
  );

  app.post<{ Params: IdentityParams; Body: SetMetadataV1 }>(
    "/admin/credentials/:identity/metadata",
    { schema: { body: SetMetadataV1 } },
    async (request) => {
      const caller = await authenticate(request.body, ADMIN_OPS.setMetadata, ctx.auth);
      const { identity, metadata } = request.body.payload;
      samePath(request.params, identity);
      return credentialView(await orchestrator.setMetadata(caller, identity, metadata));
    },
  );
}
