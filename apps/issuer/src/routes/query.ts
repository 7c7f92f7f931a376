/**
 * Read-only queries. None of these mutate state or take a signature.
 *
 * GET /credentials/:identity/key   : credential_key_of
 * GET /credentials/:identity/valid : is_valid (total: never errors)
 * GET /credential/:key             : full credential record
 * GET /credential/:key/tier        : tier_of
 * GET /credential/:key/expiry      : expiry_of
 * GET /fee?duration=               : required_fee
 * GET /issuer                      : public issuer config
 * GET /events?from=                : event log
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import { Hex32String, NotFoundError, U64String, parseU64 } from "@kycbound/protocol";
import { credentialView, issuerView } from "../views.js";
import type { RouteContext } from "./context.js";

const IdentityParams = Type.Object({ identity: Hex32String });
type IdentityParams = Static<typeof IdentityParams>;

const KeyParams = Type.Object({ key: Hex32String });
type KeyParams = Static<typeof KeyParams>;

const FeeQuery = Type.Object({ duration: U64String });
type FeeQuery = Static<typeof FeeQuery>;

const EventsQuery = Type.Object({ from: Type.Optional(Type.Integer({ minimum: 0 })) });
type EventsQuery = Static<typeof EventsQuery>;

export function queryRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { registry, orchestrator, authority, events } = ctx;

  app.get<{ Params: IdentityParams }>(
    "/credentials/:identity/key",
    { schema: { params: IdentityParams } },
    async (request) => {
      const { identity } = request.params;
      return { identity, key: registry.credentialKeyOf(identity) };
    },
  );

  app.get<{ Params: { identity: string } }>(
    "/credentials/:identity/valid",
    async (request) => {
      const { identity } = request.params;
      return { identity, valid: registry.isValid(identity, orchestrator.nowSeconds()) };
    },
  );

  app.get<{ Params: KeyParams }>(
    "/credential/:key",
    { schema: { params: KeyParams } },
    async (request) => {
      const credential = registry.get(request.params.key);
      if (!credential) throw new NotFoundError(`key ${request.params.key}`);
      return credentialView(credential);
    },
  );

  app.get<{ Params: KeyParams }>(
    "/credential/:key/tier",
    { schema: { params: KeyParams } },
    async (request) => {
      const { key } = request.params;
      return { key, tier: registry.tierOf(key) };
    },
  );

  app.get<{ Params: KeyParams }>(
    "/credential/:key/expiry",
    { schema: { params: KeyParams } },
    async (request) => {
      const { key } = request.params;
      return { key, expiry: registry.expiryOf(key).toString() };
    },
  );

  app.get<{ Querystring: FeeQuery }>(
    "/fee",
    { schema: { querystring: FeeQuery } },
    async (request) => {
      const duration = parseU64("duration", request.query.duration);
      const fee = await orchestrator.requiredFee(duration);
      return { duration: duration.toString(), fee: fee.toString() };
    },
  );

  app.get("/issuer", async () => issuerView(authority.snapshot()));

  app.get<{ Querystring: EventsQuery }>(
    "/events",
    { schema: { querystring: EventsQuery } },
    async (request) => {
      const list = await events.list(request.query.from ?? 0);
      return { events: list, count: await events.count() };
    },
  );
}
