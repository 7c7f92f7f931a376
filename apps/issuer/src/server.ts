/**
 * Issuer server: soulbound KYC credential issuance over HTTP.
 *
 * Routes:
 *   POST /mint                                    redeem an authority signature (caller = receiver)
 *   POST /admin/{public-key,fee-rate,price-feed}  issuer config (admin)
 *   POST /admin/credentials/:identity/{verified,expiry,metadata}  credential mutations (admin)
 *   GET  /credentials/:identity/{key,valid}       key lookup, validity predicate
 *   GET  /credential/:key[/tier|/expiry]          credential reads
 *   GET  /fee?duration=                           fee quote in asset base units
 *   GET  /issuer                                  public issuer config
 *   GET  /events?from=                            event log
 *   GET  /health                                  health check
 *
 * Domain errors carry a stable `code`; the error handler maps it to a
 * status and replies { error: code, detail }.
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyError } from "fastify";
import { KycError, parseU64, type KycErrorCode } from "@kycbound/protocol";
import {
  HermesPriceClient,
  PriceOracleAdapter,
  type PriceFeedClient,
} from "@kycbound/price-feed";
import {
  LedgerError,
  MemoryLedger,
  type LedgerClient,
  type LedgerErrorCode,
} from "@kycbound/ledger-client";
import { config } from "./config.js";
import { IssuerAuthority, type IssuerConfig } from "./authority/issuer-authority.js";
import { CredentialRegistry } from "./registry/credential-registry.js";
import { MintOrchestrator } from "./mint/orchestrator.js";
import { SerialExecutor } from "./executor.js";
import { MemoryEventLog, type EventLog } from "./event-log/writer.js";
import { RequestAuthError, SeenRequests } from "./auth.js";
import { mintRoutes } from "./routes/mint.js";
import { adminRoutes } from "./routes/admin.js";
import { queryRoutes } from "./routes/query.js";
import { healthRoutes } from "./routes/health.js";
import type { RouteContext } from "./routes/context.js";

export interface IssuerDeps {
  /** Initial issuer config; read from env when absent. */
  issuer?: IssuerConfig;
  priceFeed?: PriceFeedClient;
  /** Identity ledger; an in-memory ledger (dev mode) when absent. */
  ledger?: LedgerClient;
  events?: EventLog;
  /** Wall clock, ms since epoch. */
  now?: () => number;
  maxSkewMs?: number;
  logger?: boolean;
}

const KYC_STATUS: Record<KycErrorCode, number> = {
  unauthorized: 403,
  auth_failed: 401,
  oracle_error: 502,
  arithmetic_overflow: 422,
  duplicate_credential: 409,
  not_found: 404,
  non_transferable: 409,
  invalid_input: 400,
};

const LEDGER_STATUS: Record<LedgerErrorCode, number> = {
  insufficient_funds: 402,
  invalid_amount: 400,
};

function issuerConfigFromEnv(): IssuerConfig {
  return {
    admin: config.admin,
    namespace: config.namespace,
    publicKey: config.publicKey,
    feePerYear: parseU64("ISSUER_FEE_PER_YEAR", config.feePerYear),
    priceFeedId: config.priceFeedId,
    beneficiary: config.beneficiary,
  };
}

export async function buildApp(deps?: IssuerDeps) {
  const app = Fastify({ logger: deps?.logger ?? true });
  const now = deps?.now ?? Date.now;

  const authority = new IssuerAuthority(deps?.issuer ?? issuerConfigFromEnv());
  const registry = new CredentialRegistry(authority);
  const events = deps?.events ?? new MemoryEventLog(config.eventLogMaxEvents);

  const priceFeed =
    deps?.priceFeed ??
    new HermesPriceClient({ baseUrl: config.hermesUrl, timeoutMs: config.hermesTimeoutMs });

  let ledger = deps?.ledger;
  if (!ledger) {
    app.log.warn("No ledger configured: dev mode (in-memory ledger, unfunded accounts)");
    ledger = new MemoryLedger();
  }

  const orchestrator = new MintOrchestrator({
    authority,
    registry,
    oracle: new PriceOracleAdapter(priceFeed),
    ledger,
    events,
    executor: new SerialExecutor(),
    logger: app.log,
    now,
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    if (err instanceof KycError) {
      return reply.status(KYC_STATUS[err.code]).send({ error: err.code, detail: err.message });
    }
    if (err instanceof LedgerError) {
      return reply.status(LEDGER_STATUS[err.code]).send({ error: err.code, detail: err.message });
    }
    if (err instanceof RequestAuthError) {
      return reply.status(401).send({ error: err.code, detail: err.message });
    }
    const status = err.statusCode ?? 500;
    if (status < 500) {
      return reply.status(status).send({ error: "invalid_request", detail: err.message });
    }
    request.log.error(err);
    return reply.status(500).send({ error: "internal_error" });
  });

  const ctx: RouteContext = {
    authority,
    registry,
    orchestrator,
    events,
    auth: {
      now,
      maxSkewMs: deps?.maxSkewMs ?? config.requestMaxSkewMs,
      seen: new SeenRequests(),
    },
  };

  mintRoutes(app, ctx);
  adminRoutes(app, ctx);
  queryRoutes(app, ctx);
  healthRoutes(app, registry);

  const snapshot = authority.snapshot();
  app.log.info(
    { namespace: snapshot.namespace, admin: snapshot.admin, price_feed_id: snapshot.priceFeedId },
    "issuer ready",
  );

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── issuer config ───");
  console.log(`  port:          ${config.port}`);
  console.log(`  admin:         ${config.admin || "(unset)"}`);
  console.log(`  namespace:     ${config.namespace || "(unset)"}`);
  console.log(`  public_key:    ${config.publicKey || "(unset)"}`);
  console.log(`  fee_per_year:  ${config.feePerYear} µUSD`);
  console.log(`  price_feed_id: ${config.priceFeedId || "(unset)"}`);
  console.log(`  hermes:        ${config.hermesUrl}`);
  console.log("─────────────────────");

  const app = await buildApp();
  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
