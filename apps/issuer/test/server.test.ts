/**
 * HTTP API: signed envelopes, status mapping, query routes.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import {
  deriveCredentialKey,
  generateKeypair,
  signRequest,
  toHex,
  type MintTerms,
} from "@kycbound/protocol";
import { MockPriceFeedClient } from "@kycbound/price-feed";
import { MemoryLedger } from "@kycbound/ledger-client";
import { buildApp } from "../src/server.js";
import {
  FEED,
  NAMESPACE,
  NOW_MS,
  NOW_S,
  ONE_YEAR,
  approve,
  issuerConfig,
  makeKeys,
  type Keypair,
  type Keys,
} from "./helpers.js";

let app: FastifyInstance;
let keys: Keys;
let receiver: Keypair;
let receiverId: string;
let feed: MockPriceFeedClient;
let ledger: MemoryLedger;
let clockMs: number;
let tick: number;

beforeEach(async () => {
  clockMs = NOW_MS;
  tick = 0;
  keys = await makeKeys();
  receiver = await generateKeypair();
  receiverId = toHex(receiver.publicKey);
  feed = new MockPriceFeedClient();
  feed.setQuote(FEED, 1_000_000_000n, -8);
  ledger = new MemoryLedger();
  ledger.fund(receiverId, 10_000_000n);
  app = await buildApp({
    issuer: issuerConfig(keys),
    priceFeed: feed,
    ledger,
    now: () => clockMs,
    logger: false,
  });
});

afterEach(async () => {
  await app.close();
});

// ── Helpers ────────────────────────────────────────────────────────

/** Distinct timestamps keep otherwise identical envelopes apart. */
function stamp(): number {
  return clockMs + tick++;
}

async function envelope(signer: Keypair, op: string, payload: Record<string, unknown>) {
  return {
    caller: toHex(signer.publicKey),
    sig: await signRequest(signer.privateKey, op, payload),
    payload,
  };
}

function mintTerms(overrides?: Partial<MintTerms>): MintTerms {
  return {
    receiver: receiverId,
    metadata: "ipfs://kyc/receiver",
    expiry: NOW_S + ONE_YEAR,
    duration: ONE_YEAR,
    tier: "basic",
    ...overrides,
  };
}

async function mintPayload(overrides?: Partial<MintTerms>, freshness: bigint = 0n) {
  const t = mintTerms(overrides);
  return {
    receiver: t.receiver,
    metadata: t.metadata,
    expiry: t.expiry.toString(),
    duration: t.duration.toString(),
    tier: t.tier,
    signature: await approve(keys, t, freshness),
    timestamp_ms: stamp(),
  };
}

async function postMint(overrides?: Partial<MintTerms>) {
  return app.inject({
    method: "POST",
    url: "/mint",
    payload: await envelope(receiver, "mint", await mintPayload(overrides)),
  });
}

async function admin(url: string, op: string, payload: Record<string, unknown>, signer?: Keypair) {
  return app.inject({
    method: "POST",
    url,
    payload: await envelope(signer ?? keys.admin, op, { ...payload, timestamp_ms: stamp() }),
  });
}

// ── Mint ───────────────────────────────────────────────────────────

describe("POST /mint", () => {
  it("mints and charges the receiver", async () => {
    const res = await postMint();
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      key: deriveCredentialKey(NAMESPACE, receiverId),
      fee: "5000000",
    });
    expect(await ledger.balanceOf(receiverId)).toBe(5_000_000n);
  });

  it("returns 409 on a second mint", async () => {
    await postMint();
    const res = await postMint();
    expect(res.statusCode).toBe(409);
    expect(res.json().error).toBe("duplicate_credential");
  });

  it("returns 403 when the caller is not the receiver", async () => {
    const other = await generateKeypair();
    const res = await app.inject({
      method: "POST",
      url: "/mint",
      payload: await envelope(other, "mint", await mintPayload()),
    });
    expect(res.statusCode).toBe(403);
    expect(res.json().error).toBe("unauthorized");
  });

  it("returns 401 auth_failed for an approval of different terms", async () => {
    const payload = { ...(await mintPayload()), signature: (await mintPayload({ tier: "gold" })).signature };
    const res = await app.inject({
      method: "POST",
      url: "/mint",
      payload: await envelope(receiver, "mint", payload),
    });
    expect(res.statusCode).toBe(401);
    expect(res.json().error).toBe("auth_failed");
    expect(await ledger.balanceOf(receiverId)).toBe(10_000_000n);
  });

  it("returns 401 for a request signature over a different op", async () => {
    const payload = await mintPayload();
    const res = await app.inject({
      method: "POST",
      url: "/mint",
      payload: {
        caller: receiverId,
        sig: await signRequest(receiver.privateKey, "set_fee_rate", payload),
        payload,
      },
    });
    expect(res.statusCode).toBe(401);
    expect(res.json().error).toBe("invalid_request_signature");
  });

  it("returns 401 for a stale timestamp", async () => {
    const payload = { ...(await mintPayload()), timestamp_ms: NOW_MS - 10 * 60_000 };
    const res = await app.inject({
      method: "POST",
      url: "/mint",
      payload: await envelope(receiver, "mint", payload),
    });
    expect(res.statusCode).toBe(401);
    expect(res.json().error).toBe("stale_request");
  });

  it("returns 400 for a malformed body", async () => {
    const { tier: _tier, ...payload } = await mintPayload();
    const res = await app.inject({
      method: "POST",
      url: "/mint",
      payload: await envelope(receiver, "mint", payload),
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_request");
  });

  it("returns 402 when the receiver cannot pay", async () => {
    const res = await postMint({ duration: ONE_YEAR * 3n });
    expect(res.statusCode).toBe(402);
    expect(res.json().error).toBe("insufficient_funds");
  });

  it("returns 502 when the oracle quote is unusable", async () => {
    feed.setQuote(FEED, 0n, -8);
    const res = await postMint();
    expect(res.statusCode).toBe(502);
    expect(res.json().error).toBe("oracle_error");
  });

  it("returns 422 when the fee overflows u64", async () => {
    feed.setQuote(FEED, 1n, -19);
    const res = await postMint();
    expect(res.statusCode).toBe(422);
    expect(res.json().error).toBe("arithmetic_overflow");
  });
});

// ── Queries ────────────────────────────────────────────────────────

describe("queries", () => {
  it("answer for a minted credential", async () => {
    await postMint();
    const key = deriveCredentialKey(NAMESPACE, receiverId);

    const keyRes = await app.inject({ method: "GET", url: `/credentials/${receiverId}/key` });
    expect(keyRes.json()).toEqual({ identity: receiverId, key });

    const valid = await app.inject({ method: "GET", url: `/credentials/${receiverId}/valid` });
    expect(valid.json()).toEqual({ identity: receiverId, valid: true });

    const tier = await app.inject({ method: "GET", url: `/credential/${key}/tier` });
    expect(tier.json()).toEqual({ key, tier: "basic" });

    const expiry = await app.inject({ method: "GET", url: `/credential/${key}/expiry` });
    expect(expiry.json()).toEqual({ key, expiry: (NOW_S + ONE_YEAR).toString() });

    const full = await app.inject({ method: "GET", url: `/credential/${key}` });
    expect(full.json()).toEqual({
      key,
      owner: receiverId,
      verified: true,
      expiry: (NOW_S + ONE_YEAR).toString(),
      tier: "basic",
      metadata: "ipfs://kyc/receiver",
      transferable: false,
      created_at: NOW_S.toString(),
    });
  });

  it("return 404 for unknown credentials", async () => {
    const res = await app.inject({ method: "GET", url: `/credential/${"00".repeat(32)}/tier` });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe("not_found");
  });

  it("answer validity for anything, never erroring", async () => {
    const res = await app.inject({ method: "GET", url: "/credentials/nonsense/valid" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ identity: "nonsense", valid: false });
  });

  it("quote fees", async () => {
    const res = await app.inject({ method: "GET", url: `/fee?duration=${ONE_YEAR}` });
    expect(res.json()).toEqual({ duration: "31536000", fee: "5000000" });

    const zero = await app.inject({ method: "GET", url: "/fee?duration=0" });
    expect(zero.json()).toEqual({ duration: "0", fee: "0" });
    expect(feed.totalCalls()).toBe(1);
  });

  it("serve the issuer config and event log", async () => {
    await postMint();
    const issuer = await app.inject({ method: "GET", url: "/issuer" });
    expect(issuer.json()).toMatchObject({ namespace: NAMESPACE, admin: keys.adminId, fee_per_year: "500000" });

    const events = await app.inject({ method: "GET", url: "/events?from=1" });
    const body = events.json();
    expect(body.count).toBe(1);
    expect(body.events[0].type).toBe("credential.mint.v1");
    expect(body.events[0].payload.fee).toBe("5000000");
  });

  it("report health", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.json()).toMatchObject({ status: "ok", credentials: 0 });
  });
});

// ── Admin ──────────────────────────────────────────────────────────

describe("admin routes", () => {
  it("update the fee rate for the admin only", async () => {
    const denied = await admin("/admin/fee-rate", "set_fee_rate", { fee_per_year: "1000000" }, receiver);
    expect(denied.statusCode).toBe(403);

    const res = await admin("/admin/fee-rate", "set_fee_rate", { fee_per_year: "1000000" });
    expect(res.statusCode).toBe(200);
    expect(res.json().fee_per_year).toBe("1000000");

    const fee = await app.inject({ method: "GET", url: `/fee?duration=${ONE_YEAR}` });
    expect(fee.json().fee).toBe("10000000");
  });

  it("rotate the public key and the price feed", async () => {
    const pk = await admin("/admin/public-key", "set_public_key", { public_key: "ab".repeat(32) });
    expect(pk.json().public_key).toBe("ab".repeat(32));

    const pf = await admin("/admin/price-feed", "set_price_feed", { price_feed_id: "cd".repeat(32) });
    expect(pf.json().price_feed_id).toBe("cd".repeat(32));

    // Old approvals no longer verify under the rotated key.
    const res = await postMint({ duration: 0n });
    expect(res.statusCode).toBe(401);
  });

  it("revoke a credential", async () => {
    await postMint();
    const res = await admin(`/admin/credentials/${receiverId}/verified`, "set_verified", {
      identity: receiverId,
      verified: false,
    });
    expect(res.statusCode).toBe(200);
    expect(res.json().verified).toBe(false);

    const valid = await app.inject({ method: "GET", url: `/credentials/${receiverId}/valid` });
    expect(valid.json().valid).toBe(false);
  });

  it("move expiry and rewrite metadata", async () => {
    await postMint();
    const exp = await admin(`/admin/credentials/${receiverId}/expiry`, "set_expiry", {
      identity: receiverId,
      expiry: NOW_S.toString(),
    });
    expect(exp.json().expiry).toBe(NOW_S.toString());

    const meta = await admin(`/admin/credentials/${receiverId}/metadata`, "set_metadata", {
      identity: receiverId,
      metadata: "ipfs://kyc/receiver-v2",
    });
    expect(meta.json().metadata).toBe("ipfs://kyc/receiver-v2");
  });

  it("reject a path that disagrees with the signed identity", async () => {
    await postMint();
    const res = await admin(`/admin/credentials/${"bb".repeat(32)}/verified`, "set_verified", {
      identity: receiverId,
      verified: false,
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_input");
  });

  it("reject a replayed admin request", async () => {
    await postMint();
    const revoke = await envelope(keys.admin, "set_verified", {
      identity: receiverId,
      verified: false,
      timestamp_ms: stamp(),
    });
    const url = `/admin/credentials/${receiverId}/verified`;

    const first = await app.inject({ method: "POST", url, payload: revoke });
    expect(first.statusCode).toBe(200);

    const restore = await admin(url, "set_verified", { identity: receiverId, verified: true });
    expect(restore.statusCode).toBe(200);

    clockMs += 61_000;
    const replay = await app.inject({ method: "POST", url, payload: revoke });
    expect(replay.statusCode).toBe(401);
    expect(replay.json().error).toBe("replayed_request");

    const valid = await app.inject({ method: "GET", url: `/credentials/${receiverId}/valid` });
    expect(valid.json().valid).toBe(true);
  });

  it("reject a replay after the skew window as stale", async () => {
    const payload = await envelope(keys.admin, "set_fee_rate", {
      fee_per_year: "1",
      timestamp_ms: stamp(),
    });
    const first = await app.inject({ method: "POST", url: "/admin/fee-rate", payload });
    expect(first.statusCode).toBe(200);

    clockMs += 6 * 60_000;
    const replay = await app.inject({ method: "POST", url: "/admin/fee-rate", payload });
    expect(replay.statusCode).toBe(401);
    expect(replay.json().error).toBe("stale_request");
  });

  it("return 404 when the credential does not exist", async () => {
    const res = await admin(`/admin/credentials/${receiverId}/expiry`, "set_expiry", {
      identity: receiverId,
      expiry: "1",
    });
    expect(res.statusCode).toBe(404);
  });
});
