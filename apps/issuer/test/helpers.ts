/**
 * Shared fixtures: keys, a wired orchestrator, and a challenge signer.
 */

import { vi } from "vitest";
import {
  buildMintChallenge,
  generateKeypair,
  signMintChallenge,
  toHex,
  type MintTerms,
} from "@kycbound/protocol";
import { MockPriceFeedClient, PriceOracleAdapter } from "@kycbound/price-feed";
import { MemoryLedger, type LedgerClient } from "@kycbound/ledger-client";
import { IssuerAuthority, type IssuerConfig } from "../src/authority/issuer-authority.js";
import { CredentialRegistry } from "../src/registry/credential-registry.js";
import { MintOrchestrator } from "../src/mint/orchestrator.js";
import { SerialExecutor } from "../src/executor.js";
import { MemoryEventLog, type EventSink } from "../src/event-log/writer.js";

export const NAMESPACE = "11".repeat(32);
export const BENEFICIARY = "22".repeat(32);
export const FEED = "ff".repeat(32);
export const ONE_YEAR = 31_536_000n;
/** 2023-11-14T22:13:20Z */
export const NOW_MS = 1_700_000_000_000;
export const NOW_S = 1_700_000_000n;

export interface Keypair {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

export interface Keys {
  authority: Keypair;
  admin: Keypair;
  adminId: string;
}

export async function makeKeys(): Promise<Keys> {
  const authority = await generateKeypair();
  const admin = await generateKeypair();
  return { authority, admin, adminId: toHex(admin.publicKey) };
}

export function issuerConfig(keys: Keys): IssuerConfig {
  return {
    admin: keys.adminId,
    namespace: NAMESPACE,
    publicKey: toHex(keys.authority.publicKey),
    feePerYear: 500_000n, // $0.50 / year
    priceFeedId: FEED,
    beneficiary: BENEFICIARY,
  };
}

/** Authority signature over the terms at the given freshness. */
export function approve(keys: Keys, terms: MintTerms, freshness: bigint): Promise<string> {
  return signMintChallenge(
    keys.authority.privateKey,
    buildMintChallenge(NAMESPACE, terms, freshness),
  );
}

export function testLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export interface Harness {
  keys: Keys;
  authority: IssuerAuthority;
  registry: CredentialRegistry;
  feed: MockPriceFeedClient;
  ledger: MemoryLedger;
  events: MemoryEventLog;
  logger: ReturnType<typeof testLogger>;
  orchestrator: MintOrchestrator;
  clock: { ms: number };
}

export interface HarnessOptions {
  sink?: EventSink;
  /** Wrap the in-memory ledger the orchestrator sees. */
  ledger?: (inner: MemoryLedger) => LedgerClient;
}

export async function makeHarness(opts?: HarnessOptions): Promise<Harness> {
  const keys = await makeKeys();
  const authority = new IssuerAuthority(issuerConfig(keys));
  const registry = new CredentialRegistry(authority);
  const feed = new MockPriceFeedClient();
  feed.setQuote(FEED, 1_000_000_000n, -8); // $10.00
  const ledger = new MemoryLedger();
  const events = new MemoryEventLog();
  const logger = testLogger();
  const clock = { ms: NOW_MS };
  const orchestrator = new MintOrchestrator({
    authority,
    registry,
    oracle: new PriceOracleAdapter(feed),
    ledger: opts?.ledger ? opts.ledger(ledger) : ledger,
    events: opts?.sink ?? events,
    executor: new SerialExecutor(),
    logger,
    now: () => clock.ms,
  });
  return { keys, authority, registry, feed, ledger, events, logger, orchestrator, clock };
}
