/**
 * Mint orchestrator: fee collection + challenge verification + credential
 * creation as one all-or-nothing operation.
 *
 *   0. caller must be the receiver; an existing credential fails fast
 *   1. duration > 0: quote the feed, compute the fee, debit receiver → beneficiary
 *   2. verify the authority signature over the challenge
 *      (freshness = receiver's committed ledger sequence number)
 *   3. create the credential
 *
 * Steps 1–2 run inside one ledger transaction submitted by the receiver;
 * any throw, including a rejected commit, discards the staged debit.
 * Step 3 runs only once the transaction has committed. The executor
 * serializes mints, so the duplicate check in step 0 still holds there.
 * Events are appended after commit.
 */

import {
  DuplicateCredentialError,
  UnauthorizedError,
  buildMintChallenge,
  requiredFee,
  verifyMintChallenge,
  type CredentialKey,
  type Hex32,
  type Identity,
} from "@kycbound/protocol";
import type { PriceOracleAdapter } from "@kycbound/price-feed";
import type { LedgerClient } from "@kycbound/ledger-client";
import type { IssuerAuthority, IssuerConfig } from "../authority/issuer-authority.js";
import type { Credential, CredentialRegistry } from "../registry/credential-registry.js";
import type { EventSink } from "../event-log/writer.js";
import type { EventEnvelope } from "../event-log/schemas.js";
import {
  CREDENTIAL_EXPIRY_EVENT,
  CREDENTIAL_METADATA_EVENT,
  CREDENTIAL_MINT_EVENT,
  CREDENTIAL_VERIFIED_EVENT,
  ISSUER_FEE_RATE_EVENT,
  ISSUER_PRICE_FEED_EVENT,
  ISSUER_PUBLIC_KEY_EVENT,
} from "../event-log/schemas.js";
import type { SerialExecutor } from "../executor.js";
import type { IssuerLogger } from "../logger.js";

export interface MintRequest {
  receiver: Identity;
  /** Content identifier stored as credential metadata. */
  metadata: string;
  /** Unix seconds. */
  expiry: bigint;
  /** Seconds of validity paid for. */
  duration: bigint;
  tier: string;
  /** Base64 authority signature over the mint challenge. */
  signature: string;
}

export interface MintResult {
  key: CredentialKey;
  /** Asset base units debited from the receiver. */
  fee: bigint;
}

export interface OrchestratorDeps {
  authority: IssuerAuthority;
  registry: CredentialRegistry;
  oracle: PriceOracleAdapter;
  ledger: LedgerClient;
  events: EventSink;
  executor: SerialExecutor;
  logger: IssuerLogger;
  /** Wall clock, ms since epoch. */
  now: () => number;
}

export class MintOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  nowSeconds(): bigint {
    return BigInt(Math.floor(this.deps.now() / 1000));
  }

  mint(caller: Identity, request: MintRequest): Promise<MintResult> {
    return this.deps.executor.run(async () => {
      const { authority, registry, ledger } = this.deps;
      if (caller !== request.receiver) throw new UnauthorizedError(caller);

      const key = registry.deriveKey(request.receiver);
      if (registry.exists(key)) throw new DuplicateCredentialError(key);

      const config = authority.snapshot();
      const fee = await ledger.transact(request.receiver, async (tx) => {
        let fee = 0n;
        if (request.duration > 0n) {
          fee = await this.feeFor(request.duration, config);
          if (fee > 0n) {
            await tx.transfer({ from: request.receiver, to: config.beneficiary, amount: fee });
          }
        }

        const freshness = await tx.sequenceOf(request.receiver);
        const challenge = buildMintChallenge(config.namespace, request, freshness);
        await verifyMintChallenge(challenge, request.signature, config.publicKey);
        return fee;
      });

      registry.create(key, request.receiver, {
        tier: request.tier,
        expiry: request.expiry,
        metadata: request.metadata,
        createdAt: this.nowSeconds(),
      });

      this.deps.logger.info(
        { key, receiver: request.receiver, tier: request.tier, fee: fee.toString() },
        "credential minted",
      );
      await this.record(CREDENTIAL_MINT_EVENT, caller, {
        receiver: request.receiver,
        key,
        tier: request.tier,
        expiry: request.expiry.toString(),
        fee: fee.toString(),
      });
      return { key, fee };
    });
  }

  /** Fee for `duration` seconds at the current rate. Zero duration never touches the oracle. */
  async requiredFee(duration: bigint): Promise<bigint> {
    if (duration === 0n) return 0n;
    return this.feeFor(duration, this.deps.authority.snapshot());
  }

  // ── Admin ────────────────────────────────────────────────────────

  setPublicKey(caller: Identity, publicKey: Hex32): Promise<void> {
    return this.deps.executor.run(async () => {
      this.deps.authority.setPublicKey(caller, publicKey);
      await this.record(ISSUER_PUBLIC_KEY_EVENT, caller, { public_key: publicKey });
    });
  }

  setFeeRate(caller: Identity, feePerYear: bigint): Promise<void> {
    return this.deps.executor.run(async () => {
      this.deps.authority.setFeeRate(caller, feePerYear);
      await this.record(ISSUER_FEE_RATE_EVENT, caller, { fee_per_year: feePerYear.toString() });
    });
  }

  setPriceFeed(caller: Identity, priceFeedId: Hex32): Promise<void> {
    return this.deps.executor.run(async () => {
      this.deps.authority.setPriceFeed(caller, priceFeedId);
      await this.record(ISSUER_PRICE_FEED_EVENT, caller, { price_feed_id: priceFeedId });
    });
  }

  setVerified(caller: Identity, identity: Identity, verified: boolean): Promise<Readonly<Credential>> {
    return this.deps.executor.run(async () => {
      const credential = this.deps.registry.setVerified(caller, identity, verified);
      await this.record(CREDENTIAL_VERIFIED_EVENT, caller, { key: credential.key, verified });
      return credential;
    });
  }

  setExpiry(caller: Identity, identity: Identity, expiry: bigint): Promise<Readonly<Credential>> {
    return this.deps.executor.run(async () => {
      const credential = this.deps.registry.setExpiry(caller, identity, expiry);
      await this.record(CREDENTIAL_EXPIRY_EVENT, caller, {
        key: credential.key,
        expiry: expiry.toString(),
      });
      return credential;
    });
  }

  setMetadata(caller: Identity, identity: Identity, metadata: string): Promise<Readonly<Credential>> {
    return this.deps.executor.run(async () => {
      const credential = this.deps.registry.setMetadata(caller, identity, metadata);
      await this.record(CREDENTIAL_METADATA_EVENT, caller, { key: credential.key, metadata });
      return credential;
    });
  }

  // ── Internals ────────────────────────────────────────────────────

  private async feeFor(duration: bigint, config: Readonly<IssuerConfig>): Promise<bigint> {
    const quote = await this.deps.oracle.priceOf(config.priceFeedId);
    return requiredFee(duration, config.feePerYear, quote);
  }

  /** The mutation has already committed; a sink failure is logged only. */
  private async record(
    type: string,
    signer: Identity,
    payload: EventEnvelope["payload"],
  ): Promise<void> {
    try {
      await this.deps.events.append({ type, timestamp: this.deps.now(), signer, payload });
    } catch (err) {
      this.deps.logger.error({ err, type }, "event log append failed");
    }
  }
}
