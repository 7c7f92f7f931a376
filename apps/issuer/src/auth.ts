/**
 * Signed request authentication.
 *
 * Mutating routes take { caller, sig, payload }. The signature covers
 * canonical({ op, ...payload }) and payload.timestamp_ms must sit within
 * the skew window. An accepted envelope is remembered for as long as its
 * timestamp stays inside the window, so it cannot be submitted twice.
 * Who may call what is decided by the domain layer.
 */

import {
  hashBytes,
  signatureFromBase64,
  toHex,
  verifyRequestSignature,
  type Identity,
} from "@kycbound/protocol";

export type RequestAuthErrorCode =
  | "invalid_request_signature"
  | "stale_request"
  | "replayed_request";

export class RequestAuthError extends Error {
  constructor(
    public readonly code: RequestAuthErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "RequestAuthError";
  }
}

export interface SignedEnvelope {
  caller: string;
  sig: string;
  payload: Record<string, unknown> & { timestamp_ms: number };
}

/**
 * Digests of accepted request signatures, keyed to their timestamp_ms.
 * Entries older than the skew window are pruned: such an envelope already
 * fails the staleness check.
 */
export class SeenRequests {
  private readonly seen = new Map<string, number>();

  /** Records the digest; false when it was already present. */
  remember(digest: string, timestampMs: number, nowMs: number, maxSkewMs: number): boolean {
    this.prune(nowMs - maxSkewMs);
    if (this.seen.has(digest)) return false;
    this.seen.set(digest, timestampMs);
    return true;
  }

  size(): number {
    return this.seen.size;
  }

  private prune(oldestMs: number): void {
    for (const [digest, ts] of this.seen) {
      if (ts < oldestMs) this.seen.delete(digest);
    }
  }
}

export interface AuthOptions {
  now: () => number;
  maxSkewMs: number;
  seen: SeenRequests;
}

/** Returns the authenticated caller identity. */
export async function authenticate(
  request: SignedEnvelope,
  op: string,
  opts: AuthOptions,
): Promise<Identity> {
  const ok = await verifyRequestSignature(request.caller, request.sig, op, request.payload);
  const sig = signatureFromBase64(request.sig);
  if (!ok || !sig) {
    throw new RequestAuthError("invalid_request_signature", `signature does not verify for op ${op}`);
  }
  const now = opts.now();
  const skew = Math.abs(now - request.payload.timestamp_ms);
  if (skew > opts.maxSkewMs) {
    throw new RequestAuthError("stale_request", `timestamp_ms is ${skew}ms from server time`);
  }
  // Digest of the decoded bytes: two base64 spellings of one signature collide.
  const digest = toHex(hashBytes(sig));
  if (!opts.seen.remember(digest, request.payload.timestamp_ms, now, opts.maxSkewMs)) {
    throw new RequestAuthError("replayed_request", `request for op ${op} was already accepted`);
  }
  return request.caller;
}
