/**
 * Hermes REST client: latest price updates over HTTPS.
 *
 * GET /v2/updates/price/latest?ids[]=<feed>&parsed=true
 *
 * Only the parsed section is read. The signed binary update is never
 * relayed on-chain, so it is ignored.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { RawPriceQuote } from "@kycbound/protocol";
import type { HermesClientOptions, PriceFeedClient } from "./types.js";

const DEFAULT_TIMEOUT_MS = 5_000;

const HermesPrice = Type.Object({
  price: Type.String({ pattern: "^-?[0-9]+$" }),
  conf: Type.String(),
  expo: Type.Integer(),
  publish_time: Type.Integer(),
});

const HermesLatestResponse = Type.Object({
  parsed: Type.Array(
    Type.Object({
      id: Type.String(),
      price: HermesPrice,
    }),
  ),
});

type HermesLatestResponse = Static<typeof HermesLatestResponse>;

function normalizeFeedId(feedId: string): string {
  return feedId.toLowerCase().replace(/^0x/, "");
}

export class HermesPriceClient implements PriceFeedClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(opts: HermesClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async latestQuote(feedId: string): Promise<RawPriceQuote> {
    const id = normalizeFeedId(feedId);
    const url = new URL(`${this.baseUrl}/v2/updates/price/latest`);
    url.searchParams.append("ids[]", id);
    url.searchParams.set("parsed", "true");

    const res = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Hermes GET ${url.pathname}: ${String(res.status)} ${text}`);
    }

    const body: unknown = await res.json();
    if (!Value.Check(HermesLatestResponse, body)) {
      throw new Error("Hermes: unexpected response shape");
    }

    const entry = findFeed(body, id);
    if (!entry) throw new Error(`Hermes: feed ${id} missing from response`);

    return {
      price: BigInt(entry.price.price),
      expo: entry.price.expo,
      publishTime: entry.price.publish_time,
    };
  }
}

function findFeed(body: HermesLatestResponse, id: string) {
  return body.parsed.find((p) => normalizeFeedId(p.id) === id);
}
