/**
 * @kycbound/price-feed: price oracle abstraction.
 *
 * The issuer only talks to PriceOracleAdapter. Swap HermesPriceClient
 * for MockPriceFeedClient in tests.
 */

export type { PriceFeedClient, HermesClientOptions } from "./types.js";

export { HermesPriceClient } from "./hermes-client.js";
export { MockPriceFeedClient } from "./mock-client.js";
export { PriceOracleAdapter } from "./adapter.js";
