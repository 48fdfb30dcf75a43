/**
 * @coinmeter/pricing — Client for the multi-symbol pricing API.
 */

export { PriceClient, buildPriceUrl } from "./price-client.js";
export { PriceFetchError, DEFAULT_PRICE_API_URL } from "./types.js";
export type {
  PriceClientConfig,
  PriceSource,
  PriceFetchErrorCode,
} from "./types.js";
