// PriceApiTest: in-process implementation of PriceApi for development and
// tests. CRYPTOTRACK_PROVIDER=test selects it from the CLI.

import { type Context, Effect, Layer } from "effect";
import type { AssetQuote, MarketEntry } from "../domain.ts";
import { validateLimit } from "../input.ts";
import { NotFound, PriceApi } from "../price-api.ts";

// --- Sample data ---

const LAST_UPDATED = Date.parse("2025-06-15T16:00:00Z");

const markets: ReadonlyArray<MarketEntry> = [
  {
    id: "bitcoin",
    symbol: "btc",
    name: "Bitcoin",
    currentPrice: 104_250.12,
    change24h: 1.87,
    marketCap: 2_071_000_000_000,
    volume24h: 31_400_000_000,
  },
  {
    id: "ethereum",
    symbol: "eth",
    name: "Ethereum",
    currentPrice: 2_512.4,
    change24h: -0.64,
    marketCap: 303_200_000_000,
    volume24h: 14_900_000_000,
  },
  {
    id: "tether",
    symbol: "usdt",
    name: "Tether",
    currentPrice: 1.0002,
    change24h: 0,
    marketCap: 155_300_000_000,
    volume24h: 48_100_000_000,
  },
  {
    id: "dogecoin",
    symbol: "doge",
    name: "Dogecoin",
    currentPrice: 0.18421907,
    change24h: -3.12,
    marketCap: 27_500_000_000,
    volume24h: 1_020_000_000,
  },
];

const toQuote = (entry: MarketEntry): AssetQuote => ({
  id: entry.id,
  price: entry.currentPrice,
  change24h: entry.change24h,
  lastUpdated: LAST_UPDATED,
  marketCap: entry.marketCap,
  volume24h: entry.volume24h,
});

// --- Stub builder ---

type PriceApiShape = Context.Tag.Service<typeof PriceApi>;

/** The sample-data service, with any operation replaced by the caller. */
export function makeStubPriceApi(
  overrides: Partial<PriceApiShape> = {},
): Layer.Layer<PriceApi> {
  return Layer.succeed(
    PriceApi,
    PriceApi.of({
      currency: "usd",
      fetchQuote: (assetId) => {
        const entry = markets.find((m) => m.id === assetId.toLowerCase());
        return entry !== undefined
          ? Effect.succeed(toQuote(entry))
          : Effect.fail(new NotFound({ assetId }));
      },
      fetchTopMarkets: (limit) =>
        Effect.map(validateLimit(limit), (n) => markets.slice(0, n)),
      search: (query) =>
        Effect.succeed(
          markets
            .filter((m) =>
              m.name.toLowerCase().includes(query.toLowerCase()) ||
              m.symbol.includes(query.toLowerCase())
            )
            .map(({ id, name, symbol }) => ({ id, name, symbol })),
        ),
      ...overrides,
    }),
  );
}

// --- Mock layer ---

export const PriceApiTestLive = makeStubPriceApi();
