// Pure domain types: no framework dependency, no I/O.

export interface AssetQuote {
  readonly id: string;
  readonly price: number;
  readonly change24h: number; // percent, signed
  readonly lastUpdated?: number; // epoch ms
  readonly marketCap?: number;
  readonly volume24h?: number;
}

export interface MarketEntry {
  readonly id: string;
  readonly symbol: string;
  readonly name: string;
  readonly currentPrice: number;
  readonly change24h: number;
  readonly marketCap?: number;
  readonly volume24h?: number;
}

export interface SearchResult {
  readonly id: string;
  readonly name: string;
  readonly symbol: string;
}

export interface WatchSession {
  readonly assetId: string;
  readonly intervalSeconds: number;
  readonly isRunning: boolean;
}
