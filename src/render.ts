// Renderer: builds the text shown to the operator. Returns strings; the
// Screen service decides where they go.

import type { AssetQuote, MarketEntry, SearchResult } from "./domain.ts";
import {
  COLUMN_WIDTHS,
  formatAmount,
  formatChange,
  formatDateTime,
  formatPrice,
  formatTime,
  padColumn,
  type StyledText,
  truncateName,
} from "./format.ts";
import type { InvalidInput, NetworkError, PriceApiError } from "./price-api.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[92m";
const RED = "\x1b[91m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface RenderOptions {
  readonly color: boolean;
  readonly currency: string;
}

const wrap = (code: string, text: string, color: boolean) =>
  color ? `${code}${text}${RESET}` : text;

/** Realize a change style as ANSI colour, or leave the plain text. */
export function paint(styled: StyledText, color: boolean): string {
  switch (styled.style) {
    case "Positive":
      return wrap(GREEN, styled.text, color);
    case "Negative":
      return wrap(RED, styled.text, color);
    case "Neutral":
      return styled.text;
  }
}

const amountOrNA = (value: number | undefined, currency: string) =>
  value === undefined || value === 0 ? "N/A" : formatAmount(value, currency);

// --- Single quote ---

export function renderQuote(quote: AssetQuote, options: RenderOptions): string {
  const { color, currency } = options;
  const lines = [
    "",
    wrap(BOLD, quote.id.toUpperCase(), color),
    `Price: ${formatPrice(quote.price, currency)}`,
    `24h Change: ${paint(formatChange(quote.change24h), color)}`,
    `Market Cap: ${amountOrNA(quote.marketCap, currency)}`,
    `Volume (24h): ${amountOrNA(quote.volume24h, currency)}`,
  ];
  if (quote.lastUpdated !== undefined) {
    lines.push(wrap(DIM, `Last Updated: ${formatDateTime(new Date(quote.lastUpdated))}`, color));
  }
  return lines.join("\n");
}

// --- Market table ---

const HEADER = [
  padColumn("Symbol", COLUMN_WIDTHS.symbol),
  padColumn("Name", COLUMN_WIDTHS.name),
  padColumn("Price", COLUMN_WIDTHS.price),
  padColumn("24h Change", COLUMN_WIDTHS.change),
  "Market Cap",
].join(" ");

/** Header plus one row per entry, in the order given. Nothing at all for an
 *  empty listing. */
export function renderTable(
  entries: ReadonlyArray<MarketEntry>,
  options: RenderOptions,
): ReadonlyArray<string> {
  if (entries.length === 0) return [];
  return [wrap(BOLD, HEADER, options.color), ...entries.map((e) => renderRow(e, options))];
}

function renderRow(entry: MarketEntry, { color, currency }: RenderOptions): string {
  const change = formatChange(entry.change24h);
  // Pad on the plain text so escape codes do not eat into the column width.
  const changePadding = " ".repeat(Math.max(0, COLUMN_WIDTHS.change - change.text.length));
  return [
    padColumn(entry.symbol.toUpperCase(), COLUMN_WIDTHS.symbol),
    padColumn(truncateName(entry.name), COLUMN_WIDTHS.name),
    padColumn(formatPrice(entry.currentPrice, currency), COLUMN_WIDTHS.price),
    paint(change, color) + changePadding,
    amountOrNA(entry.marketCap, currency),
  ].join(" ");
}

// --- Watch mode ---

export function renderWatchHeader(assetId: string, intervalSeconds: number): string {
  return [
    `Watching ${assetId.toUpperCase()} - Press Ctrl+C to stop`,
    `Update interval: ${intervalSeconds} seconds`,
  ].join("\n");
}

/** A single line that overwrites itself: starts with a carriage return and
 *  carries no newline. */
export function renderWatchLine(
  assetId: string,
  timestamp: Date,
  quote: AssetQuote,
  options: RenderOptions,
): string {
  const price = formatPrice(quote.price, options.currency);
  const change = paint(formatChange(quote.change24h), options.color);
  return `\r[${formatTime(timestamp)}] ${assetId.toUpperCase()}: ${price} (${change})`;
}

export const WATCH_STOPPED_NOTICE = "\n\nStopped watching.";

// --- Search ---

export function renderSearchResults(
  query: string,
  results: ReadonlyArray<SearchResult>,
): string {
  return [
    "",
    `Search results for '${query}':`,
    ...results.map(
      (coin, i) => `${i + 1}. ${coin.name} (${coin.symbol.toUpperCase()}) - ID: ${coin.id}`,
    ),
  ].join("\n");
}

// --- Usage ---

export const USAGE = [
  "",
  "Usage examples:",
  "  cryptotrack --top 20",
  "  cryptotrack --price bitcoin",
  "  cryptotrack --search ethereum",
  "  cryptotrack --watch bitcoin --interval 10",
  "  cryptotrack --interactive",
].join("\n");

export const INTERACTIVE_HELP = [
  "Commands:",
  "  top [N]               top N coins by market cap (default 10)",
  "  price <id>            current price of one coin",
  "  search <query>        find coin ids",
  "  watch <id> [seconds]  live price, Ctrl+C to stop (default 30s)",
  "  help                  show this list",
  "  quit                  leave",
].join("\n");

// --- Errors ---

export function renderError(
  error: PriceApiError | InvalidInput,
  color: boolean,
): string {
  const friendly = classifyError(error);
  return [
    "",
    wrap(RED + BOLD, `✗ ${friendly.title}`, color),
    wrap(DIM, friendly.hint, color),
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: PriceApiError | InvalidInput): ClassifiedError {
  switch (error._tag) {
    case "NetworkError":
      return classifyNetworkError(error);
    case "NotFound":
      return {
        title: "Cryptocurrency not found",
        hint: `No price for '${error.assetId}'. Use search to look up the coin id (e.g. bitcoin, ethereum).`,
      };
    case "InvalidInput":
      return { title: "Invalid input", hint: error.message };
  }
}

function classifyNetworkError(error: NetworkError): ClassifiedError {
  switch (error.reason) {
    case "Transport":
      return {
        title: "Network error",
        hint: "Could not reach the API. Check your internet connection.",
      };
    case "Timeout":
      return {
        title: "Request timed out",
        hint: "The API did not answer in time. Try again in a moment.",
      };
    case "Decode":
      return {
        title: "Unexpected response",
        hint: "The API returned data in an unexpected format.",
      };
    case "StatusCode":
      if (error.status === 429) {
        return {
          title: "Rate limited",
          hint: "Too many requests. Wait a minute and try again.",
        };
      }
      if (error.status !== undefined && error.status >= 500) {
        return {
          title: "Server error",
          hint: "CoinGecko is having issues. Try again in a few minutes.",
        };
      }
      return { title: "HTTP error", hint: error.message };
  }
}
