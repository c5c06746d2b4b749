// Pure formatting functions: no I/O, no terminal control codes.

// --- Currency ---

const CURRENCY_SYMBOLS: Partial<Record<string, string>> = {
  usd: "$",
  eur: "€",
  gbp: "£",
  jpy: "¥",
  inr: "₹",
  krw: "₩",
  btc: "₿",
};

export function currencySymbol(currency: string): string {
  return CURRENCY_SYMBOLS[currency.toLowerCase()] ?? `${currency.toUpperCase()} `;
}

// --- Numbers ---

/** Price with precision chosen by magnitude: large prices get thousands
 *  separators and cents, sub-unit prices keep eight decimals. */
export function formatPrice(value: number, currency = "usd"): string {
  const symbol = currencySymbol(currency);
  if (value >= 1000) {
    return `${symbol}${
      value.toLocaleString("en-US", {
        minimumFractionDigits: 2,
        maximumFractionDigits: 2,
      })
    }`;
  }
  if (value >= 1) return `${symbol}${value.toFixed(4)}`;
  return `${symbol}${value.toFixed(8)}`;
}

/** Whole currency units with thousands separators (market cap, volume). */
export function formatAmount(value: number, currency = "usd"): string {
  return `${currencySymbol(currency)}${
    value.toLocaleString("en-US", { maximumFractionDigits: 0 })
  }`;
}

// --- Change ---

export type ChangeStyle = "Positive" | "Negative" | "Neutral";

export interface StyledText {
  readonly text: string;
  readonly style: ChangeStyle;
}

export function formatChange(percent: number): StyledText {
  if (percent > 0) return { text: `+${percent.toFixed(2)}%`, style: "Positive" };
  if (percent < 0) return { text: `${percent.toFixed(2)}%`, style: "Negative" };
  return { text: "0.00%", style: "Neutral" };
}

// --- Table columns ---

export const COLUMN_WIDTHS = {
  symbol: 8,
  name: 20,
  price: 15,
  change: 12,
  marketCap: 15,
} as const;

export const MAX_NAME_LENGTH = 18;
const ELLIPSIS = "..";

export function truncateName(name: string): string {
  return name.length > MAX_NAME_LENGTH
    ? name.slice(0, MAX_NAME_LENGTH) + ELLIPSIS
    : name;
}

export function padColumn(text: string, width: number): string {
  return text.padEnd(width);
}

// --- Time ---

const pad2 = (n: number) => String(n).padStart(2, "0");

/** Local wall-clock time, HH:MM:SS. */
export function formatTime(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/** Local date and time, YYYY-MM-DD HH:MM:SS. */
export function formatDateTime(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ${formatTime(date)}`;
}
