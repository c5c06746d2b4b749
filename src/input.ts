// Argument validation shared by the flag parser and the interactive shell.

import { Either } from "effect";
import { InvalidInput } from "./price-api.ts";

export const DEFAULT_TOP_LIMIT = 10;
export const MAX_TOP_LIMIT = 250; // CoinGecko's page-size ceiling
export const DEFAULT_WATCH_INTERVAL = 30;

export function validateLimit(limit: number): Either.Either<number, InvalidInput> {
  return Number.isInteger(limit) && limit >= 1 && limit <= MAX_TOP_LIMIT
    ? Either.right(limit)
    : Either.left(
        new InvalidInput({
          message: `Top count must be a whole number between 1 and ${MAX_TOP_LIMIT}, got ${limit}`,
        }),
      );
}

export function validateInterval(
  seconds: number,
): Either.Either<number, InvalidInput> {
  return Number.isInteger(seconds) && seconds >= 1
    ? Either.right(seconds)
    : Either.left(
        new InvalidInput({
          message: `Interval must be a whole number of seconds (1 or more), got ${seconds}`,
        }),
      );
}

/** Parse a raw argument as an integer. Anything but an optionally signed
 *  run of digits is rejected, so "10abc" and "1.5" do not sneak through. */
export function parseInteger(
  raw: string,
  label: string,
): Either.Either<number, InvalidInput> {
  return /^[+-]?\d+$/.test(raw)
    ? Either.right(Number(raw))
    : Either.left(new InvalidInput({ message: `${label} must be a number, got '${raw}'` }));
}

/** A raw top count from a flag or the shell, checked end to end. */
export const parseLimit = (raw: string): Either.Either<number, InvalidInput> =>
  Either.flatMap(parseInteger(raw.trim(), "Top count"), validateLimit);

/** A raw watch interval from a flag or the shell, checked end to end. */
export const parseInterval = (raw: string): Either.Either<number, InvalidInput> =>
  Either.flatMap(parseInteger(raw.trim(), "Interval"), validateInterval);
