/**
 * Portfolio Snapshot Factory
 *
 * Builds immutable Holding / PortfolioSnapshot values. Holding values and
 * the snapshot total are computed with decimal.js so that the total equals
 * the sum of its parts to well within 1e-6 relative tolerance.
 */

import { Decimal } from "decimal.js";
import {
  portfolioSnapshotInputSchema,
  type HoldingInput,
  type PortfolioSnapshotInput,
} from "../schemas/portfolio.ts";
import { InvalidPortfolioError } from "../lib/errors.ts";
import { relativeDifference } from "../lib/math-utils.ts";

/** Relative tolerance between a declared total and the sum of holdings. */
export const TOTAL_VALUE_TOLERANCE = 1e-6;

export interface Holding {
  readonly symbol: string;
  readonly quantity: number;
  readonly unitPrice: number;
  /** quantity × unitPrice */
  readonly value: number;
}

export interface PortfolioSnapshot {
  readonly ownerId: string;
  readonly holdings: readonly Holding[];
  readonly totalValue: number;
  /** ISO timestamp */
  readonly snapshotTime: string;
}

/**
 * Create a frozen holding. Rejects non-positive or non-finite inputs.
 */
export function createHolding(input: HoldingInput): Holding {
  const { symbol, quantity, unitPrice } = input;

  if (symbol.trim().length === 0) {
    throw new InvalidPortfolioError("Holding symbol must not be empty");
  }
  if (!Number.isFinite(quantity) || quantity <= 0) {
    throw new InvalidPortfolioError(`Holding ${symbol}: quantity must be positive (got ${quantity})`);
  }
  if (!Number.isFinite(unitPrice) || unitPrice <= 0) {
    throw new InvalidPortfolioError(`Holding ${symbol}: unit price must be positive (got ${unitPrice})`);
  }

  return Object.freeze({
    symbol: symbol.trim(),
    quantity,
    unitPrice,
    value: new Decimal(quantity).mul(unitPrice).toNumber(),
  });
}

/**
 * Create a frozen snapshot from validated input. When the caller declares a
 * total value it must agree with the computed sum.
 */
export function createPortfolioSnapshot(input: PortfolioSnapshotInput): PortfolioSnapshot {
  if (input.holdings.length === 0) {
    throw new InvalidPortfolioError("Portfolio must contain at least one holding");
  }

  const holdings = input.holdings.map(createHolding);
  const totalValue = holdings
    .reduce((sum, h) => sum.add(h.value), new Decimal(0))
    .toNumber();

  if (
    input.totalValue !== undefined &&
    relativeDifference(input.totalValue, totalValue) > TOTAL_VALUE_TOLERANCE
  ) {
    throw new InvalidPortfolioError(
      `Declared total value ${input.totalValue} does not match sum of holdings ${totalValue}`,
    );
  }

  return Object.freeze({
    ownerId: input.ownerId,
    holdings: Object.freeze(holdings),
    totalValue,
    snapshotTime: input.snapshotTime ?? new Date().toISOString(),
  });
}

/**
 * Validate untrusted data and build a snapshot from it.
 */
export function parsePortfolioSnapshot(data: unknown): PortfolioSnapshot {
  const result = portfolioSnapshotInputSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "portfolio"}: ${issue.message}`)
      .join("; ");
    throw new InvalidPortfolioError(`Portfolio validation failed: ${issues}`);
  }
  return createPortfolioSnapshot(result.data);
}
