/**
 * Portfolio Snapshot Tests
 *
 * Validates:
 * 1. Holding values and totals use decimal arithmetic
 * 2. Declared totals are checked against the holdings
 * 3. Invalid holdings are rejected at construction
 * 4. Snapshots are immutable
 */

import { describe, it, expect } from "vitest";
import {
  createHolding,
  createPortfolioSnapshot,
  parsePortfolioSnapshot,
} from "../portfolio.ts";
import { InvalidPortfolioError } from "../../lib/errors.ts";

describe("Portfolio Snapshot", () => {
  describe("createHolding", () => {
    it("should compute the value without float drift", () => {
      const holding = createHolding({ symbol: "A1", quantity: 0.1, unitPrice: 3 });
      expect(holding.value).toBe(0.3);
    });

    it("should trim the symbol", () => {
      expect(createHolding({ symbol: "  A1 ", quantity: 1, unitPrice: 2 }).symbol).toBe("A1");
    });

    it("should reject a blank symbol", () => {
      expect(() => createHolding({ symbol: "   ", quantity: 1, unitPrice: 1 })).toThrow(
        "Holding symbol must not be empty",
      );
    });

    it("should reject a zero quantity", () => {
      expect(() => createHolding({ symbol: "A1", quantity: 0, unitPrice: 1 })).toThrow(
        "Holding A1: quantity must be positive (got 0)",
      );
    });

    it("should reject a non-finite price", () => {
      expect(() => createHolding({ symbol: "A1", quantity: 1, unitPrice: NaN })).toThrow(
        "Holding A1: unit price must be positive (got NaN)",
      );
    });
  });

  describe("createPortfolioSnapshot", () => {
    const holdings = [
      { symbol: "A1", quantity: 0.1, unitPrice: 3 },
      { symbol: "B1", quantity: 0.2, unitPrice: 1 },
    ];

    it("should sum holding values exactly", () => {
      const snapshot = createPortfolioSnapshot({ ownerId: "owner-1", holdings });
      expect(snapshot.totalValue).toBe(0.5);
      expect(snapshot.holdings.map((h) => h.value)).toEqual([0.3, 0.2]);
    });

    it("should accept a declared total within tolerance", () => {
      const snapshot = createPortfolioSnapshot({ ownerId: "owner-1", holdings, totalValue: 0.5000000001 });
      expect(snapshot.totalValue).toBe(0.5);
    });

    it("should reject a declared total that disagrees", () => {
      expect(() => createPortfolioSnapshot({ ownerId: "owner-1", holdings, totalValue: 0.6 })).toThrow(
        "Declared total value 0.6 does not match sum of holdings 0.5",
      );
    });

    it("should reject an empty portfolio", () => {
      expect(() => createPortfolioSnapshot({ ownerId: "owner-1", holdings: [] })).toThrow(
        InvalidPortfolioError,
      );
    });

    it("should keep a supplied snapshot time", () => {
      const snapshot = createPortfolioSnapshot({
        ownerId: "owner-1",
        holdings,
        snapshotTime: "2026-03-01T00:00:00.000Z",
      });
      expect(snapshot.snapshotTime).toBe("2026-03-01T00:00:00.000Z");
    });

    it("should freeze the snapshot and its holdings", () => {
      const snapshot = createPortfolioSnapshot({ ownerId: "owner-1", holdings });
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.holdings)).toBe(true);
      expect(Object.isFrozen(snapshot.holdings[0])).toBe(true);
    });
  });

  describe("parsePortfolioSnapshot", () => {
    it("should build a snapshot from valid data", () => {
      const snapshot = parsePortfolioSnapshot({
        ownerId: "owner-1",
        holdings: [{ symbol: "A1", quantity: 2, unitPrice: 5 }],
      });
      expect(snapshot.totalValue).toBe(10);
    });

    it("should list the failing fields", () => {
      expect(() =>
        parsePortfolioSnapshot({ holdings: [{ symbol: "A1", quantity: 1, unitPrice: 1 }] }),
      ).toThrow("Portfolio validation failed: ownerId: Required");
    });

    it("should report an empty holdings list", () => {
      expect(() => parsePortfolioSnapshot({ ownerId: "owner-1", holdings: [] })).toThrow(
        "Portfolio validation failed: holdings: Portfolio must contain at least one holding",
      );
    });
  });
});
