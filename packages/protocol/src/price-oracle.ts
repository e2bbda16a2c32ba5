/**
 * StaticPriceOracle — in-process PriceOracle host.
 *
 * Prices are keyed by feed source, not by symbol: the registry binds
 * symbols to sources and asks the oracle about the source.
 * An unknown source reads as price 0, which the registry rejects.
 */

import type { PriceOracle, PriceReading } from "./types.js";

export class StaticPriceOracle implements PriceOracle {
  private readonly readings: Map<string, PriceReading> = new Map();

  constructor(prices?: Iterable<readonly [string, bigint]>) {
    for (const [source, price] of prices ?? []) {
      this.setPrice(source, price);
    }
  }

  setPrice(source: string, price: bigint, isValid = true): void {
    this.readings.set(source, { price, isValid });
  }

  latestPrice(_symbol: string, source: string): PriceReading {
    return this.readings.get(source) ?? { price: 0n, isValid: false };
  }
}
