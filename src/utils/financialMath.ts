// src/utils/financialMath.ts
import { Decimal } from "decimal.js";

// Configure Decimal.js for price arithmetic
Decimal.set({
    precision: 34,
    rounding: Decimal.ROUND_HALF_EVEN,
});

export class FinancialMath {
    /**
     * Signed distance from `from` to `to` in whole ticks, truncated toward zero.
     * Prices go through their decimal string form, so 100.3 - 100.1 at a
     * 0.1 tick is exactly 2 ticks.
     */
    static ticksBetween(from: number, to: number, tickSize: number): number {
        const dTickSize = new Decimal(tickSize);
        if (dTickSize.isZero()) {
            throw new Error("Tick size must be non-zero");
        }
        const ticks = new Decimal(to)
            .minus(from)
            .dividedBy(dTickSize)
            .trunc()
            .toNumber();
        return ticks === 0 ? 0 : ticks; // no negative zero
    }

    /**
     * Price that lies `ticks` ticks away from `price` (negative moves down)
     */
    static offsetByTicks(price: number, ticks: number, tickSize: number): number {
        return new Decimal(price)
            .plus(new Decimal(tickSize).times(ticks))
            .toNumber();
    }

    /**
     * Validate if a price value is usable
     */
    static isValidPrice(price: number): boolean {
        return Number.isFinite(price) && price > 0;
    }

    /**
     * Validate a tick size
     */
    static isValidTickSize(tickSize: number): boolean {
        return Number.isFinite(tickSize) && tickSize > 0;
    }
}
