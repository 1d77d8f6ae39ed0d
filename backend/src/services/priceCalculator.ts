/**
 * Price Calculator Service
 * Handles consistent money arithmetic for order lines and totals.
 * Amounts are summed in integer cents and converted back to two decimals.
 */

export interface PricedLine {
  price: number;
  quantity: number;
}

export class PriceCalculator {
  private static instance: PriceCalculator;

  private constructor() {}

  public static getInstance(): PriceCalculator {
    if (!PriceCalculator.instance) {
      PriceCalculator.instance = new PriceCalculator();
    }
    return PriceCalculator.instance;
  }

  toCents(amount: number): number {
    return Math.round(amount * 100);
  }

  fromCents(cents: number): number {
    return parseFloat((cents / 100).toFixed(2));
  }

  /**
   * Total for a single line: quantity * captured price
   */
  calculateLineTotal(line: PricedLine): number {
    return this.fromCents(this.toCents(line.price) * line.quantity);
  }

  /**
   * Order total re-aggregated from every line
   */
  calculateOrderTotal(lines: readonly PricedLine[]): number {
    const cents = lines.reduce((sum, line) => sum + this.toCents(line.price) * line.quantity, 0);
    return this.fromCents(cents);
  }
}

// Export the singleton instance
export const priceCalculator = PriceCalculator.getInstance();
