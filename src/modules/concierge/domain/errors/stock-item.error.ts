/**
 * Availability of a single offer could not be determined.
 * Never fatal: the offer is reported as unavailable.
 */
export class StockItemError extends Error {
  constructor(
    public readonly productId: string,
    public readonly sellerId: string,
    reason: string,
  ) {
    super(`Availability unknown for ${productId}:${sellerId}: ${reason}`);
    this.name = 'StockItemError';
  }
}
