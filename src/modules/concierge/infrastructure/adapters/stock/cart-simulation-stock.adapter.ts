import { Inject, Injectable } from '@nestjs/common';
import type {
  CommerceQueryPort,
  SimulatedCartItem,
} from '../../../application/ports/commerce-query.port';
import type {
  AvailabilityQuery,
  StockAvailability,
  StockAvailabilityPort,
} from '../../../application/ports/stock-availability.port';
import { COMMERCE_QUERY_PORT } from '../../../application/ports/tokens';
import { StockItemError } from '../../../domain/errors';

export const AVAILABLE_STATUS = 'available';

/**
 * Answers availability with a cart simulation of the SKU against every
 * candidate seller for the shopper's postal code. The region reaches the
 * simulation through its resolved sellers and the postal code.
 */
@Injectable()
export class CartSimulationStockAdapter implements StockAvailabilityPort {
  constructor(
    @Inject(COMMERCE_QUERY_PORT)
    private readonly commerce: CommerceQueryPort,
  ) {}

  async queryAvailability(query: AvailabilityQuery): Promise<StockAvailability> {
    const simulation = await this.commerce.simulateCart({
      items: query.sellers.map((seller) => ({
        id: query.productId,
        quantity: query.quantity,
        seller,
      })),
      countryCode: query.countryCode,
      postalCode: query.postalCode,
    });

    const candidates = simulation.items.filter(
      (item) => item.id === query.productId && query.sellers.includes(item.seller),
    );
    const best = selectBestSimulatedItem(candidates);
    if (!best) {
      throw new StockItemError(query.productId, query.sellers.join(','), 'item missing from simulation');
    }

    return { available: best.availability === AVAILABLE_STATUS, sellerId: best.seller };
  }
}

/** Available items first, then the highest simulated quantity; ties keep seller order. */
export function selectBestSimulatedItem(
  items: readonly SimulatedCartItem[],
): SimulatedCartItem | undefined {
  let best: SimulatedCartItem | undefined;

  for (const item of items) {
    if (!best || isBetterItem(item, best)) {
      best = item;
    }
  }

  return best;
}

function isBetterItem(candidate: SimulatedCartItem, current: SimulatedCartItem): boolean {
  const candidateAvailable = candidate.availability === AVAILABLE_STATUS;
  const currentAvailable = current.availability === AVAILABLE_STATUS;
  if (candidateAvailable !== currentAvailable) {
    return candidateAvailable;
  }

  return candidate.quantity > current.quantity;
}
