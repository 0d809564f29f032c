import { getContact, getCredential, type SearchContext } from '../../domain/search-context';
import type { ConciergeResult } from '../../domain/search-result';
import { buildCarouselCards, renderCarousel } from './carousel-format';
import type { ConciergePlugin, PluginServices } from './plugin';

export interface CarouselOptions {
  autoSend?: boolean;
  maxItems?: number;
  currencySymbol?: string;
}

/** Sends the final products to the contact as a carousel message. */
export class CarouselPlugin implements ConciergePlugin {
  readonly name = 'carousel';
  private readonly autoSend: boolean;
  private readonly maxItems: number;
  private readonly currencySymbol: string;

  constructor(options: CarouselOptions = {}) {
    this.autoSend = options.autoSend ?? true;
    this.maxItems = options.maxItems ?? 10;
    this.currencySymbol = options.currencySymbol ?? 'R$';
  }

  async finalizeResult(
    result: ConciergeResult,
    context: SearchContext,
    services: PluginServices,
  ): Promise<ConciergeResult> {
    const contactUrn = getContact(context, 'urn');
    if (!this.autoSend || !contactUrn) {
      return result;
    }

    const cards = buildCarouselCards(result.products, this.maxItems);
    if (cards.length === 0) {
      return result;
    }

    await services.messaging.sendMessage({
      contactUrn,
      text: renderCarousel(cards, this.currencySymbol),
      channelUuid: getContact(context, 'channel_uuid'),
      authToken: getCredential(context, 'MESSAGING_API_TOKEN'),
    });

    return {
      ...result,
      extras: {
        ...result.extras,
        carouselSent: true,
        carouselItems: cards.length,
      },
    };
  }
}
