import { getContact, getCredential, type SearchContext } from '../../domain/search-context';
import type { ConciergeResult } from '../../domain/search-result';
import type { ConversionEventType } from '../ports/messaging.port';
import type { ConciergePlugin, PluginServices } from './plugin';

export interface ConversionEventOptions {
  eventType?: ConversionEventType;
  autoSend?: boolean;
  onlyWhatsapp?: boolean;
}

/** Reports a conversion event (lead or purchase) for the contact after the search. */
export class ConversionEventPlugin implements ConciergePlugin {
  readonly name = 'conversion_event';
  private readonly eventType: ConversionEventType;
  private readonly autoSend: boolean;
  private readonly onlyWhatsapp: boolean;

  constructor(options: ConversionEventOptions = {}) {
    this.eventType = options.eventType ?? 'lead';
    this.autoSend = options.autoSend ?? true;
    this.onlyWhatsapp = options.onlyWhatsapp ?? true;
  }

  async finalizeResult(
    result: ConciergeResult,
    context: SearchContext,
    services: PluginServices,
  ): Promise<ConciergeResult> {
    if (!this.autoSend) {
      return result;
    }

    const contactUrn = getContact(context, 'urn');
    const channelUuid = getContact(context, 'channel_uuid');
    if (!contactUrn || !channelUuid) {
      return result;
    }

    if (this.onlyWhatsapp && !contactUrn.toLowerCase().startsWith('whatsapp:')) {
      return result;
    }

    await services.messaging.sendConversionEvent({
      channelUuid,
      contactUrn,
      eventType: this.eventType,
      authToken: getCredential(context, 'auth_token') ?? getContact(context, 'auth_token'),
    });

    return {
      ...result,
      extras: {
        ...result.extras,
        conversionEventSent: true,
        conversionEventType: this.eventType,
      },
    };
  }
}
