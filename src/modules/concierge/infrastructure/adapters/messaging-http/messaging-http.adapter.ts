import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '../../../../../common/utils/logger';
import type {
  ConversionEvent,
  FlowStart,
  MessagingPort,
  OutgoingMessage,
} from '../../../application/ports/messaging.port';
import type { ExternalServiceErrorContext } from '../../../domain/errors';
import { requestJson } from '../shared';

export const BROADCASTS_PATH = '/api/v2/whatsapp_broadcasts.json';
export const FLOW_STARTS_PATH = '/api/v2/flow_starts.json';
export const CONVERSIONS_PATH = '/conversion/';

export class MissingMessagingTokenError extends Error {
  constructor() {
    super('Messaging API token is not configured');
    this.name = 'MissingMessagingTokenError';
  }
}

@Injectable()
export class MessagingHttpAdapter implements MessagingPort {
  private readonly logger = createLogger(MessagingHttpAdapter.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly defaultToken?: string;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('MESSAGING_API_URL') ?? 'http://localhost:8000';
    this.timeoutMs = this.configService.get<number>('MESSAGING_TIMEOUT_MS') ?? 10_000;
    this.defaultToken = this.configService.get<string>('MESSAGING_API_TOKEN');
  }

  async sendMessage(message: OutgoingMessage): Promise<void> {
    await this.post(BROADCASTS_PATH, 'broadcasts', `Token ${this.resolveToken(message.authToken)}`, {
      urns: [message.contactUrn],
      ...(message.channelUuid ? { channel: message.channelUuid } : {}),
      msg: {
        text: message.text,
        attachments: [],
      },
    });

    this.logger.plugin('messaging_broadcast_sent', {
      event: 'messaging_broadcast_sent',
      contact_urn: message.contactUrn,
    });
  }

  async sendConversionEvent(event: ConversionEvent): Promise<void> {
    await this.post(CONVERSIONS_PATH, 'conversions', `Bearer ${this.resolveToken(event.authToken)}`, {
      channel_uuid: event.channelUuid,
      contact_urn: event.contactUrn,
      event_type: event.eventType,
    });

    this.logger.plugin('messaging_conversion_sent', {
      event: 'messaging_conversion_sent',
      contact_urn: event.contactUrn,
      event_type: event.eventType,
    });
  }

  async triggerFlow(flow: FlowStart): Promise<void> {
    await this.post(FLOW_STARTS_PATH, 'flow_starts', `Token ${this.resolveToken(flow.authToken)}`, {
      flow: flow.flowUuid,
      urns: [flow.contactUrn],
      params: flow.params,
    });

    this.logger.plugin('messaging_flow_started', {
      event: 'messaging_flow_started',
      contact_urn: flow.contactUrn,
      flow_uuid: flow.flowUuid,
    });
  }

  private resolveToken(token?: string): string {
    const resolved = token?.trim() || this.defaultToken;
    if (!resolved) {
      throw new MissingMessagingTokenError();
    }

    return resolved;
  }

  private async post(
    path: string,
    endpointGroup: ExternalServiceErrorContext['endpointGroup'],
    authorization: string,
    body: Record<string, unknown>,
  ): Promise<void> {
    await requestJson({
      url: `${this.baseUrl}${path}`,
      method: 'POST',
      timeoutMs: this.timeoutMs,
      headers: { Authorization: authorization },
      body,
      context: { service: 'messaging', endpointGroup, endpointPath: path },
    });
  }
}
