export interface OutgoingMessage {
  contactUrn: string;
  text: string;
  channelUuid?: string;
  authToken?: string;
}

export type ConversionEventType = 'lead' | 'purchase';

export interface ConversionEvent {
  channelUuid: string;
  contactUrn: string;
  eventType: ConversionEventType;
  authToken?: string;
}

export interface FlowStart {
  flowUuid: string;
  contactUrn: string;
  params: Record<string, unknown>;
  authToken?: string;
}

/**
 * Outbound messaging capabilities. Only plugin hooks call these; a rejected
 * promise is recorded as a failure of the calling plugin.
 */
export interface MessagingPort {
  sendMessage(message: OutgoingMessage): Promise<void>;
  sendConversionEvent(event: ConversionEvent): Promise<void>;
  triggerFlow(flow: FlowStart): Promise<void>;
}
