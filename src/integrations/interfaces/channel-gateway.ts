/**
 * Interface for a delivery channel provider (email, SMS, push).
 * The dispatch engine only ever talks to providers through this contract.
 */
import type { Channel } from '../../types/common';

export interface OutboundMessage {
  requestId: string;
  correlationId: string;
  recipientId: string;
  subject: string;
  body: string;
}

export interface GatewayResult {
  providerMessageId: string;
}

export interface IChannelGateway {
  readonly adapterName: string;
  readonly channel: Channel;

  /** Provider calls back with Delivered/Failed; a successful send is only `Sent`. */
  readonly supportsDeliveryReceipts: boolean;
  readonly supportsReadReceipts: boolean;

  /**
   * Hands the message to the provider.
   * Throws TransientGatewayError (retry) or PermanentGatewayError (give up).
   */
  send(message: OutboundMessage, address: string): Promise<GatewayResult>;
}

export type GatewayRegistry = Partial<Record<Channel, IChannelGateway>>;
