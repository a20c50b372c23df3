// Re-export all integration interfaces from a single entry point.
export type {
  IChannelGateway,
  GatewayRegistry,
  GatewayResult,
  OutboundMessage,
} from './channel-gateway';
export type { IEventBroker, PublishedEvent } from './event-broker';
