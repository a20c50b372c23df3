// Re-export all stub adapters from a single entry point.
export { StubEmailGateway } from './stub-email';
export { StubSmsGateway } from './stub-sms';
export { StubPushGateway } from './stub-push';
export { LoggingEventBroker } from './logging-broker';
export type { StubSentMessage } from './stub-gateway';
