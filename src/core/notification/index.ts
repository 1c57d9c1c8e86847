export {
  NotificationDispatcher,
  isTotalFailure,
  summarizeReport,
  type DispatcherOptions,
  type SenderFactory,
} from './dispatcher.js';
export { formatMessage, escapeJsonString, isJsonContentType, assertSendable, MESSAGE_TOKEN } from './formatter.js';
export {
  createSender,
  DesktopSender,
  WebhookSender,
  nodeNotifierBinding,
  DEFAULT_TIMEOUT_MS,
  type SenderOptions,
} from './adapters/index.js';
export type {
  CustomFormat,
  DesktopBinding,
  DesktopDestination,
  Destination,
  DestinationSender,
  DestinationType,
  DispatchReport,
  DispatchResult,
  FormatSpec,
  HttpMethod,
  Payload,
  SendOutcome,
  WebhookDestination,
} from './types.js';
