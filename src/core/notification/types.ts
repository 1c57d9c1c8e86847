import type { SendError } from '../errors.js';

export type DestinationType = 'webhook' | 'desktop';

export type HttpMethod = 'POST' | 'PATCH' | 'PUT';

export interface CustomFormat {
  type: 'custom';
  /** Sent verbatim as the Content-Type header */
  contentType: string;
  /** Body template; every `$(message)` is replaced by the message */
  template: string;
  /** JSON-escape the message first when contentType is a JSON type */
  escape: boolean;
  method: HttpMethod;
  /** Extra request headers, Content-Type excluded */
  headers: Readonly<Record<string, string>>;
}

export type FormatSpec =
  | { type: 'discord' }
  | { type: 'google_chat' }
  | { type: 'plain_text' }
  | CustomFormat;

export interface WebhookDestination {
  type: 'webhook';
  url: string;
  format: FormatSpec;
}

export interface DesktopDestination {
  type: 'desktop';
  summary: string;
  persistent: boolean;
}

export type Destination = Readonly<WebhookDestination> | Readonly<DesktopDestination>;

export interface Payload {
  contentType: string;
  body: string;
}

export type SendOutcome = { ok: true } | { ok: false; error: SendError };

export interface DispatchResult {
  /** Position of the destination in the configured list */
  index: number;
  destination: Destination;
  ok: boolean;
  error?: SendError;
}

/** One entry per destination, in destination order */
export type DispatchReport = DispatchResult[];

/**
 * Performs the transport action for one destination.
 * Implementations report failure through the outcome and never throw.
 */
export interface DestinationSender {
  readonly type: DestinationType;
  send(message: string): Promise<SendOutcome>;
}

/**
 * Platform desktop notification call. `persistent` asks the platform to
 * keep the notification on screen until the user dismisses it.
 */
export interface DesktopBinding {
  notify(summary: string, body: string, persistent: boolean): Promise<void>;
}
