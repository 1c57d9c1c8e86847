import type { DesktopBinding, Destination, DestinationSender } from '../types.js';
import { DesktopSender, nodeNotifierBinding } from './desktop.js';
import { WebhookSender } from './webhook.js';

export { DesktopSender, nodeNotifierBinding } from './desktop.js';
export { WebhookSender, DEFAULT_TIMEOUT_MS, classifyFetchError, describeTarget, withBasicAuth, type WebhookSenderOptions, type AuthenticatedUrl } from './webhook.js';

export interface SenderOptions {
  /** Per-request webhook timeout */
  timeoutMs?: number;
  desktopBinding?: DesktopBinding;
}

export function createSender(destination: Destination, options?: SenderOptions): DestinationSender {
  switch (destination.type) {
    case 'webhook':
      return new WebhookSender(destination, { timeoutMs: options?.timeoutMs });
    case 'desktop':
      return new DesktopSender(destination, options?.desktopBinding ?? nodeNotifierBinding);
  }
}
