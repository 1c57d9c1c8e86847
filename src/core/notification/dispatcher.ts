import { createLogger } from '../../utils/logger.js';
import { describeSendError, errorMessage } from '../errors.js';
import { createSender, type SenderOptions } from './adapters/index.js';
import type { Destination, DestinationSender, DispatchReport, DispatchResult, SendOutcome } from './types.js';

const logger = createLogger('Dispatcher');

export type SenderFactory = (destination: Destination, options?: SenderOptions) => DestinationSender;

export interface DispatcherOptions extends SenderOptions {
  /** Builds the sender for a destination; defaults to the webhook/desktop adapters */
  senderFactory?: SenderFactory;
}

/**
 * True when there was at least one destination and none of them took the message.
 */
export function isTotalFailure(report: DispatchReport): boolean {
  return report.length > 0 && report.every(result => !result.ok);
}

export function summarizeReport(report: DispatchReport): string {
  const delivered = report.filter(result => result.ok).length;
  return `${delivered}/${report.length} destination(s) delivered`;
}

export class NotificationDispatcher {
  private senders = new WeakMap<Destination, DestinationSender>();
  private senderFactory: SenderFactory;
  private senderOptions: SenderOptions;

  constructor(options?: DispatcherOptions) {
    this.senderFactory = options?.senderFactory ?? createSender;
    this.senderOptions = {
      timeoutMs: options?.timeoutMs,
      desktopBinding: options?.desktopBinding,
    };
  }

  private senderFor(destination: Destination): DestinationSender {
    let sender = this.senders.get(destination);
    if (!sender) {
      sender = this.senderFactory(destination, this.senderOptions);
      this.senders.set(destination, sender);
    }
    return sender;
  }

  private async sendOne(message: string, destination: Destination): Promise<SendOutcome> {
    try {
      return await this.senderFor(destination).send(message);
    } catch (error) {
      // Senders report failures in their outcome; a throw here is a bug in one
      // of them and still must not take the other destinations down with it.
      return { ok: false, error: { kind: 'transport', reason: errorMessage(error) } };
    }
  }

  /**
   * Send one message to every destination at once and wait for all of them.
   * Never rejects; failures are recorded per destination.
   */
  async dispatch(message: string, destinations: readonly Destination[]): Promise<DispatchReport> {
    if (destinations.length === 0) {
      logger.warn('No destinations to send notification to');
      return [];
    }

    const outcomes = await Promise.all(destinations.map(destination => this.sendOne(message, destination)));

    const report = outcomes.map((outcome, index): DispatchResult => {
      const destination = destinations[index];
      if (outcome.ok) {
        return { index, destination, ok: true };
      }
      logger.warn(`Destination #${index + 1} (${destination.type}) failed: ${describeSendError(outcome.error)}`);
      return { index, destination, ok: false, error: outcome.error };
    });

    logger.debug(summarizeReport(report));
    return report;
  }
}
