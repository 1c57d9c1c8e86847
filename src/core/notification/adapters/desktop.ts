import notifier from 'node-notifier';
import { createLogger } from '../../../utils/logger.js';
import { errorMessage } from '../../errors.js';
import type { DesktopBinding, DesktopDestination, DestinationSender, SendOutcome } from '../types.js';

const logger = createLogger('DesktopSender');

/**
 * node-notifier picks the platform backend (notify-send, terminal-notifier,
 * SnoreToast). A persistent notification gets a zero timeout, which the
 * backends read as "never expire". The call resolves once the notification
 * is shown, not when the user dismisses it.
 */
export const nodeNotifierBinding: DesktopBinding = {
  notify(summary: string, body: string, persistent: boolean): Promise<void> {
    return new Promise((resolve, reject) => {
      notifier.notify(
        {
          title: summary,
          message: body,
          ...(persistent ? { timeout: 0 } : {}),
        },
        (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        }
      );
    });
  },
};

export class DesktopSender implements DestinationSender {
  readonly type = 'desktop' as const;
  private destination: Readonly<DesktopDestination>;
  private binding: DesktopBinding;

  constructor(destination: Readonly<DesktopDestination>, binding: DesktopBinding = nodeNotifierBinding) {
    this.destination = destination;
    this.binding = binding;
  }

  async send(message: string): Promise<SendOutcome> {
    const { summary, persistent } = this.destination;

    try {
      await this.binding.notify(summary, message, persistent);
      logger.debug(`Desktop notification shown: ${summary}`);
      return { ok: true };
    } catch (error) {
      const reason = errorMessage(error);
      logger.warn(`Desktop notification failed: ${reason}`);
      return { ok: false, error: { kind: 'desktop_unavailable', reason } };
    }
  }
}
