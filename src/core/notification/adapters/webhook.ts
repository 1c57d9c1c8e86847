import { createLogger } from '../../../utils/logger.js';
import { errorMessage, type SendError } from '../../errors.js';
import { formatMessage } from '../formatter.js';
import type { DestinationSender, SendOutcome, WebhookDestination } from '../types.js';

const logger = createLogger('WebhookSender');

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface WebhookSenderOptions {
  /** Per-request timeout */
  timeoutMs?: number;
}

function isTimeout(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError';
}

/**
 * undici reports connection problems as `TypeError: fetch failed` with the
 * real reason in `cause`.
 */
function transportReason(error: unknown): string {
  if (error instanceof Error && error.cause !== undefined) {
    return `${error.message}: ${errorMessage(error.cause)}`;
  }
  return errorMessage(error);
}

/**
 * Webhook URLs usually embed a secret, so logs only show the host.
 */
export function describeTarget(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '<invalid url>';
  }
}

export interface AuthenticatedUrl {
  url: string;
  authorization?: string;
}

/**
 * fetch rejects URLs with `user:password@` in them, so the credentials move
 * into a Basic Authorization header and the URL goes out without them.
 */
export function withBasicAuth(url: string): AuthenticatedUrl {
  const parsed = new URL(url);
  if (parsed.username === '' && parsed.password === '') {
    return { url };
  }
  const credentials = `${decodeURIComponent(parsed.username)}:${decodeURIComponent(parsed.password)}`;
  parsed.username = '';
  parsed.password = '';
  return {
    url: parsed.toString(),
    authorization: `Basic ${Buffer.from(credentials, 'utf-8').toString('base64')}`,
  };
}

export function classifyFetchError(error: unknown): Extract<SendError, { kind: 'timeout' | 'transport' }> {
  if (isTimeout(error)) {
    return { kind: 'timeout' };
  }
  return { kind: 'transport', reason: transportReason(error) };
}

export class WebhookSender implements DestinationSender {
  readonly type = 'webhook' as const;
  private destination: Readonly<WebhookDestination>;
  private timeoutMs: number;

  constructor(destination: Readonly<WebhookDestination>, options?: WebhookSenderOptions) {
    this.destination = destination;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async send(message: string): Promise<SendOutcome> {
    const { url, format } = this.destination;
    const method = format.type === 'custom' ? format.method : 'POST';
    const extraHeaders = format.type === 'custom' ? format.headers : {};
    const target = describeTarget(url);

    try {
      const payload = formatMessage(format, message);
      const request = withBasicAuth(url);
      const response = await fetch(request.url, {
        method,
        headers: {
          ...(request.authorization === undefined ? {} : { Authorization: request.authorization }),
          ...extraHeaders,
          'Content-Type': payload.contentType,
        },
        body: payload.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const responseText = await response.text();

      if (!response.ok) {
        logger.warn(`${method} ${target} returned ${response.status}`);
        logger.debug(`Response body: ${responseText}`);
        return { ok: false, error: { kind: 'http_status', status: response.status } };
      }

      logger.debug(`${method} ${target} returned ${response.status}`);
      return { ok: true };
    } catch (error) {
      const sendError = classifyFetchError(error);
      if (sendError.kind === 'timeout') {
        logger.warn(`${method} ${target} timed out after ${this.timeoutMs}ms`);
        return { ok: false, error: sendError };
      }
      // never echo the configured URL back, it may carry a token or a password
      const reason = sendError.reason.replaceAll(url, target);
      logger.warn(`${method} ${target} failed: ${reason}`);
      return { ok: false, error: { kind: 'transport', reason } };
    }
  }
}
