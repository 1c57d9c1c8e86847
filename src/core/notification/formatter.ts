import { FormatError } from '../errors.js';
import type { CustomFormat, FormatSpec, Payload } from './types.js';

export const MESSAGE_TOKEN = '$(message)';

const JSON_CONTENT_TYPE = 'application/json';
const TEXT_CONTENT_TYPE = 'text/plain';

/**
 * Escape text for embedding inside a JSON string literal (quotes not included)
 */
export function escapeJsonString(text: string): string {
  return JSON.stringify(text).slice(1, -1);
}

export function isJsonContentType(contentType: string): boolean {
  return contentType.toLowerCase().includes('json');
}

/**
 * Reject a custom format that would produce an empty request.
 */
export function assertSendable(format: CustomFormat): void {
  if (!format.template && !format.contentType) {
    throw new FormatError('Custom webhook format needs a template or a Content-Type header');
  }
}

function renderTemplate(format: CustomFormat, message: string): string {
  const text = format.escape && isJsonContentType(format.contentType)
    ? escapeJsonString(message)
    : message;
  // Function replacer: `$&` and friends in the message stay literal
  return format.template.replaceAll(MESSAGE_TOKEN, () => text);
}

/**
 * Build the request payload a destination expects for a message.
 */
export function formatMessage(format: FormatSpec, message: string): Payload {
  switch (format.type) {
    case 'discord':
      return { contentType: JSON_CONTENT_TYPE, body: JSON.stringify({ content: message }) };
    case 'google_chat':
      return { contentType: JSON_CONTENT_TYPE, body: JSON.stringify({ text: message }) };
    case 'plain_text':
      return { contentType: TEXT_CONTENT_TYPE, body: message };
    case 'custom':
      assertSendable(format);
      return { contentType: format.contentType, body: renderTemplate(format, message) };
  }
}
