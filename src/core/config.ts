import { readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import * as yaml from 'js-yaml';
import { createLogger } from '../utils/logger.js';
import { ConfigError, errorMessage } from './errors.js';
import { assertSendable } from './notification/formatter.js';
import type {
  CustomFormat,
  DesktopDestination,
  Destination,
  FormatSpec,
  HttpMethod,
  WebhookDestination,
} from './notification/types.js';
import { DEFAULT_TIMEOUT_MS } from './notification/adapters/webhook.js';
import { DEFAULT_STREAM_CONFIG, type RedirectTarget, type StreamConfig } from './stream-filter.js';

const logger = createLogger('Config');

export const DEFAULT_CONFIG_PATH = 'noti.yaml';

const STANDARD_FORMATS = ['plain_text', 'discord', 'google_chat'] as const;
const HTTP_METHODS: readonly HttpMethod[] = ['POST', 'PATCH', 'PUT'];
const REDIRECT_TARGETS: readonly RedirectTarget[] = ['stdout', 'stderr'];

export const DESTINATION_TYPES = ['desktop', 'webhook'] as const;
export type InitDestination = (typeof DESTINATION_TYPES)[number];

export interface NotiConfig {
  destinations: readonly Destination[];
  stream: Readonly<StreamConfig>;
}

export interface RuntimeSettings {
  /** Per-request webhook timeout */
  timeoutMs: number;
}

/**
 * On-disk shape, as written by `noti init`
 */
export interface ConfigFile {
  destination: Array<Record<string, unknown>>;
  stream: {
    enabled: boolean;
    matching?: string;
    redirect?: RedirectTarget;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function includes<T extends string>(values: readonly T[], value: unknown): value is T {
  const allowed: readonly string[] = values;
  return typeof value === 'string' && allowed.includes(value);
}

function requireString(value: unknown, at: string): string {
  if (typeof value !== 'string') {
    throw new ConfigError(`${at} must be a string`);
  }
  return value;
}

function optionalBoolean(value: unknown, at: string, fallback: boolean): boolean {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${at} must be true or false`);
  }
  return value;
}

function parseUrl(value: unknown, at: string): string {
  const raw = requireString(value, at);
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(`${at} is not an absolute URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`${at} must be an http(s) URL, got ${url.protocol}`);
  }
  return raw;
}

function parseHeaders(value: unknown, at: string): Record<string, string> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${at} must be a map of header names to values`);
  }
  const headers: Record<string, string> = {};
  for (const [name, headerValue] of Object.entries(value)) {
    headers[name] = requireString(headerValue, `${at}.${name}`);
  }
  return headers;
}

function parseFormat(value: unknown, at: string): FormatSpec {
  if (includes(STANDARD_FORMATS, value)) {
    return { type: value };
  }
  if (!isRecord(value)) {
    throw new ConfigError(
      `${at} must be one of ${STANDARD_FORMATS.join(', ')} or a custom format with a template`
    );
  }

  const http = value.http ?? {};
  if (!isRecord(http)) {
    throw new ConfigError(`${at}.http must be a map`);
  }

  const method = http.method ?? 'POST';
  if (!includes(HTTP_METHODS, method)) {
    throw new ConfigError(`${at}.http.method must be one of ${HTTP_METHODS.join(', ')}`);
  }

  // Content-Type is carried on the format itself; the rest go out untouched
  const headers = parseHeaders(http.headers, `${at}.http.headers`);
  const contentTypeKey = Object.keys(headers).find(name => name.toLowerCase() === 'content-type');
  const contentType = contentTypeKey === undefined ? 'text/plain' : headers[contentTypeKey];
  if (contentTypeKey !== undefined) {
    delete headers[contentTypeKey];
  }

  const format: CustomFormat = {
    type: 'custom',
    contentType,
    template: requireString(value.template ?? '', `${at}.template`),
    escape: optionalBoolean(value.escape, `${at}.escape`, false),
    method,
    headers,
  };
  assertSendable(format);
  return format;
}

function parseDestination(value: unknown, at: string): Destination {
  if (!isRecord(value)) {
    throw new ConfigError(`${at} must be a map`);
  }

  switch (value.type) {
    case 'webhook': {
      const destination: WebhookDestination = {
        type: 'webhook',
        url: parseUrl(value.url, `${at}.url`),
        format: Object.freeze(parseFormat(value.format, `${at}.format`)),
      };
      return Object.freeze(destination);
    }
    case 'desktop': {
      const destination: DesktopDestination = {
        type: 'desktop',
        summary: requireString(value.summary, `${at}.summary`),
        persistent: optionalBoolean(value.persistent, `${at}.persistent`, false),
      };
      return Object.freeze(destination);
    }
    default:
      throw new ConfigError(`${at}.type must be one of ${DESTINATION_TYPES.join(', ')}`);
  }
}

function parseStream(value: unknown): StreamConfig {
  if (value === undefined || value === null) {
    return { ...DEFAULT_STREAM_CONFIG };
  }
  if (!isRecord(value)) {
    throw new ConfigError('stream must be a map');
  }

  if (typeof value.enabled !== 'boolean') {
    throw new ConfigError('stream.enabled must be set to true or false');
  }
  const stream: StreamConfig = { enabled: value.enabled };

  if (value.matching !== undefined && value.matching !== null) {
    const source = requireString(value.matching, 'stream.matching');
    try {
      stream.matching = new RegExp(source);
    } catch (error) {
      throw new ConfigError(`stream.matching is not a valid regular expression: ${errorMessage(error)}`);
    }
  }

  if (value.redirect !== undefined && value.redirect !== null) {
    if (!includes(REDIRECT_TARGETS, value.redirect)) {
      throw new ConfigError(`stream.redirect must be one of ${REDIRECT_TARGETS.join(', ')}`);
    }
    stream.redirect = value.redirect;
  }

  return stream;
}

/**
 * Validate a parsed YAML document. Everything past this point can assume a
 * well-formed, non-empty destination list.
 */
export function parseConfig(document: unknown): NotiConfig {
  if (!isRecord(document)) {
    throw new ConfigError('Config must be a map with a `destination` list');
  }

  const rawDestinations = document.destination;
  if (!Array.isArray(rawDestinations) || rawDestinations.length === 0) {
    throw new ConfigError('No destinations configured, add at least one entry under `destination`');
  }

  const destinations = rawDestinations.map((value: unknown, index: number) => parseDestination(value, `destination[${index}]`));

  return Object.freeze({
    destinations: Object.freeze(destinations),
    stream: Object.freeze(parseStream(document.stream)),
  });
}

export function parseConfigText(text: string): NotiConfig {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    throw new ConfigError(`Invalid config: ${errorMessage(error)}`);
  }
  return parseConfig(document);
}

/**
 * `--config` wins over NOTI_CONFIG, which wins over ./noti.yaml
 */
export function resolveConfigPath(flag?: string): string {
  return flag || process.env.NOTI_CONFIG || DEFAULT_CONFIG_PATH;
}

export async function loadConfig(path: string): Promise<NotiConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(
        `No config file found at ${path}, create one with \`noti init\` or pass --config`,
        'NO_CONFIG'
      );
    }
    throw error;
  }

  const config = parseConfigText(text);
  logger.debug(`Loaded ${config.destinations.length} destination(s) from ${path}`);
  return config;
}

export function getRuntimeSettings(): RuntimeSettings {
  return {
    timeoutMs: parseInt(process.env.NOTI_TIMEOUT_MS || '', 10) || DEFAULT_TIMEOUT_MS,
  };
}

const EXAMPLE_WEBHOOK_URL = 'https://discord.com/api/webhooks/<CHANNEL_ID>/<WEBHOOK_ID>';

export function exampleConfig(kind: InitDestination, custom = false): ConfigFile {
  const stream: ConfigFile['stream'] = { enabled: false, redirect: 'stdout' };

  if (kind === 'desktop') {
    return {
      destination: [{ type: 'desktop', summary: 'Noti', persistent: false }],
      stream,
    };
  }

  if (custom) {
    return {
      destination: [{
        type: 'webhook',
        url: EXAMPLE_WEBHOOK_URL,
        format: {
          http: {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
          },
          template: '{"content": "$(message)"}',
          escape: true,
        },
      }],
      stream,
    };
  }

  return {
    destination: [{ type: 'webhook', url: EXAMPLE_WEBHOOK_URL, format: 'discord' }],
    stream,
  };
}

/**
 * Write a starter config. Refuses to overwrite an existing file.
 */
export async function writeExampleConfig(path: string, kind: InitDestination, custom = false): Promise<void> {
  if (existsSync(path)) {
    throw new ConfigError(`\`${path}\` already exists`, 'CONFIG_CONFLICT');
  }
  const data = yaml.dump(exampleConfig(kind, custom));
  await writeFile(path, data, 'utf-8');
  logger.debug(`Wrote ${kind} config to ${path}`);
}
