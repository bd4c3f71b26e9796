/**
 * Messaging transports - Discord REST and log
 *
 * The Discord transport posts through the bot API so messages can later be
 * edited and deleted by id. Sends carry a nonce with `enforce_nonce`, which
 * makes Discord return the original message instead of posting a duplicate
 * when an attempted-but-unconfirmed send is retried.
 *
 * @module notifications/transport
 */

import { DeliveryError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import {
  PING_EVERYONE,
  type Logger,
  type MessageEdit,
  type MessageEmbed,
  type MessagingTransport,
  type OutboundMessage,
  type SendOptions,
} from '../types.js';

const DEFAULT_API_BASE = 'https://discord.com/api/v10';
const DEFAULT_TIMEOUT_MS = 15_000;
/** Discord caps nonces at 25 characters */
const MAX_NONCE_LENGTH = 25;

export interface DiscordTransportConfig {
  botToken: string;
  apiBase?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

interface DiscordEmbedPayload {
  title: string;
  description?: string;
  color: number;
  fields?: Array<{ name: string; value: string; inline?: boolean }>;
  footer?: { text: string };
  timestamp?: string;
  url?: string;
}

interface AllowedMentions {
  parse: Array<'everyone' | 'roles' | 'users'>;
  roles?: string[];
}

export function toDiscordEmbed(embed: MessageEmbed): DiscordEmbedPayload {
  return {
    title: embed.title,
    description: embed.description,
    color: embed.color,
    fields: embed.fields,
    footer: embed.footer ? { text: embed.footer } : undefined,
    timestamp: embed.timestamp,
    url: embed.url,
  };
}

/** Only the requested targets may be pinged; everything else renders silently */
export function allowedMentions(ping: SendOptions['ping']): AllowedMentions {
  if (!ping || ping.length === 0) {
    return { parse: [] };
  }
  const roles = ping.filter((p) => p !== PING_EVERYONE);
  return {
    parse: ping.includes(PING_EVERYONE) ? ['everyone'] : [],
    roles,
  };
}

export function toNonce(deliveryId: string): string {
  return deliveryId.replace(/-/g, '').slice(0, MAX_NONCE_LENGTH);
}

/**
 * 429 and 5xx are transient; other 4xx (unknown channel, missing access,
 * unknown message) will not succeed on retry.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class DiscordRestTransport implements MessagingTransport {
  private readonly apiBase: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly config: DiscordTransportConfig) {
    this.apiBase = (config.apiBase ?? DEFAULT_API_BASE).replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.logger = config.logger ?? createLogger('discord-transport');
  }

  private async request(method: 'POST' | 'PATCH' | 'DELETE', route: string, body?: unknown): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiBase}${route}`, {
        method,
        headers: {
          Authorization: `Bot ${this.config.botToken}`,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      throw new DeliveryError(`Discord ${method} ${route} failed: ${errorMessage(e)}`, true);
    }

    if (!response.ok) {
      // Route only: the token never reaches the logs
      throw new DeliveryError(
        `Discord API error on ${method} ${route}: ${response.status} ${response.statusText}`,
        isRetryableStatus(response.status),
        response.status,
      );
    }
    return response;
  }

  async sendMessage(destination: string, message: OutboundMessage, options: SendOptions = {}): Promise<string> {
    const payload = {
      content: message.content,
      embeds: message.embed ? [toDiscordEmbed(message.embed)] : [],
      allowed_mentions: allowedMentions(options.ping),
      nonce: options.nonce ? toNonce(options.nonce) : undefined,
      enforce_nonce: options.nonce ? true : undefined,
      message_reference: options.replyTo
        ? { message_id: options.replyTo, fail_if_not_exists: false }
        : undefined,
    };

    const response = await this.request('POST', `/channels/${destination}/messages`, payload);
    const body = (await response.json()) as { id?: unknown };
    if (typeof body.id !== 'string') {
      throw new DeliveryError(`Discord returned no message id for channel ${destination}`, true);
    }
    this.logger.debug?.(`Posted message ${body.id} to channel ${destination}`);
    return body.id;
  }

  async editMessage(destination: string, messageId: string, edit: MessageEdit): Promise<void> {
    const payload: { content?: string; embeds?: DiscordEmbedPayload[]; allowed_mentions: AllowedMentions } = {
      allowed_mentions: { parse: [] },
    };
    if (edit.content !== undefined) payload.content = edit.content;
    if (edit.embed !== undefined) payload.embeds = [toDiscordEmbed(edit.embed)];

    await this.request('PATCH', `/channels/${destination}/messages/${messageId}`, payload);
    this.logger.debug?.(`Edited message ${messageId} in channel ${destination}`);
  }

  async deleteMessage(destination: string, messageId: string): Promise<void> {
    await this.request('DELETE', `/channels/${destination}/messages/${messageId}`);
    this.logger.debug?.(`Deleted message ${messageId} in channel ${destination}`);
  }
}

/**
 * Transport that only logs. Used when no bot token is configured.
 */
export class LogTransport implements MessagingTransport {
  private counter = 0;
  private readonly sentNonces = new Map<string, string>();

  constructor(private readonly logger: Logger = createLogger('log-transport')) {}

  async sendMessage(destination: string, message: OutboundMessage, options: SendOptions = {}): Promise<string> {
    const existing = options.nonce ? this.sentNonces.get(options.nonce) : undefined;
    if (existing) return existing;

    const id = `log-${++this.counter}`;
    if (options.nonce) this.sentNonces.set(options.nonce, id);

    const title = message.embed ? ` [${message.embed.title}]` : '';
    const reply = options.replyTo ? ` (reply to ${options.replyTo})` : '';
    this.logger.info(`#${destination} ${id}${reply}: ${message.content.split('\n')[0]}${title}`);
    return id;
  }

  async editMessage(destination: string, messageId: string, edit: MessageEdit): Promise<void> {
    this.logger.info(`#${destination} edit ${messageId}: ${edit.embed?.title ?? edit.content ?? ''}`);
  }

  async deleteMessage(destination: string, messageId: string): Promise<void> {
    this.logger.info(`#${destination} delete ${messageId}`);
  }
}

/** Discord when a bot token is configured, otherwise log-only */
export function createTransport(config: { botToken?: string; apiBase?: string; logger?: Logger }): MessagingTransport {
  if (config.botToken) {
    return new DiscordRestTransport({ botToken: config.botToken, apiBase: config.apiBase, logger: config.logger });
  }
  return new LogTransport(config.logger);
}
