/**
 * HTTP lookups against the Kick channel API: chatroom id, live viewer
 * count and the HLS playback URL. A proxy base can stand in for the
 * channel endpoint when the API is not reachable directly.
 *
 * Responses are parsed leniently: a missing or oddly-typed field becomes
 * null instead of failing the whole lookup.
 *
 * @module channel/KickApiClient
 */

import { z } from 'zod';
import { ChannelResolutionError } from '../errors';
import type { ChannelDirectory, ChannelInfo, ViewerCountSource } from './types';

export const KICK_API_BASE = 'https://kick.com/api/v2';
export const REQUEST_TIMEOUT_MS = 10_000;
const USER_AGENT = 'Mozilla/5.0 (compatible; livetally)';

const optionalNumber = z.number().nullish().catch(null);
const optionalString = z.string().min(1).nullish().catch(null);

const livestreamSchema = z.object({
  viewer_count: optionalNumber,
  viewerCount: optionalNumber,
  playback_url: optionalString,
  playbackUrl: optionalString,
  hls: optionalString,
});

const channelSchema = z.object({
  chatroom: z.object({ id: optionalNumber }).nullish().catch(null),
  livestream: livestreamSchema.nullish().catch(null),
  playback_url: optionalString,
  playbackUrl: optionalString,
});

// Proxies may send the id as a numeric string.
const proxyChannelSchema = z.object({
  chatroomId: z.coerce.number().int().positive().nullish().catch(null),
});

type ChannelPayload = z.infer<typeof channelSchema>;

const EMPTY_CHANNEL: ChannelPayload = { chatroom: null, livestream: null, playback_url: null, playbackUrl: null };

export interface KickApiClientOptions {
  baseUrl?: string;
  /** Base URL of a proxy exposing `GET /channel?name=<name>`. */
  proxyUrl?: string;
  timeoutMs?: number;
}

export class KickApiClient implements ChannelDirectory, ViewerCountSource {
  private readonly baseUrl: string;
  private readonly proxyUrl: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: KickApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? KICK_API_BASE).replace(/\/+$/, '');
    this.proxyUrl = options.proxyUrl?.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async resolveChannel(name: string): Promise<ChannelInfo> {
    if (this.proxyUrl) {
      const body = await this.fetchJson(`${this.proxyUrl}/channel?name=${encodeURIComponent(name)}`);
      const parsed = proxyChannelSchema.safeParse(body);
      return { chatroomId: parsed.success ? parsed.data.chatroomId ?? null : null, viewerCount: null };
    }

    const channel = await this.fetchChannel(name);
    return {
      chatroomId: channel.chatroom?.id ?? null,
      viewerCount: viewerCountOf(channel),
    };
  }

  async fetchViewerCount(name: string): Promise<number | null> {
    return viewerCountOf(await this.fetchChannel(name));
  }

  async resolveStreamUrl(name: string): Promise<string | null> {
    const channel = await this.fetchChannel(name);
    const live = channel.livestream;
    return live?.playback_url
      ?? live?.playbackUrl
      ?? live?.hls
      ?? channel.playback_url
      ?? channel.playbackUrl
      ?? null;
  }

  private async fetchChannel(name: string): Promise<ChannelPayload> {
    const body = await this.fetchJson(`${this.baseUrl}/channels/${encodeURIComponent(name)}`);
    const parsed = channelSchema.safeParse(body);
    return parsed.success ? parsed.data : EMPTY_CHANNEL;
  }

  private async fetchJson(url: string): Promise<unknown> {
    const res = await fetch(url, {
      headers: { 'Accept': 'application/json', 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      throw new ChannelResolutionError(`${url} returned ${res.status}`, res.status);
    }
    const body: unknown = await res.json();
    return body;
  }
}

function viewerCountOf(channel: ChannelPayload): number | null {
  return channel.livestream?.viewer_count ?? channel.livestream?.viewerCount ?? null;
}
