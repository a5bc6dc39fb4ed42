/**
 * Live chat over Kick's Pusher channel.
 *
 * Subscribes to `chatrooms.<id>.v2` once the socket opens, answers pings
 * and hands chat events to the session. Frames that are not chat events,
 * or that fail to parse, are skipped.
 *
 * @module feed/PusherChatFeed
 */

import WebSocket from 'ws';
import { z } from 'zod';
import { log } from '../logger';
import type { ChatFeed, ChatFeedHandlers, ChatMessage } from './types';

export const PUSHER_URL =
  'wss://ws-us2.pusher.com/app/32cbd69e4b950bf97679?protocol=7&client=js&version=8.4.0&flash=false';
export const CHAT_MESSAGE_EVENT = 'App\\Events\\ChatMessageEvent';

const frameSchema = z.object({
  event: z.string(),
  data: z.unknown().optional(),
});

const chatPayloadSchema = z.object({
  content: z.string().nullish().catch(null),
  sender: z.object({ username: z.string().min(1).nullish().catch(null) }).nullish().catch(null),
});

export type FeedFrame =
  | { kind: 'chat'; message: ChatMessage }
  | { kind: 'ping' }
  | { kind: 'other'; event: string }
  | { kind: 'invalid' };

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Classify one raw frame. Never throws. */
export function parseFeedFrame(raw: string): FeedFrame {
  const frame = frameSchema.safeParse(parseJson(raw));
  if (!frame.success) return { kind: 'invalid' };

  const { event, data } = frame.data;
  if (event === 'pusher:ping') return { kind: 'ping' };
  if (event !== CHAT_MESSAGE_EVENT) return { kind: 'other', event };

  // Pusher double-encodes event data as a JSON string. Absent data is an empty message.
  const decoded = data === undefined || data === null || data === ''
    ? {}
    : typeof data === 'string' ? parseJson(data) : data;
  const payload = chatPayloadSchema.safeParse(decoded);
  if (!payload.success) return { kind: 'invalid' };

  return {
    kind: 'chat',
    message: {
      username: payload.data.sender?.username ?? 'anon',
      content: payload.data.content ?? '',
    },
  };
}

export function subscribeFrame(chatroomId: number): string {
  return JSON.stringify({
    event: 'pusher:subscribe',
    data: { auth: '', channel: `chatrooms.${chatroomId}.v2` },
  });
}

/** The parts of a WebSocket the feed uses. */
export interface FeedSocket {
  send(data: string): void;
  close(): void;
  onOpen(listener: () => void): void;
  onMessage(listener: (text: string) => void): void;
  onClose(listener: (code: number, reason: string) => void): void;
  onError(listener: (error: Error) => void): void;
}

export type FeedSocketFactory = (url: string) => FeedSocket;

function rawDataToText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export const connectWebSocket: FeedSocketFactory = (url) => {
  const ws = new WebSocket(url);
  return {
    send: (data) => ws.send(data),
    close: () => ws.close(),
    onOpen: (listener) => { ws.on('open', listener); },
    onMessage: (listener) => { ws.on('message', (data) => listener(rawDataToText(data))); },
    onClose: (listener) => { ws.on('close', (code, reason) => listener(code, reason.toString('utf8'))); },
    onError: (listener) => { ws.on('error', listener); },
  };
};

export interface PusherChatFeedOptions {
  chatroomId: number;
  url?: string;
  connect?: FeedSocketFactory;
}

export class PusherChatFeed implements ChatFeed {
  private socket: FeedSocket | null = null;
  private stopped = false;
  private closeReported = false;
  private handlers: ChatFeedHandlers | null = null;

  constructor(private readonly options: PusherChatFeedOptions) {}

  start(handlers: ChatFeedHandlers): void {
    if (this.socket) throw new Error('Feed already started');
    this.handlers = handlers;

    const socket = (this.options.connect ?? connectWebSocket)(this.options.url ?? PUSHER_URL);
    this.socket = socket;

    socket.onOpen(() => {
      log(`Feed connected, subscribing to chatroom ${this.options.chatroomId}`);
      socket.send(subscribeFrame(this.options.chatroomId));
    });
    socket.onMessage((text) => this.handleFrame(socket, text));
    socket.onClose((code, reason) => {
      this.reportClose(new Error(reason ? `${reason} (code ${code})` : `connection closed (code ${code})`));
    });
    socket.onError((error) => this.reportClose(error));
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.socket?.close();
  }

  private handleFrame(socket: FeedSocket, text: string): void {
    if (this.stopped) return;
    const frame = parseFeedFrame(text);
    switch (frame.kind) {
      case 'chat':
        this.handlers?.onMessage(frame.message);
        break;
      case 'ping':
        socket.send(JSON.stringify({ event: 'pusher:pong', data: {} }));
        break;
      case 'other':
        log(`Feed event ${frame.event}`);
        break;
      case 'invalid':
        log('Skipped malformed feed frame');
        break;
    }
  }

  private reportClose(error: Error): void {
    if (this.stopped || this.closeReported) return;
    this.closeReported = true;
    this.handlers?.onClose(error);
  }
}
